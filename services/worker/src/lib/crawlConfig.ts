/**
 * Browsertrix crawl configuration payload
 *
 * One accession is one page: the crawl is seeded with the accession URL,
 * scoped to that page and started immediately.
 */

import type { BrowserProfile } from './accession.js';

export interface CrawlSeed {
  url: string;
  scopeType: string;
}

export interface CrawlSeedsConfig {
  seeds: CrawlSeed[];
  scopeType: string;
  extraHops: number;
  useSitemap: boolean;
  failOnFailedSeed: boolean;
  behaviorTimeout: number | null;
  pageLoadTimeout: number | null;
  pageExtraDelay: number | null;
  postLoadDelay: number;
  userAgent: string | null;
  limit: number | null;
  lang: string;
  exclude: string[];
  behaviors: string;
}

export interface BrowsertrixCrawlConfig {
  jobType: string;
  name: string;
  description: string | null;
  scale: number;
  profileid: string;
  runNow: boolean;
  schedule: string;
  crawlTimeout: number;
  maxCrawlSize: number;
  tags: string[];
  autoAddCollections: string[];
  config: CrawlSeedsConfig;
  crawlerChannel: string;
  proxyId: string | null;
}

/** Browsertrix profile ids per browser profile (from the crawler's profile list) */
export type BrowserProfileIds = Partial<Record<BrowserProfile, string>>;

export const DEFAULT_BEHAVIORS = 'autoscroll,autoplay,autofetch,siteSpecific';
export const MAX_CRAWL_SIZE_BYTES = 1_000_000_000;

export function buildCrawlConfig(
  url: string,
  browserProfile: BrowserProfile | null = null,
  profileIds: BrowserProfileIds = {}
): BrowsertrixCrawlConfig {
  const profileid = browserProfile ? profileIds[browserProfile] ?? '' : '';

  return {
    jobType: 'custom',
    name: '',
    description: null,
    scale: 1,
    profileid,
    runNow: true,
    schedule: '',
    crawlTimeout: 0,
    maxCrawlSize: MAX_CRAWL_SIZE_BYTES,
    tags: [],
    autoAddCollections: [],
    config: {
      seeds: [{ url, scopeType: 'page' }],
      scopeType: 'page',
      extraHops: 0,
      useSitemap: false,
      failOnFailedSeed: false,
      behaviorTimeout: null,
      pageLoadTimeout: null,
      pageExtraDelay: null,
      postLoadDelay: 120,
      userAgent: null,
      limit: null,
      lang: 'en',
      exclude: [],
      behaviors: DEFAULT_BEHAVIORS,
    },
    crawlerChannel: 'default',
    proxyId: null,
  };
}
