/**
 * Crawl Service Client (Browsertrix)
 *
 * Submits single-page crawls, reports their state and downloads the resulting
 * WACZ archive. Failures are split into transient (network, timeout, 408/429/5xx)
 * and permanent (other 4xx, malformed responses) so the orchestrator knows what
 * it may retry.
 */

import { z } from 'zod';
import type { BrowserProfile } from './accession.js';
import { buildCrawlConfig, type BrowserProfileIds } from './crawlConfig.js';
import { loadConfig } from './config.js';
import { PermanentExternalError, TransientExternalError } from './errors.js';
import { getLogger } from './logger.js';

const SERVICE = 'browsertrix';

export interface CrawlJobRequest {
  url: string;
  browserProfile?: BrowserProfile | null;
}

export type CrawlJobStatus =
  | { state: 'running'; remoteState: string }
  | { state: 'succeeded'; artifactLocator: string }
  | { state: 'failed'; reason: string };

/**
 * Capabilities the orchestrator needs from a crawling service
 */
export interface CrawlServiceClient {
  /** Start a crawl and return its job id */
  submitJob(request: CrawlJobRequest): Promise<string>;
  getStatus(jobId: string): Promise<CrawlJobStatus>;
  fetchArtifact(artifactLocator: string): Promise<Buffer>;
}

/**
 * Link to the crawl service's own copy of a finished crawl's archive
 */
export interface ReplayUrlResolver {
  getReplayUrl(artifactLocator: string): Promise<string>;
}

const FAILED_CRAWL_STATES = new Set([
  'failed',
  'canceled',
  'stopped_by_user',
  'stopped_quota_reached',
  'stopped_storage_quota_reached',
  'stopped_time_quota_reached',
  'skipped_storage_quota_reached',
  'skipped_time_quota_reached',
]);

const AuthResponseSchema = z.object({
  access_token: z.string().min(1),
});

const CreateCrawlResponseSchema = z.object({
  id: z.string().min(1),
  run_now_job: z.string().nullable().optional(),
});

const CrawlConfigResponseSchema = z.object({
  lastCrawlState: z.string().nullable().optional(),
  lastCrawlId: z.string().nullable().optional(),
});

const ReplayResponseSchema = z.object({
  resources: z.array(z.object({ path: z.string() })).min(1),
});

interface CrawlRequestInit {
  method: 'GET' | 'POST';
  headers?: Record<string, string>;
  body?: string;
}

export interface BrowsertrixClientOptions {
  baseUrl: string;
  orgId: string;
  username: string;
  password: string;
  requestTimeoutMs?: number;
  profileIds?: BrowserProfileIds;
  fetchImpl?: typeof fetch;
}

/**
 * Map an HTTP status to the error class the orchestrator acts on
 */
export function classifyHttpStatus(
  status: number,
  message: string
): TransientExternalError | PermanentExternalError {
  if (status === 408 || status === 429 || status >= 500) {
    return new TransientExternalError(SERVICE, message, status);
  }
  return new PermanentExternalError(SERVICE, message, status);
}

export class BrowsertrixClient implements CrawlServiceClient, ReplayUrlResolver {
  private readonly baseUrl: string;
  private readonly orgId: string;
  private readonly username: string;
  private readonly password: string;
  private readonly requestTimeoutMs: number;
  private readonly profileIds: BrowserProfileIds;
  private readonly fetchImpl: typeof fetch;
  private accessToken: string | null = null;

  constructor(options: BrowsertrixClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.orgId = options.orgId;
    this.username = options.username;
    this.password = options.password;
    this.requestTimeoutMs = options.requestTimeoutMs ?? 30_000;
    this.profileIds = options.profileIds ?? {};
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  async submitJob(request: CrawlJobRequest): Promise<string> {
    const payload = buildCrawlConfig(request.url, request.browserProfile ?? null, this.profileIds);
    const response = await this.authorizedRequest(`/orgs/${this.orgId}/crawlconfigs/`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(payload),
    });
    const body = await this.parseJson(response, CreateCrawlResponseSchema, 'create crawl');
    return body.id;
  }

  async getStatus(jobId: string): Promise<CrawlJobStatus> {
    const response = await this.authorizedRequest(
      `/orgs/${this.orgId}/crawlconfigs/${encodeURIComponent(jobId)}`,
      { method: 'GET' }
    );
    const body = await this.parseJson(response, CrawlConfigResponseSchema, 'crawl status');
    const remoteState = body.lastCrawlState ?? 'starting';

    if (remoteState === 'complete') {
      if (!body.lastCrawlId) {
        throw new PermanentExternalError(SERVICE, `crawl ${jobId} is complete but has no crawl id`);
      }
      return { state: 'succeeded', artifactLocator: body.lastCrawlId };
    }

    if (FAILED_CRAWL_STATES.has(remoteState)) {
      return { state: 'failed', reason: remoteState };
    }

    return { state: 'running', remoteState };
  }

  async fetchArtifact(artifactLocator: string): Promise<Buffer> {
    const response = await this.authorizedRequest(
      `/orgs/${this.orgId}/crawls/${encodeURIComponent(artifactLocator)}/download?prefer_single_wacz=true`,
      { method: 'GET' }
    );

    let bytes: ArrayBuffer;
    try {
      bytes = await response.arrayBuffer();
    } catch (error) {
      throw new TransientExternalError(
        SERVICE,
        `artifact download interrupted: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    if (bytes.byteLength === 0) {
      throw new PermanentExternalError(SERVICE, `artifact ${artifactLocator} is empty`);
    }

    return Buffer.from(bytes);
  }

  /**
   * Public replay URL of a finished crawl's WACZ file
   */
  async getReplayUrl(artifactLocator: string): Promise<string> {
    const response = await this.authorizedRequest(
      `/orgs/${this.orgId}/crawls/${encodeURIComponent(artifactLocator)}/replay.json`,
      { method: 'GET' }
    );
    const body = await this.parseJson(response, ReplayResponseSchema, 'replay');
    return body.resources[0].path;
  }

  private async authenticate(): Promise<string> {
    const form = new URLSearchParams({
      username: this.username,
      password: this.password,
    });
    const response = await this.send('/auth/jwt/login', {
      method: 'POST',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body: form.toString(),
    });

    if (!response.ok) {
      throw classifyHttpStatus(response.status, `login failed with HTTP ${response.status}`);
    }

    const body = await this.parseJson(response, AuthResponseSchema, 'login');
    this.accessToken = body.access_token;
    return body.access_token;
  }

  /**
   * Send a request with the cached bearer token, logging in again once on 401
   */
  private async authorizedRequest(path: string, init: CrawlRequestInit): Promise<Response> {
    const token = this.accessToken ?? (await this.authenticate());
    let response = await this.send(path, withBearer(init, token));

    if (response.status === 401) {
      getLogger().info({ path }, 'Browsertrix token rejected, re-authenticating');
      const refreshed = await this.authenticate();
      response = await this.send(path, withBearer(init, refreshed));
    }

    if (!response.ok) {
      throw classifyHttpStatus(
        response.status,
        `${init.method} ${path} failed with HTTP ${response.status}`
      );
    }

    return response;
  }

  private async send(path: string, init: CrawlRequestInit): Promise<Response> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.requestTimeoutMs);

    try {
      return await this.fetchImpl(`${this.baseUrl}${path}`, {
        ...init,
        signal: controller.signal,
      });
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw new TransientExternalError(
          SERVICE,
          `request timeout after ${this.requestTimeoutMs}ms`
        );
      }
      throw new TransientExternalError(
        SERVICE,
        error instanceof Error ? error.message : 'network error'
      );
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private async parseJson<S extends z.ZodTypeAny>(
    response: Response,
    schema: S,
    what: string
  ): Promise<z.infer<S>> {
    let raw: unknown;
    try {
      raw = await response.json();
    } catch {
      throw new PermanentExternalError(SERVICE, `${what} response is not JSON`, response.status);
    }

    const result = schema.safeParse(raw);
    if (!result.success) {
      throw new PermanentExternalError(
        SERVICE,
        `unexpected ${what} response: ${result.error.message}`,
        response.status
      );
    }
    return result.data;
  }
}

function withBearer(init: CrawlRequestInit, token: string): CrawlRequestInit {
  return {
    ...init,
    headers: {
      ...init.headers,
      Authorization: `Bearer ${token}`,
    },
  };
}

let defaultClient: BrowsertrixClient | null = null;

export function getCrawlServiceClient(): BrowsertrixClient {
  if (!defaultClient) {
    const config = loadConfig();
    defaultClient = new BrowsertrixClient({
      baseUrl: config.crawlerBaseUrl,
      orgId: config.crawlerOrgId,
      username: config.crawlerUsername,
      password: config.crawlerPassword,
      requestTimeoutMs: config.crawlerRequestTimeoutSeconds * 1000,
      profileIds: config.facebookProfileId ? { facebook: config.facebookProfileId } : {},
    });
  }
  return defaultClient;
}
