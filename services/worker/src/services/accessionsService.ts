/**
 * Accession Service
 *
 * Entry points for the HTTP layer: register an accession, read one, list them.
 * Registration only persists the PENDING row; the ingestion worker takes it from there.
 */

import { z } from 'zod';
import {
  ACCESSION_STATUSES,
  BROWSER_PROFILES,
  METADATA_LANGUAGES,
  type Accession,
} from '../lib/accession.js';
import { loadConfig } from '../lib/config.js';
import { getCrawlServiceClient, type ReplayUrlResolver } from '../lib/crawlService.js';
import { UnknownSubjectsError, ValidationError } from '../lib/errors.js';
import { getLogger, type Logger } from '../lib/logger.js';
import { getArtifactStore, type ArtifactStore } from '../lib/objectStore.js';
import {
  PgAccessionsRepo,
  type AccessionPage,
  type AccessionsRepo,
} from '../repos/accessionsRepo.js';
import { PgSubjectsLookup, type SubjectsLookup } from '../repos/subjectsRepo.js';

function isHttpUrl(value: string): boolean {
  try {
    const { protocol } = new URL(value);
    return protocol === 'http:' || protocol === 'https:';
  } catch {
    return false;
  }
}

const HttpUrlSchema = z
  .string()
  .trim()
  .min(1, 'url is required')
  .refine(isHttpUrl, { message: 'url must be a well-formed http or https URL' });

const CreateAccessionSchema = z.object({
  url: HttpUrlSchema,
  title: z.string().trim().min(1).max(200),
  description: z.string().trim().min(1).max(2000).nullish(),
  subjectIds: z.array(z.number().int().positive()).max(200).default([]),
  metadataLanguage: z.enum(METADATA_LANGUAGES).default('english'),
  metadataDate: z.coerce.date().nullish(),
  browserProfile: z.enum(BROWSER_PROFILES).nullish(),
  isPrivate: z.boolean().default(false),
});

export type CreateAccessionInput = z.input<typeof CreateAccessionSchema>;

const ListAccessionsSchema = z
  .object({
    metadataLanguage: z.enum(METADATA_LANGUAGES).optional(),
    page: z.coerce.number().int().min(1).default(1),
    perPage: z.coerce.number().int().min(1).max(100).default(20),
    status: z.enum(ACCESSION_STATUSES).optional(),
    query: z.string().trim().min(1).optional(),
    subjectIds: z.array(z.number().int().positive()).optional(),
    subjectMatch: z.enum(['any', 'all']).default('any'),
    createdFrom: z.coerce.date().optional(),
    createdTo: z.coerce.date().optional(),
    isPrivate: z.boolean().optional(),
  })
  .refine(
    (filter) => !filter.createdFrom || !filter.createdTo || filter.createdFrom <= filter.createdTo,
    { message: 'createdFrom must not be after createdTo', path: ['createdFrom'] }
  );

export type ListAccessionsInput = z.input<typeof ListAccessionsSchema>;

export interface AccessionDetails {
  accession: Accession;
  /** Presigned download link, present once the archive is stored */
  artifactUrl: string | null;
  /** Crawl service replay link for the same archive */
  replayUrl: string | null;
}

export interface AccessionListing {
  items: Accession[];
  page: number;
  perPage: number;
  numPages: number;
  total: number;
}

export interface AccessionsServiceDeps {
  repo: AccessionsRepo;
  subjects: SubjectsLookup;
  store: ArtifactStore;
  replay?: ReplayUrlResolver;
  /** Lifetime of download links */
  presignExpirySeconds?: number;
  logger?: Logger;
}

export class AccessionsService {
  private readonly repo: AccessionsRepo;
  private readonly subjects: SubjectsLookup;
  private readonly store: ArtifactStore;
  private readonly replay: ReplayUrlResolver | null;
  private readonly presignExpirySeconds: number;
  private readonly logger: Logger;

  constructor(deps: AccessionsServiceDeps) {
    this.repo = deps.repo;
    this.subjects = deps.subjects;
    this.store = deps.store;
    this.replay = deps.replay ?? null;
    this.presignExpirySeconds = deps.presignExpirySeconds ?? loadConfig().s3PresignExpirySeconds;
    this.logger = deps.logger ?? getLogger();
  }

  async createAccession(input: CreateAccessionInput): Promise<Accession> {
    const parsed = CreateAccessionSchema.safeParse(input);
    if (!parsed.success) {
      throw new ValidationError(parsed.error.errors);
    }

    const data = parsed.data;
    const subjectIds = [...new Set(data.subjectIds)];

    const missing = await this.subjects.findMissing(subjectIds);
    if (missing.length > 0) {
      throw new UnknownSubjectsError(missing);
    }

    const accession = await this.repo.create({
      sourceUrl: data.url,
      title: data.title,
      description: data.description ?? null,
      metadataLanguage: data.metadataLanguage,
      metadataDate: data.metadataDate ?? null,
      browserProfile: data.browserProfile ?? null,
      isPrivate: data.isPrivate,
      subjectIds,
    });

    this.logger.info(
      { accessionId: accession.id, url: accession.sourceUrl },
      'Accession registered'
    );
    return accession;
  }

  async getAccession(id: string): Promise<AccessionDetails> {
    const accession = await this.repo.getById(id);

    if (accession.status !== 'COMPLETED' || accession.storedArtifactReference === null) {
      return { accession, artifactUrl: null, replayUrl: null };
    }

    const artifactUrl = await this.store.getDownloadUrl(
      accession.storedArtifactReference,
      this.presignExpirySeconds
    );
    return { accession, artifactUrl, replayUrl: await this.resolveReplayUrl(accession) };
  }

  /**
   * Null without a resolver or when the crawl service cannot produce the link
   */
  private async resolveReplayUrl(accession: Accession): Promise<string | null> {
    if (!this.replay || accession.artifactLocator === null) {
      return null;
    }
    try {
      return await this.replay.getReplayUrl(accession.artifactLocator);
    } catch (error) {
      this.logger.warn(
        { err: error, accessionId: accession.id, artifactLocator: accession.artifactLocator },
        'Replay link unavailable'
      );
      return null;
    }
  }

  async listAccessions(input: ListAccessionsInput = {}): Promise<AccessionListing> {
    const parsed = ListAccessionsSchema.safeParse(input);
    if (!parsed.success) {
      throw new ValidationError(parsed.error.errors);
    }

    const { page, perPage, ...filter } = parsed.data;
    const result: AccessionPage = await this.repo.list({
      ...filter,
      limit: perPage,
      offset: (page - 1) * perPage,
    });

    return {
      items: result.items,
      page,
      perPage,
      numPages: Math.ceil(result.total / perPage),
      total: result.total,
    };
  }
}

/**
 * Service wired to Postgres and S3 from the environment
 */
export function createAccessionsService(): AccessionsService {
  return new AccessionsService({
    repo: new PgAccessionsRepo(),
    subjects: new PgSubjectsLookup(),
    store: getArtifactStore(),
    replay: getCrawlServiceClient(),
  });
}
