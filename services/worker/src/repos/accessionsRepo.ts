/**
 * Accession Repository
 *
 * Sole writer of durable accession state. Every lifecycle write is conditioned on
 * the status and version the caller last observed, so concurrent workers never need
 * a lock: the loser of a race gets a ConflictError and the row is left untouched.
 */

import { randomUUID } from 'crypto';
import { z } from 'zod';
import {
  ACCESSION_STATUSES,
  BROWSER_PROFILES,
  METADATA_LANGUAGES,
  applyUpdate,
  findInvariantViolations,
  findUpdateViolations,
  type Accession,
  type AccessionDraft,
  type AccessionStatus,
  type AccessionUpdate,
  type MetadataLanguage,
} from '../lib/accession.js';
import { getPool, type SqlPool } from '../lib/db.js';
import {
  AccessionNotFoundError,
  ConflictError,
  InvariantViolationError,
} from '../lib/errors.js';
import { getLogger } from '../lib/logger.js';

export interface ListByStatusOptions {
  /** Only accessions whose nextAttemptAt is at or before this instant */
  dueBefore?: Date;
  limit?: number;
}

export interface AccessionListFilter {
  metadataLanguage?: MetadataLanguage;
  status?: AccessionStatus;
  subjectIds?: number[];
  /** 'any': shares at least one subject; 'all': carries every subject */
  subjectMatch?: 'any' | 'all';
  query?: string;
  createdFrom?: Date;
  createdTo?: Date;
  isPrivate?: boolean;
  limit: number;
  offset: number;
}

export interface AccessionPage {
  items: Accession[];
  total: number;
}

export interface AccessionsRepo {
  /** Persist a new accession in PENDING; any status on the draft is ignored */
  create(draft: AccessionDraft, now?: Date): Promise<Accession>;
  getById(id: string): Promise<Accession>;
  /**
   * Conditional write: applies `update` only while the accession is still in
   * `expectedStatus` at `expectedVersion`, and bumps the version
   *
   * @throws ConflictError when another writer got there first
   */
  updateStatus(
    id: string,
    expectedStatus: AccessionStatus,
    expectedVersion: number,
    update: AccessionUpdate,
    now?: Date
  ): Promise<Accession>;
  listByStatus(status: AccessionStatus, options?: ListByStatusOptions): Promise<Accession[]>;
  list(filter: AccessionListFilter): Promise<AccessionPage>;
}

/**
 * Build the initial row for a draft
 */
export function newAccession(draft: AccessionDraft, now: Date): Accession {
  const accession: Accession = {
    id: randomUUID(),
    sourceUrl: draft.sourceUrl,
    title: draft.title,
    description: draft.description ?? null,
    metadataLanguage: draft.metadataLanguage ?? 'english',
    metadataDate: draft.metadataDate ?? null,
    browserProfile: draft.browserProfile ?? null,
    isPrivate: draft.isPrivate ?? false,
    subjectIds: [...draft.subjectIds],
    status: 'PENDING',
    crawlJobId: null,
    artifactLocator: null,
    storedArtifactReference: null,
    lastError: null,
    attemptCount: 0,
    nextAttemptAt: now,
    pollingStartedAt: null,
    createdAt: now,
    updatedAt: now,
    version: 0,
  };

  const violations = findInvariantViolations(accession);
  if (violations.length > 0) {
    throw new InvariantViolationError(accession.id, violations);
  }
  return accession;
}

const AccessionRowSchema = z.object({
  id: z.string(),
  source_url: z.string(),
  title: z.string(),
  description: z.string().nullable(),
  metadata_language: z.enum(METADATA_LANGUAGES),
  metadata_date: z.date().nullable(),
  browser_profile: z.enum(BROWSER_PROFILES).nullable(),
  is_private: z.boolean(),
  subject_ids: z.array(z.number().int()),
  status: z.enum(ACCESSION_STATUSES),
  crawl_job_id: z.string().nullable(),
  artifact_locator: z.string().nullable(),
  stored_artifact_reference: z.string().nullable(),
  last_error: z.string().nullable(),
  attempt_count: z.number().int(),
  next_attempt_at: z.date(),
  polling_started_at: z.date().nullable(),
  created_at: z.date(),
  updated_at: z.date(),
  version: z.number().int(),
});

const CountRowSchema = z.object({ total: z.coerce.number().int() });

const COLUMNS = `id, source_url, title, description, metadata_language, metadata_date,
  browser_profile, is_private, subject_ids, status, crawl_job_id, artifact_locator,
  stored_artifact_reference, last_error, attempt_count, next_attempt_at,
  polling_started_at, created_at, updated_at, version`;

export function rowToAccession(value: unknown): Accession {
  const parsed = AccessionRowSchema.safeParse(value);
  if (!parsed.success) {
    throw new Error(`Unexpected accession row: ${parsed.error.message}`);
  }

  const row = parsed.data;
  return {
    id: row.id,
    sourceUrl: row.source_url,
    title: row.title,
    description: row.description,
    metadataLanguage: row.metadata_language,
    metadataDate: row.metadata_date,
    browserProfile: row.browser_profile,
    isPrivate: row.is_private,
    subjectIds: row.subject_ids,
    status: row.status,
    crawlJobId: row.crawl_job_id,
    artifactLocator: row.artifact_locator,
    storedArtifactReference: row.stored_artifact_reference,
    lastError: row.last_error,
    attemptCount: row.attempt_count,
    nextAttemptAt: row.next_attempt_at,
    pollingStartedAt: row.polling_started_at,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    version: row.version,
  };
}

/**
 * Single row of a statement that must return one
 */
function onlyRow(rows: unknown[], id: string): Accession {
  if (rows.length === 0) {
    throw new AccessionNotFoundError(id);
  }
  return rowToAccession(rows[0]);
}

export class PgAccessionsRepo implements AccessionsRepo {
  constructor(private readonly pool: SqlPool = getPool()) {}

  async create(draft: AccessionDraft, now: Date = new Date()): Promise<Accession> {
    const accession = newAccession(draft, now);

    const result = await this.pool.query(
      `INSERT INTO accessions (
         id, source_url, title, description, metadata_language, metadata_date,
         browser_profile, is_private, subject_ids, status, attempt_count,
         next_attempt_at, created_at, updated_at, version
       ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, 'PENDING', 0, $10, $10, $10, 0)
       RETURNING ${COLUMNS}`,
      [
        accession.id,
        accession.sourceUrl,
        accession.title,
        accession.description,
        accession.metadataLanguage,
        accession.metadataDate,
        accession.browserProfile,
        accession.isPrivate,
        accession.subjectIds,
        now,
      ]
    );

    return onlyRow(result.rows, accession.id);
  }

  async getById(id: string): Promise<Accession> {
    const result = await this.pool.query(`SELECT ${COLUMNS} FROM accessions WHERE id = $1`, [id]);
    return onlyRow(result.rows, id);
  }

  async updateStatus(
    id: string,
    expectedStatus: AccessionStatus,
    expectedVersion: number,
    update: AccessionUpdate,
    now: Date = new Date()
  ): Promise<Accession> {
    const client = await this.pool.connect();

    try {
      await client.query('BEGIN');

      const current = await client.query(
        `SELECT ${COLUMNS} FROM accessions WHERE id = $1 FOR UPDATE`,
        [id]
      );
      const before = onlyRow(current.rows, id);
      if (before.status !== expectedStatus || before.version !== expectedVersion) {
        throw new ConflictError(id, expectedStatus, before.status, expectedVersion, before.version);
      }

      const after = applyUpdate(before, update, now);
      const violations = findUpdateViolations(before, after);
      if (violations.length > 0) {
        throw new InvariantViolationError(id, violations);
      }

      const result = await client.query(
        `UPDATE accessions SET
           status = $4,
           crawl_job_id = $5,
           artifact_locator = $6,
           stored_artifact_reference = $7,
           last_error = $8,
           attempt_count = $9,
           next_attempt_at = $10,
           polling_started_at = $11,
           updated_at = $12,
           version = version + 1
         WHERE id = $1 AND status = $2 AND version = $3
         RETURNING ${COLUMNS}`,
        [
          id,
          expectedStatus,
          expectedVersion,
          after.status,
          after.crawlJobId,
          after.artifactLocator,
          after.storedArtifactReference,
          after.lastError,
          after.attemptCount,
          after.nextAttemptAt,
          after.pollingStartedAt,
          now,
        ]
      );

      const updated = onlyRow(result.rows, id);
      await client.query('COMMIT');
      return updated;
    } catch (error) {
      await client.query('ROLLBACK').catch((rollbackError: unknown) => {
        getLogger().error(
          { err: rollbackError, accessionId: id },
          'Failed to roll back accession write'
        );
      });
      throw error;
    } finally {
      client.release();
    }
  }

  async listByStatus(
    status: AccessionStatus,
    options: ListByStatusOptions = {}
  ): Promise<Accession[]> {
    const params: unknown[] = [status];
    let sql = `SELECT ${COLUMNS} FROM accessions WHERE status = $1`;

    if (options.dueBefore) {
      params.push(options.dueBefore);
      sql += ` AND next_attempt_at <= $${params.length}`;
    }
    sql += ' ORDER BY next_attempt_at ASC, created_at ASC';
    if (options.limit !== undefined) {
      params.push(options.limit);
      sql += ` LIMIT $${params.length}`;
    }

    const result = await this.pool.query(sql, params);
    return result.rows.map(rowToAccession);
  }

  async list(filter: AccessionListFilter): Promise<AccessionPage> {
    const conditions: string[] = [];
    const params: unknown[] = [];

    if (filter.metadataLanguage) {
      params.push(filter.metadataLanguage);
      conditions.push(`metadata_language = $${params.length}`);
    }
    if (filter.status) {
      params.push(filter.status);
      conditions.push(`status = $${params.length}`);
    }
    if (filter.subjectIds && filter.subjectIds.length > 0) {
      params.push(filter.subjectIds);
      // && overlaps (any of), @> contains (all of)
      const operator = filter.subjectMatch === 'all' ? '@>' : '&&';
      conditions.push(`subject_ids ${operator} $${params.length}::integer[]`);
    }
    if (filter.query) {
      params.push(`%${filter.query}%`);
      const n = params.length;
      conditions.push(
        `(title ILIKE $${n} OR description ILIKE $${n} OR source_url ILIKE $${n})`
      );
    }
    if (filter.createdFrom) {
      params.push(filter.createdFrom);
      conditions.push(`created_at >= $${params.length}`);
    }
    if (filter.createdTo) {
      params.push(filter.createdTo);
      conditions.push(`created_at <= $${params.length}`);
    }
    if (filter.isPrivate !== undefined) {
      params.push(filter.isPrivate);
      conditions.push(`is_private = $${params.length}`);
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';

    const countResult = await this.pool.query(
      `SELECT COUNT(*) AS total FROM accessions ${where}`,
      params
    );

    const pageParams = [...params, filter.limit, filter.offset];
    const rowsResult = await this.pool.query(
      `SELECT ${COLUMNS} FROM accessions ${where}
       ORDER BY created_at DESC, id ASC
       LIMIT $${pageParams.length - 1} OFFSET $${pageParams.length}`,
      pageParams
    );

    return {
      items: rowsResult.rows.map(rowToAccession),
      total: CountRowSchema.parse(countResult.rows[0]).total,
    };
  }
}
