import { describe, expect, it } from 'vitest';
import type { SqlPool } from '../src/lib/db.js';
import { AccessionNotFoundError, ConflictError } from '../src/lib/errors.js';
import { PgAccessionsRepo, rowToAccession } from '../src/repos/accessionsRepo.js';
import { PgSubjectsLookup } from '../src/repos/subjectsRepo.js';
import { START } from './helpers.js';

const LATER = new Date('2026-01-01T00:05:00.000Z');

interface Statement {
  text: string;
  values: unknown[];
}

/**
 * Pool and client in one: records every statement and answers with the responder's rows
 */
class RecordingPool implements SqlPool {
  readonly statements: Statement[] = [];
  released = 0;

  constructor(
    private readonly respond: (text: string, values: unknown[]) => unknown[] = () => []
  ) {}

  async query(text: string, values: unknown[] = []): Promise<{ rows: unknown[] }> {
    this.statements.push({ text, values });
    return { rows: this.respond(text, values) };
  }

  async connect(): Promise<RecordingPool> {
    return this;
  }

  release(): void {
    this.released += 1;
  }

  /** First keyword of each statement */
  get verbs(): string[] {
    return this.statements.map((statement) => statement.text.trim().split(/\s+/)[0]);
  }
}

function row(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    id: 'a1',
    source_url: 'https://example.org/page',
    title: 'Example',
    description: null,
    metadata_language: 'english',
    metadata_date: null,
    browser_profile: null,
    is_private: false,
    subject_ids: [],
    status: 'PENDING',
    crawl_job_id: null,
    artifact_locator: null,
    stored_artifact_reference: null,
    last_error: null,
    attempt_count: 0,
    next_attempt_at: START,
    polling_started_at: null,
    created_at: START,
    updated_at: START,
    version: 0,
    ...overrides,
  };
}

describe('PgAccessionsRepo', () => {
  describe('create', () => {
    it('inserts a PENDING row at version 0', async () => {
      const pool = new RecordingPool((_text, values) => [row({ id: values[0], title: values[2] })]);

      const created = await new PgAccessionsRepo(pool).create(
        { sourceUrl: 'https://example.org/page', title: 'Example', subjectIds: [2] },
        START
      );

      const [insert] = pool.statements;
      expect(insert.text).toContain(
        "VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, 'PENDING', 0, $10, $10, $10, 0)"
      );
      expect(insert.values.slice(1)).toEqual([
        'https://example.org/page',
        'Example',
        null,
        'english',
        null,
        null,
        false,
        [2],
        START,
      ]);
      expect(created.id).toBe(insert.values[0]);
      expect(created.version).toBe(0);
    });
  });

  describe('updateStatus', () => {
    it('locks the row, writes from the expected status and version, and commits', async () => {
      const pool = new RecordingPool((text) => {
        if (text.includes('FOR UPDATE')) {
          return [row({ version: 3 })];
        }
        if (text.startsWith('UPDATE')) {
          return [
            row({ status: 'SUBMITTED', crawl_job_id: 'job-1', updated_at: LATER, version: 4 }),
          ];
        }
        return [];
      });

      const updated = await new PgAccessionsRepo(pool).updateStatus(
        'a1',
        'PENDING',
        3,
        { status: 'SUBMITTED', crawlJobId: 'job-1' },
        LATER
      );

      expect(pool.verbs).toEqual(['BEGIN', 'SELECT', 'UPDATE', 'COMMIT']);
      const update = pool.statements[2];
      expect(update.text).toContain('version = version + 1');
      expect(update.text).toContain('WHERE id = $1 AND status = $2 AND version = $3');
      expect(update.values).toEqual([
        'a1',
        'PENDING',
        3,
        'SUBMITTED',
        'job-1',
        null,
        null,
        null,
        0,
        START,
        null,
        LATER,
      ]);
      expect(updated).toMatchObject({ status: 'SUBMITTED', crawlJobId: 'job-1', version: 4 });
      expect(pool.released).toBe(1);
    });

    it('rolls back when another writer bumped the version', async () => {
      const pool = new RecordingPool((text) =>
        text.includes('FOR UPDATE') ? [row({ version: 4 })] : []
      );

      await expect(
        new PgAccessionsRepo(pool).updateStatus('a1', 'PENDING', 3, {
          status: 'PENDING',
          lastError: 'late',
        })
      ).rejects.toThrow('Accession a1 is at version 4, expected 3');

      expect(pool.verbs).toEqual(['BEGIN', 'SELECT', 'ROLLBACK']);
      expect(pool.released).toBe(1);
    });

    it('rolls back when the accession does not exist', async () => {
      const pool = new RecordingPool();

      await expect(
        new PgAccessionsRepo(pool).updateStatus('missing', 'PENDING', 0, { status: 'FAILED' })
      ).rejects.toBeInstanceOf(AccessionNotFoundError);

      expect(pool.verbs).toEqual(['BEGIN', 'SELECT', 'ROLLBACK']);
      expect(pool.released).toBe(1);
    });

    it('surfaces the original error when the rollback fails too', async () => {
      const pool = new RecordingPool((text) => {
        if (text === 'ROLLBACK') {
          throw new Error('connection lost');
        }
        return text.includes('FOR UPDATE')
          ? [row({ status: 'POLLING', crawl_job_id: 'job-1' })]
          : [];
      });

      const error = await new PgAccessionsRepo(pool)
        .updateStatus('a1', 'PENDING', 0, { status: 'SUBMITTED', crawlJobId: 'job-2' })
        .catch((rejection: unknown) => rejection);

      expect(error).toBeInstanceOf(ConflictError);
      expect(error).toHaveProperty('message', 'Accession a1 is POLLING, expected PENDING');
      expect(pool.verbs).toEqual(['BEGIN', 'SELECT', 'ROLLBACK']);
      expect(pool.released).toBe(1);
    });
  });

  describe('listByStatus', () => {
    it('numbers the due and limit placeholders after the status', async () => {
      const pool = new RecordingPool(() => [row()]);

      const due = await new PgAccessionsRepo(pool).listByStatus('PENDING', {
        dueBefore: LATER,
        limit: 10,
      });

      const [select] = pool.statements;
      expect(select.text).toContain(
        'WHERE status = $1 AND next_attempt_at <= $2 ORDER BY next_attempt_at ASC, created_at ASC LIMIT $3'
      );
      expect(select.values).toEqual(['PENDING', LATER, 10]);
      expect(due.map((accession) => accession.id)).toEqual(['a1']);
    });
  });

  describe('list', () => {
    it('builds every filter in order and pages after them', async () => {
      const pool = new RecordingPool((text) =>
        text.startsWith('SELECT COUNT')
          ? [{ total: '42' }]
          : [row({ id: 'a7', status: 'POLLING', crawl_job_id: 'job-1', subject_ids: [1, 2] })]
      );

      const page = await new PgAccessionsRepo(pool).list({
        metadataLanguage: 'arabic',
        status: 'POLLING',
        subjectIds: [1, 2],
        subjectMatch: 'all',
        query: 'vote',
        createdFrom: START,
        isPrivate: false,
        limit: 10,
        offset: 20,
      });

      const [count, select] = pool.statements;
      expect(count.text).toBe(
        'SELECT COUNT(*) AS total FROM accessions WHERE metadata_language = $1 AND status = $2' +
          ' AND subject_ids @> $3::integer[]' +
          ' AND (title ILIKE $4 OR description ILIKE $4 OR source_url ILIKE $4)' +
          ' AND created_at >= $5 AND is_private = $6'
      );
      expect(count.values).toEqual(['arabic', 'POLLING', [1, 2], '%vote%', START, false]);
      expect(select.text).toContain('ORDER BY created_at DESC, id ASC');
      expect(select.text).toContain('LIMIT $7 OFFSET $8');
      expect(select.values).toEqual(['arabic', 'POLLING', [1, 2], '%vote%', START, false, 10, 20]);

      expect(page.total).toBe(42);
      expect(page.items.map((accession) => accession.id)).toEqual(['a7']);
      expect(page.items[0].subjectIds).toEqual([1, 2]);
    });

    it('matches any subject with the overlap operator', async () => {
      const pool = new RecordingPool((text) =>
        text.startsWith('SELECT COUNT') ? [{ total: 0 }] : []
      );

      const page = await new PgAccessionsRepo(pool).list({ subjectIds: [3], limit: 5, offset: 0 });

      const [count, select] = pool.statements;
      expect(count.text).toBe(
        'SELECT COUNT(*) AS total FROM accessions WHERE subject_ids && $1::integer[]'
      );
      expect(select.text).toContain('LIMIT $2 OFFSET $3');
      expect(select.values).toEqual([[3], 5, 0]);
      expect(page).toEqual({ items: [], total: 0 });
    });
  });

  describe('rowToAccession', () => {
    it('refuses a row with an unknown status', () => {
      expect(() => rowToAccession(row({ status: 'ARCHIVED' }))).toThrow('Unexpected accession row');
    });
  });
});

describe('PgSubjectsLookup', () => {
  it('reports the ids the table does not have', async () => {
    const pool = new RecordingPool(() => [{ id: 1 }, { id: 3 }]);

    expect(await new PgSubjectsLookup(pool).findMissing([1, 2, 3])).toEqual([2]);
    expect(pool.statements).toEqual([
      { text: 'SELECT id FROM subjects WHERE id = ANY($1::integer[])', values: [[1, 2, 3]] },
    ]);
  });

  it('skips the query for an empty list', async () => {
    const pool = new RecordingPool();

    expect(await new PgSubjectsLookup(pool).findMissing([])).toEqual([]);
    expect(pool.statements).toEqual([]);
  });
});
