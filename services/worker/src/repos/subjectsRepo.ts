import { z } from 'zod';
import { getPool, type SqlPool } from '../lib/db.js';

const SubjectIdRowSchema = z.object({ id: z.number().int() });

/**
 * Read-only view of the subject tags managed outside the pipeline
 */
export interface SubjectsLookup {
  /** Ids from `ids` that do not exist */
  findMissing(ids: number[]): Promise<number[]>;
}

export class PgSubjectsLookup implements SubjectsLookup {
  constructor(private readonly pool: SqlPool = getPool()) {}

  async findMissing(ids: number[]): Promise<number[]> {
    if (ids.length === 0) {
      return [];
    }

    const result = await this.pool.query(
      'SELECT id FROM subjects WHERE id = ANY($1::integer[])',
      [ids]
    );
    const found = new Set(result.rows.map((row) => SubjectIdRowSchema.parse(row).id));
    return ids.filter((id) => !found.has(id));
  }
}

export class MemorySubjectsLookup implements SubjectsLookup {
  private readonly ids: Set<number>;

  constructor(subjects: Array<{ id: number; label: string }> = []) {
    this.ids = new Set(subjects.map((subject) => subject.id));
  }

  async findMissing(ids: number[]): Promise<number[]> {
    return ids.filter((id) => !this.ids.has(id));
  }
}
