/**
 * In-process accession repository
 *
 * Same conditional-write semantics as the Postgres repository: a write lands only
 * while the row still has the status and version the caller read. Rows are copied
 * on the way in and out so callers never hold a reference into the store.
 */

import {
  applyUpdate,
  findUpdateViolations,
  type Accession,
  type AccessionDraft,
  type AccessionStatus,
  type AccessionUpdate,
} from '../lib/accession.js';
import {
  AccessionNotFoundError,
  ConflictError,
  InvariantViolationError,
} from '../lib/errors.js';
import {
  newAccession,
  type AccessionListFilter,
  type AccessionPage,
  type AccessionsRepo,
  type ListByStatusOptions,
} from './accessionsRepo.js';

function copyAccession(accession: Accession): Accession {
  return {
    ...accession,
    subjectIds: [...accession.subjectIds],
    metadataDate: accession.metadataDate ? new Date(accession.metadataDate) : null,
    nextAttemptAt: new Date(accession.nextAttemptAt),
    pollingStartedAt: accession.pollingStartedAt ? new Date(accession.pollingStartedAt) : null,
    createdAt: new Date(accession.createdAt),
    updatedAt: new Date(accession.updatedAt),
  };
}

function matchesFilter(accession: Accession, filter: AccessionListFilter): boolean {
  if (filter.metadataLanguage && accession.metadataLanguage !== filter.metadataLanguage) {
    return false;
  }
  if (filter.status && accession.status !== filter.status) {
    return false;
  }
  if (filter.subjectIds && filter.subjectIds.length > 0) {
    const wanted = filter.subjectIds;
    const matches =
      filter.subjectMatch === 'all'
        ? wanted.every((id) => accession.subjectIds.includes(id))
        : wanted.some((id) => accession.subjectIds.includes(id));
    if (!matches) {
      return false;
    }
  }
  if (filter.query) {
    const needle = filter.query.toLowerCase();
    const haystacks = [accession.title, accession.description ?? '', accession.sourceUrl];
    if (!haystacks.some((value) => value.toLowerCase().includes(needle))) {
      return false;
    }
  }
  if (filter.createdFrom && accession.createdAt < filter.createdFrom) {
    return false;
  }
  if (filter.createdTo && accession.createdAt > filter.createdTo) {
    return false;
  }
  if (filter.isPrivate !== undefined && accession.isPrivate !== filter.isPrivate) {
    return false;
  }
  return true;
}

export class MemoryAccessionsRepo implements AccessionsRepo {
  private readonly rows = new Map<string, Accession>();

  async create(draft: AccessionDraft, now: Date = new Date()): Promise<Accession> {
    const accession = newAccession(draft, now);
    this.rows.set(accession.id, accession);
    return copyAccession(accession);
  }

  async getById(id: string): Promise<Accession> {
    const row = this.rows.get(id);
    if (!row) {
      throw new AccessionNotFoundError(id);
    }
    return copyAccession(row);
  }

  async updateStatus(
    id: string,
    expectedStatus: AccessionStatus,
    expectedVersion: number,
    update: AccessionUpdate,
    now: Date = new Date()
  ): Promise<Accession> {
    const before = this.rows.get(id);
    if (!before) {
      throw new AccessionNotFoundError(id);
    }
    if (before.status !== expectedStatus || before.version !== expectedVersion) {
      throw new ConflictError(id, expectedStatus, before.status, expectedVersion, before.version);
    }

    const after = applyUpdate(before, update, now);
    const violations = findUpdateViolations(before, after);
    if (violations.length > 0) {
      throw new InvariantViolationError(id, violations);
    }

    this.rows.set(id, after);
    return copyAccession(after);
  }

  async listByStatus(
    status: AccessionStatus,
    options: ListByStatusOptions = {}
  ): Promise<Accession[]> {
    const { dueBefore, limit } = options;
    const matching = [...this.rows.values()]
      .filter((row) => row.status === status)
      .filter((row) => !dueBefore || row.nextAttemptAt.getTime() <= dueBefore.getTime())
      .sort(
        (a, b) =>
          a.nextAttemptAt.getTime() - b.nextAttemptAt.getTime() ||
          a.createdAt.getTime() - b.createdAt.getTime()
      );

    return (limit !== undefined ? matching.slice(0, limit) : matching).map(copyAccession);
  }

  async list(filter: AccessionListFilter): Promise<AccessionPage> {
    const matching = [...this.rows.values()]
      .filter((row) => matchesFilter(row, filter))
      .sort(
        (a, b) =>
          b.createdAt.getTime() - a.createdAt.getTime() || a.id.localeCompare(b.id)
      );

    return {
      items: matching.slice(filter.offset, filter.offset + filter.limit).map(copyAccession),
      total: matching.length,
    };
  }

  /** Number of stored accessions */
  get size(): number {
    return this.rows.size;
  }
}
