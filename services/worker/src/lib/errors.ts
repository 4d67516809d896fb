/**
 * Error taxonomy for the ingestion pipeline
 *
 * External collaborators (crawl service, object store) raise either a transient
 * or a permanent error; the orchestrator only retries the transient kind.
 */

import type { ZodIssue } from 'zod';

export abstract class ArchiveError extends Error {
  abstract readonly code: string;
}

/**
 * Network failure, timeout or 5xx/429 from an external service. Retry eligible.
 */
export class TransientExternalError extends ArchiveError {
  readonly code = 'TRANSIENT_EXTERNAL';

  constructor(
    public readonly service: string,
    message: string,
    public readonly statusCode?: number
  ) {
    super(`${service}: ${message}`);
    this.name = 'TransientExternalError';
  }
}

/**
 * Request rejected by an external service (4xx, malformed response, missing artifact).
 */
export class PermanentExternalError extends ArchiveError {
  readonly code = 'PERMANENT_EXTERNAL';

  constructor(
    public readonly service: string,
    message: string,
    public readonly statusCode?: number
  ) {
    super(`${service}: ${message}`);
    this.name = 'PermanentExternalError';
  }
}

/**
 * Conditional write found the accession in a different status, or already
 * rewritten by another writer since the caller read it
 */
export class ConflictError extends ArchiveError {
  readonly code = 'CONFLICT';

  constructor(
    public readonly accessionId: string,
    public readonly expectedStatus: string,
    public readonly actualStatus: string,
    public readonly expectedVersion?: number,
    public readonly actualVersion?: number
  ) {
    super(
      actualStatus !== expectedStatus
        ? `Accession ${accessionId} is ${actualStatus}, expected ${expectedStatus}`
        : `Accession ${accessionId} is at version ${actualVersion}, expected ${expectedVersion}`
    );
    this.name = 'ConflictError';
  }
}

function formatWait(waitedMs: number): string {
  const minutes = Math.round(waitedMs / 60_000);
  if (minutes >= 1) {
    return `${minutes} ${minutes === 1 ? 'minute' : 'minutes'}`;
  }
  const seconds = Math.round(waitedMs / 1_000);
  return `${seconds} ${seconds === 1 ? 'second' : 'seconds'}`;
}

export class CrawlTimeoutError extends ArchiveError {
  readonly code = 'CRAWL_TIMEOUT';

  constructor(public readonly waitedMs: number) {
    super(`crawl timed out after ${formatWait(waitedMs)}`);
    this.name = 'CrawlTimeoutError';
  }
}

export class AccessionNotFoundError extends ArchiveError {
  readonly code = 'NOT_FOUND';

  constructor(public readonly accessionId: string) {
    super(`Accession not found: ${accessionId}`);
    this.name = 'AccessionNotFoundError';
  }
}

export class ArtifactNotFoundError extends ArchiveError {
  readonly code = 'NOT_FOUND';

  constructor(public readonly key: string) {
    super(`Artifact not found: ${key}`);
    this.name = 'ArtifactNotFoundError';
  }
}

export class ValidationError extends ArchiveError {
  readonly code = 'VALIDATION_ERROR';

  constructor(public readonly issues: ZodIssue[]) {
    super(
      `Validation error: ${issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ')}`
    );
    this.name = 'ValidationError';
  }
}

export class UnknownSubjectsError extends ArchiveError {
  readonly code = 'UNKNOWN_SUBJECTS';

  constructor(public readonly subjectIds: number[]) {
    super(`Unknown subject ids: ${subjectIds.join(', ')}`);
    this.name = 'UnknownSubjectsError';
  }
}

/**
 * A write would leave an accession in a state that breaks its field/status invariants
 */
export class InvariantViolationError extends ArchiveError {
  readonly code = 'INVARIANT_VIOLATION';

  constructor(
    public readonly accessionId: string,
    public readonly violations: string[]
  ) {
    super(`Accession ${accessionId} violates invariants: ${violations.join('; ')}`);
    this.name = 'InvariantViolationError';
  }
}

export function isRetryable(error: unknown): boolean {
  return error instanceof TransientExternalError;
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
