/**
 * Accession model
 *
 * An accession is one piece of web content registered for archiving, together with
 * the lifecycle status the ingestion pipeline moves it through.
 */

export const ACCESSION_STATUSES = [
  'PENDING',
  'SUBMITTED',
  'POLLING',
  'ARTIFACT_FETCHING',
  'STORING_ARTIFACT',
  'COMPLETED',
  'FAILED',
] as const;

export type AccessionStatus = (typeof ACCESSION_STATUSES)[number];

export const METADATA_LANGUAGES = ['english', 'arabic'] as const;
export type MetadataLanguage = (typeof METADATA_LANGUAGES)[number];

export const BROWSER_PROFILES = ['facebook'] as const;
export type BrowserProfile = (typeof BROWSER_PROFILES)[number];

export interface Accession {
  id: string;
  sourceUrl: string;
  title: string;
  description: string | null;
  metadataLanguage: MetadataLanguage;
  metadataDate: Date | null;
  browserProfile: BrowserProfile | null;
  isPrivate: boolean;
  subjectIds: number[];
  status: AccessionStatus;
  crawlJobId: string | null;
  artifactLocator: string | null;
  storedArtifactReference: string | null;
  lastError: string | null;
  attemptCount: number;
  nextAttemptAt: Date;
  pollingStartedAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
  /** Bumped by every write; conditional writes compare it */
  version: number;
}

/**
 * Caller-supplied fields for a new accession. Lifecycle fields are always
 * initialised by the repository; a status on the draft is ignored.
 */
export interface AccessionDraft {
  sourceUrl: string;
  title: string;
  description?: string | null;
  metadataLanguage?: MetadataLanguage;
  metadataDate?: Date | null;
  browserProfile?: BrowserProfile | null;
  isPrivate?: boolean;
  subjectIds: number[];
  status?: AccessionStatus;
}

/**
 * Lifecycle fields the orchestrator may change alongside a status transition
 */
export interface AccessionUpdate {
  status: AccessionStatus;
  crawlJobId?: string | null;
  artifactLocator?: string | null;
  storedArtifactReference?: string | null;
  lastError?: string | null;
  attemptCount?: number;
  nextAttemptAt?: Date;
  pollingStartedAt?: Date | null;
}

export const VALID_TRANSITIONS: Record<AccessionStatus, readonly AccessionStatus[]> = {
  PENDING: ['PENDING', 'SUBMITTED', 'FAILED'],
  SUBMITTED: ['POLLING', 'FAILED'],
  POLLING: ['POLLING', 'ARTIFACT_FETCHING', 'FAILED'],
  ARTIFACT_FETCHING: ['ARTIFACT_FETCHING', 'STORING_ARTIFACT', 'FAILED'],
  STORING_ARTIFACT: ['STORING_ARTIFACT', 'COMPLETED', 'FAILED'],
  COMPLETED: [],
  FAILED: [],
};

/**
 * Statuses the scheduler picks up again after a restart
 */
export const RESUMABLE_STATUSES: readonly AccessionStatus[] = [
  'PENDING',
  'SUBMITTED',
  'POLLING',
  'ARTIFACT_FETCHING',
  'STORING_ARTIFACT',
];

const JOB_ID_REQUIRED: readonly AccessionStatus[] = [
  'SUBMITTED',
  'POLLING',
  'ARTIFACT_FETCHING',
  'STORING_ARTIFACT',
  'COMPLETED',
];

const LOCATOR_REQUIRED: readonly AccessionStatus[] = [
  'ARTIFACT_FETCHING',
  'STORING_ARTIFACT',
  'COMPLETED',
];

export function isTerminalStatus(status: AccessionStatus): boolean {
  return status === 'COMPLETED' || status === 'FAILED';
}

export function canTransition(from: AccessionStatus, to: AccessionStatus): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

/**
 * Deterministic object key for an accession's archive; re-uploads overwrite
 * the same object instead of creating a new one.
 */
export function artifactKeyFor(accessionId: string): string {
  return `accessions/${accessionId}/archive.wacz`;
}

/**
 * List every invariant the accession breaks (empty when consistent)
 */
export function findInvariantViolations(accession: Accession): string[] {
  const violations: string[] = [];
  const { status } = accession;

  if (status === 'COMPLETED' && accession.storedArtifactReference === null) {
    violations.push('COMPLETED accession has no stored artifact reference');
  }
  if (status !== 'COMPLETED' && accession.storedArtifactReference !== null) {
    violations.push(`${status} accession has a stored artifact reference`);
  }
  if (status === 'PENDING' && accession.crawlJobId !== null) {
    violations.push('PENDING accession has a crawl job id');
  }
  if (JOB_ID_REQUIRED.includes(status) && accession.crawlJobId === null) {
    violations.push(`${status} accession has no crawl job id`);
  }
  if (LOCATOR_REQUIRED.includes(status) && accession.artifactLocator === null) {
    violations.push(`${status} accession has no artifact locator`);
  }
  if (status === 'FAILED' && accession.lastError === null) {
    violations.push('FAILED accession has no failure reason');
  }
  if (accession.attemptCount < 0) {
    violations.push('attempt count is negative');
  }

  return violations;
}

/**
 * Apply a lifecycle update on top of the current row. Fields left undefined keep their value.
 */
export function applyUpdate(current: Accession, update: AccessionUpdate, now: Date): Accession {
  return {
    ...current,
    status: update.status,
    crawlJobId: update.crawlJobId !== undefined ? update.crawlJobId : current.crawlJobId,
    artifactLocator:
      update.artifactLocator !== undefined ? update.artifactLocator : current.artifactLocator,
    storedArtifactReference:
      update.storedArtifactReference !== undefined
        ? update.storedArtifactReference
        : current.storedArtifactReference,
    lastError: update.lastError !== undefined ? update.lastError : current.lastError,
    attemptCount: update.attemptCount ?? current.attemptCount,
    nextAttemptAt: update.nextAttemptAt ?? current.nextAttemptAt,
    pollingStartedAt:
      update.pollingStartedAt !== undefined ? update.pollingStartedAt : current.pollingStartedAt,
    updatedAt: now,
    version: current.version + 1,
  };
}

/**
 * Violations introduced by moving from `current` to `next`
 */
export function findUpdateViolations(current: Accession, next: Accession): string[] {
  const violations = findInvariantViolations(next);

  if (!canTransition(current.status, next.status)) {
    violations.push(`transition ${current.status} -> ${next.status} is not allowed`);
  }
  if (next.attemptCount < current.attemptCount) {
    violations.push('attempt count decreased');
  }

  return violations;
}
