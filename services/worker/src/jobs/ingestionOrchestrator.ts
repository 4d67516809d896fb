/**
 * Ingestion Orchestrator
 *
 * Moves one accession one step through its lifecycle:
 *
 *   PENDING -> SUBMITTED -> POLLING -> ARTIFACT_FETCHING -> STORING_ARTIFACT -> COMPLETED
 *
 * with FAILED reachable from every non-terminal status. The orchestrator keeps no
 * state of its own: everything it needs to resume (job id, artifact locator, polling
 * start, attempt count) is on the accession row, and every write is conditioned on
 * the status and version the step started from.
 *
 * Before each external call the step claims the accession: a same-status write that
 * pushes nextAttemptAt past the lease. A pass that loses the claim makes no call.
 */

import {
  artifactKeyFor,
  type Accession,
  type AccessionStatus,
  type AccessionUpdate,
} from '../lib/accession.js';
import type { CrawlJobStatus, CrawlServiceClient } from '../lib/crawlService.js';
import {
  ConflictError,
  CrawlTimeoutError,
  InvariantViolationError,
  PermanentExternalError,
  errorMessage,
  isRetryable,
} from '../lib/errors.js';
import { getLogger, type Logger } from '../lib/logger.js';
import { WACZ_CONTENT_TYPE, type ArtifactStore } from '../lib/objectStore.js';
import {
  DEFAULT_LEASE_MS,
  DEFAULT_POLLING_POLICY,
  DEFAULT_RETRY_POLICY,
  getNextAttemptAt,
  hasExceededWait,
  isExhausted,
  type PollingPolicy,
  type RetryPolicy,
} from '../lib/retryPolicy.js';
import type { AccessionsRepo } from '../repos/accessionsRepo.js';

export type StepOutcome =
  | 'advanced'
  | 'waiting'
  | 'retry_scheduled'
  | 'failed'
  | 'conflict'
  | 'skipped';

export interface IngestionOrchestratorDeps {
  repo: AccessionsRepo;
  crawler: CrawlServiceClient;
  store: ArtifactStore;
  retryPolicy?: RetryPolicy;
  pollingPolicy?: PollingPolicy;
  /** How far a claim pushes nextAttemptAt */
  leaseMs?: number;
  clock?: () => Date;
  logger?: Logger;
}

interface FailureReasons {
  /** Error may be retried under the attempt ceiling */
  retryable: boolean;
  rejected: (message: string) => string;
  exhausted: (attempts: number) => string;
}

export class IngestionOrchestrator {
  private readonly repo: AccessionsRepo;
  private readonly crawler: CrawlServiceClient;
  private readonly store: ArtifactStore;
  private readonly retryPolicy: RetryPolicy;
  private readonly pollingPolicy: PollingPolicy;
  private readonly leaseMs: number;
  private readonly clock: () => Date;
  private readonly logger: Logger;

  constructor(deps: IngestionOrchestratorDeps) {
    this.repo = deps.repo;
    this.crawler = deps.crawler;
    this.store = deps.store;
    this.retryPolicy = deps.retryPolicy ?? DEFAULT_RETRY_POLICY;
    this.pollingPolicy = deps.pollingPolicy ?? DEFAULT_POLLING_POLICY;
    this.leaseMs = deps.leaseMs ?? DEFAULT_LEASE_MS;
    this.clock = deps.clock ?? (() => new Date());
    this.logger = deps.logger ?? getLogger();
  }

  /**
   * Run the next step for the accession's current status
   */
  async advance(accession: Accession): Promise<StepOutcome> {
    switch (accession.status) {
      case 'PENDING':
        return this.submit(accession);
      case 'SUBMITTED':
        return this.resumeSubmitted(accession);
      case 'POLLING':
        return this.poll(accession);
      case 'ARTIFACT_FETCHING':
        return this.fetchArtifact(accession);
      case 'STORING_ARTIFACT':
        return this.resumeStoring(accession);
      case 'COMPLETED':
      case 'FAILED':
        return 'skipped';
    }
  }

  /**
   * Start a crawl for a PENDING accession and move it to POLLING
   */
  async submit(accession: Accession): Promise<StepOutcome> {
    if (accession.status !== 'PENDING') {
      return this.skip(accession, 'PENDING');
    }

    return this.guard(accession, async () => {
      const claimed = await this.claim(accession);

      let jobId: string;
      try {
        jobId = await this.crawler.submitJob({
          url: claimed.sourceUrl,
          browserProfile: claimed.browserProfile,
        });
      } catch (error) {
        return this.recordFailure(claimed, error, {
          retryable: isRetryable(error),
          rejected: (message) => `crawl submission rejected: ${message}`,
          exhausted: (attempts) => `crawl submission exhausted after ${attempts} attempts`,
        });
      }

      const submitted = await this.write(claimed, {
        status: 'SUBMITTED',
        crawlJobId: jobId,
        lastError: null,
      });

      return this.startPolling(submitted);
    });
  }

  /**
   * Finish a submission interrupted between its two writes
   */
  async resumeSubmitted(accession: Accession): Promise<StepOutcome> {
    if (accession.status !== 'SUBMITTED') {
      return this.skip(accession, 'SUBMITTED');
    }
    return this.guard(accession, () => this.startPolling(accession));
  }

  /**
   * Check the crawl once. Running crawls are re-polled after the poll interval
   * until the maximum wait runs out.
   */
  async poll(accession: Accession): Promise<StepOutcome> {
    if (accession.status !== 'POLLING') {
      return this.skip(accession, 'POLLING');
    }

    return this.guard(accession, async () => {
      const jobId = requireField(accession, 'crawlJobId', accession.crawlJobId);
      const now = this.clock();
      const pollingStartedAt = accession.pollingStartedAt ?? accession.updatedAt;
      const timedOut = hasExceededWait(this.pollingPolicy, pollingStartedAt, now);
      const claimed = await this.claim(accession);

      let crawlStatus: CrawlJobStatus;
      try {
        crawlStatus = await this.crawler.getStatus(jobId);
      } catch (error) {
        if (!isRetryable(error)) {
          return this.fail(claimed, `crawl status check rejected: ${errorMessage(error)}`, error);
        }
        if (timedOut) {
          return this.fail(claimed, this.timeoutReason(), error);
        }

        this.logger.warn(
          { err: error, accessionId: claimed.id, jobId },
          'Crawl status check failed, will poll again'
        );
        await this.write(claimed, {
          status: 'POLLING',
          lastError: errorMessage(error),
          nextAttemptAt: new Date(now.getTime() + this.pollingPolicy.pollIntervalMs),
        });
        return 'waiting';
      }

      switch (crawlStatus.state) {
        case 'succeeded':
          await this.write(claimed, {
            status: 'ARTIFACT_FETCHING',
            artifactLocator: crawlStatus.artifactLocator,
            lastError: null,
            nextAttemptAt: now,
          });
          return 'advanced';

        case 'failed':
          return this.fail(claimed, `crawl service reported failure: ${crawlStatus.reason}`);

        case 'running':
          if (timedOut) {
            return this.fail(claimed, this.timeoutReason());
          }
          this.logger.debug(
            { accessionId: claimed.id, jobId, remoteState: crawlStatus.remoteState },
            'Crawl still running'
          );
          await this.write(claimed, {
            status: 'POLLING',
            lastError: null,
            nextAttemptAt: new Date(now.getTime() + this.pollingPolicy.pollIntervalMs),
          });
          return 'waiting';
      }
    });
  }

  /**
   * Download the finished crawl's archive and store it
   */
  async fetchArtifact(accession: Accession): Promise<StepOutcome> {
    if (accession.status !== 'ARTIFACT_FETCHING') {
      return this.skip(accession, 'ARTIFACT_FETCHING');
    }
    return this.guard(accession, () => this.downloadAndStore(accession));
  }

  /**
   * Upload the archive under the accession's deterministic key and complete it.
   * Accepts ARTIFACT_FETCHING (entering STORING_ARTIFACT first) or STORING_ARTIFACT.
   */
  async storeArtifact(accession: Accession, bytes: Buffer): Promise<StepOutcome> {
    if (accession.status !== 'ARTIFACT_FETCHING' && accession.status !== 'STORING_ARTIFACT') {
      return this.skip(accession, 'STORING_ARTIFACT');
    }

    return this.guard(accession, async () => {
      const claimed = await this.claim(accession);
      return this.storeClaimed(claimed, bytes);
    });
  }

  /**
   * Re-drive an upload interrupted by a restart or a retryable storage error.
   * The bytes are fetched again from the crawl service.
   */
  async resumeStoring(accession: Accession): Promise<StepOutcome> {
    if (accession.status !== 'STORING_ARTIFACT') {
      return this.skip(accession, 'STORING_ARTIFACT');
    }
    return this.guard(accession, () => this.downloadAndStore(accession));
  }

  private async downloadAndStore(accession: Accession): Promise<StepOutcome> {
    const claimed = await this.claim(accession);
    const bytes = await this.downloadArtifact(claimed);
    if (typeof bytes === 'string') {
      return bytes;
    }
    return this.storeClaimed(claimed, bytes);
  }

  private async storeClaimed(accession: Accession, bytes: Buffer): Promise<StepOutcome> {
    const storing =
      accession.status === 'ARTIFACT_FETCHING'
        ? await this.write(accession, { status: 'STORING_ARTIFACT', lastError: null })
        : accession;

    const key = artifactKeyFor(storing.id);
    let reference: string;
    try {
      reference = await this.store.put(key, bytes, WACZ_CONTENT_TYPE);
    } catch (error) {
      return this.recordFailure(storing, error, {
        retryable: !(error instanceof PermanentExternalError),
        rejected: (message) => `artifact storage failed: ${message}`,
        exhausted: (attempts) => `artifact storage failed after ${attempts} attempts`,
      });
    }

    await this.write(storing, {
      status: 'COMPLETED',
      storedArtifactReference: reference,
      lastError: null,
    });
    this.logger.info(
      { accessionId: storing.id, reference, sizeBytes: bytes.byteLength },
      'Accession archived'
    );
    return 'advanced';
  }

  /**
   * Fetch archive bytes, or record the failure and return its outcome
   */
  private async downloadArtifact(accession: Accession): Promise<Buffer | StepOutcome> {
    const locator = requireField(accession, 'artifactLocator', accession.artifactLocator);

    try {
      return await this.crawler.fetchArtifact(locator);
    } catch (error) {
      return this.recordFailure(accession, error, {
        retryable: isRetryable(error),
        rejected: (message) => `artifact retrieval failed: ${message}`,
        exhausted: (attempts) => `artifact retrieval failed after ${attempts} attempts`,
      });
    }
  }

  private async startPolling(accession: Accession): Promise<StepOutcome> {
    const now = this.clock();
    await this.write(accession, {
      status: 'POLLING',
      pollingStartedAt: now,
      nextAttemptAt: new Date(now.getTime() + this.pollingPolicy.pollIntervalMs),
    });
    return 'advanced';
  }

  /**
   * Count a failed external call: terminal when not retryable or out of attempts,
   * otherwise stay in the current status until the backoff elapses.
   */
  private async recordFailure(
    accession: Accession,
    error: unknown,
    reasons: FailureReasons
  ): Promise<StepOutcome> {
    const attemptCount = accession.attemptCount + 1;
    const message = errorMessage(error);

    if (!reasons.retryable) {
      return this.fail(accession, reasons.rejected(message), error, attemptCount);
    }
    if (isExhausted(this.retryPolicy, attemptCount)) {
      return this.fail(accession, reasons.exhausted(attemptCount), error, attemptCount);
    }

    const nextAttemptAt = getNextAttemptAt(this.retryPolicy, this.clock());
    await this.write(accession, {
      status: accession.status,
      attemptCount,
      lastError: message,
      nextAttemptAt,
    });
    this.logger.warn(
      { err: error, accessionId: accession.id, status: accession.status, attemptCount, nextAttemptAt },
      'Ingestion step failed, retry scheduled'
    );
    return 'retry_scheduled';
  }

  private async fail(
    accession: Accession,
    reason: string,
    error?: unknown,
    attemptCount?: number
  ): Promise<StepOutcome> {
    await this.write(accession, {
      status: 'FAILED',
      lastError: reason,
      attemptCount,
    });
    this.logger.error(
      { err: error, accessionId: accession.id, from: accession.status, reason },
      'Accession failed'
    );
    return 'failed';
  }

  private timeoutReason(): string {
    return new CrawlTimeoutError(this.pollingPolicy.maxWaitMs).message;
  }

  /**
   * Take the accession for one external call. Losing this write raises
   * ConflictError before anything leaves the process.
   */
  private claim(accession: Accession): Promise<Accession> {
    return this.write(accession, {
      status: accession.status,
      nextAttemptAt: new Date(this.clock().getTime() + this.leaseMs),
    });
  }

  /**
   * Conditional write from the status and version the accession was read in
   */
  private async write(accession: Accession, update: AccessionUpdate): Promise<Accession> {
    const updated = await this.repo.updateStatus(
      accession.id,
      accession.status,
      accession.version,
      update,
      this.clock()
    );
    if (accession.status !== updated.status) {
      this.logger.info(
        { accessionId: accession.id, from: accession.status, to: updated.status },
        'Accession transitioned'
      );
    }
    return updated;
  }

  /**
   * A lost conditional write means another pass already moved the accession on
   */
  private async guard(
    accession: Accession,
    step: () => Promise<StepOutcome>
  ): Promise<StepOutcome> {
    try {
      return await step();
    } catch (error) {
      if (error instanceof ConflictError) {
        this.logger.debug(
          {
            accessionId: accession.id,
            expected: error.expectedStatus,
            actual: error.actualStatus,
            expectedVersion: error.expectedVersion,
            actualVersion: error.actualVersion,
          },
          'Accession advanced by another pass'
        );
        return 'conflict';
      }
      throw error;
    }
  }

  private skip(accession: Accession, expected: AccessionStatus): StepOutcome {
    this.logger.warn(
      { accessionId: accession.id, status: accession.status, expected },
      'Ingestion step called in the wrong status'
    );
    return 'skipped';
  }
}

function requireField(accession: Accession, field: string, value: string | null): string {
  if (value === null) {
    throw new InvariantViolationError(accession.id, [`${accession.status} accession has no ${field}`]);
  }
  return value;
}
