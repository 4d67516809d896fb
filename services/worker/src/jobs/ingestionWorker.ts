import { RESUMABLE_STATUSES, type Accession } from '../lib/accession.js';
import { loadConfig } from '../lib/config.js';
import { getCrawlServiceClient } from '../lib/crawlService.js';
import { getLogger, type Logger } from '../lib/logger.js';
import { getArtifactStore } from '../lib/objectStore.js';
import {
  leaseMsFromConfig,
  pollingPolicyFromConfig,
  retryPolicyFromConfig,
} from '../lib/retryPolicy.js';
import { PgAccessionsRepo, type AccessionsRepo } from '../repos/accessionsRepo.js';
import { IngestionOrchestrator, type StepOutcome } from './ingestionOrchestrator.js';

export interface IngestionWorkerOptions {
  repo: AccessionsRepo;
  orchestrator: IngestionOrchestrator;
  /** Accessions fetched per status per cycle */
  batchSize: number;
  /** Delay between two scheduling cycles */
  pollIntervalMs: number;
  clock?: () => Date;
  logger?: Logger;
}

export interface CycleSummary {
  dispatched: string[];
  /** Due accessions skipped because a step for them is still running here */
  alreadyInFlight: string[];
}

/**
 * Ingestion Worker
 *
 * Scans for accessions in resumable statuses whose next attempt is due and runs
 * each one's next step as its own task. A slow crawl download never holds up the
 * other accessions; a process never runs two steps for the same accession at once.
 * Which accessions need work is read from the repository on every cycle, so a
 * restarted worker (or a second replica) picks up wherever the rows say.
 */
export class IngestionWorker {
  private readonly repo: AccessionsRepo;
  private readonly orchestrator: IngestionOrchestrator;
  private readonly batchSize: number;
  private readonly pollIntervalMs: number;
  private readonly clock: () => Date;
  private readonly logger: Logger;

  private readonly tasks = new Map<string, Promise<void>>();
  private running = false;
  private wake: (() => void) | null = null;

  constructor(options: IngestionWorkerOptions) {
    this.repo = options.repo;
    this.orchestrator = options.orchestrator;
    this.batchSize = options.batchSize;
    this.pollIntervalMs = options.pollIntervalMs;
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger ?? getLogger();
  }

  /**
   * Dispatch every due accession once. Returns without waiting for the steps.
   */
  async runCycle(): Promise<CycleSummary> {
    const now = this.clock();
    const summary: CycleSummary = { dispatched: [], alreadyInFlight: [] };

    for (const status of RESUMABLE_STATUSES) {
      let due: Accession[];
      try {
        due = await this.repo.listByStatus(status, { dueBefore: now, limit: this.batchSize });
      } catch (error) {
        this.logger.error({ err: error, status }, 'Failed to list due accessions');
        continue;
      }

      for (const accession of due) {
        if (this.tasks.has(accession.id)) {
          summary.alreadyInFlight.push(accession.id);
          continue;
        }
        this.dispatch(accession);
        summary.dispatched.push(accession.id);
      }
    }

    if (summary.dispatched.length > 0) {
      this.logger.info(
        { dispatched: summary.dispatched.length, inFlight: this.tasks.size },
        'Ingestion cycle dispatched steps'
      );
    }

    return summary;
  }

  /**
   * Resolve once every dispatched step has finished
   */
  async idle(): Promise<void> {
    while (this.tasks.size > 0) {
      await Promise.all(this.tasks.values());
    }
  }

  get inFlight(): number {
    return this.tasks.size;
  }

  /**
   * Run cycles until stop() is called, then wait for in-flight steps
   */
  async start(): Promise<void> {
    this.running = true;
    this.logger.info(
      { pollIntervalMs: this.pollIntervalMs, batchSize: this.batchSize },
      'Starting ingestion worker'
    );

    while (this.running) {
      try {
        await this.runCycle();
      } catch (error) {
        this.logger.error({ err: error }, 'Error in ingestion worker loop');
      }

      if (!this.running) {
        break;
      }
      await this.sleep(this.pollIntervalMs);
    }

    await this.idle();
    this.logger.info('Ingestion worker stopped');
  }

  stop(): void {
    this.running = false;
    if (this.wake) {
      this.wake();
    }
  }

  private dispatch(accession: Accession): void {
    const task = this.orchestrator
      .advance(accession)
      .then((outcome: StepOutcome) => {
        this.logger.debug(
          { accessionId: accession.id, status: accession.status, outcome },
          'Ingestion step finished'
        );
      })
      .catch((error: unknown) => {
        // Left in its current status; the next cycle picks it up again
        this.logger.error(
          { err: error, accessionId: accession.id, status: accession.status },
          'Ingestion step crashed'
        );
      })
      .finally(() => {
        this.tasks.delete(accession.id);
      });

    this.tasks.set(accession.id, task);
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => {
      const timeoutId = setTimeout(() => {
        this.wake = null;
        resolve();
      }, ms);
      this.wake = () => {
        clearTimeout(timeoutId);
        this.wake = null;
        resolve();
      };
    });
  }
}

/**
 * Worker wired to Postgres, Browsertrix and S3 from the environment
 */
export function createIngestionWorker(): IngestionWorker {
  const config = loadConfig();
  const repo = new PgAccessionsRepo();
  const orchestrator = new IngestionOrchestrator({
    repo,
    crawler: getCrawlServiceClient(),
    store: getArtifactStore(),
    retryPolicy: retryPolicyFromConfig(),
    pollingPolicy: pollingPolicyFromConfig(),
    leaseMs: leaseMsFromConfig(),
  });

  return new IngestionWorker({
    repo,
    orchestrator,
    batchSize: config.workerBatchSize,
    pollIntervalMs: config.workerPollIntervalSeconds * 1000,
  });
}
