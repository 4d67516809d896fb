/**
 * Retry and polling budgets for the ingestion pipeline
 *
 * Retries use a fixed backoff: every failed attempt is followed by the same
 * delay, up to a ceiling on the accession's cumulative attempt count.
 */

import { loadConfig } from './config.js';

export interface RetryPolicy {
  /** Attempt count at which a retryable failure becomes terminal */
  maxAttempts: number;
  /** Delay between a failed attempt and the next one */
  backoffMs: number;
}

export interface PollingPolicy {
  /** Delay between two crawl status checks */
  pollIntervalMs: number;
  /** Wall-clock budget for a crawl, measured from the first poll */
  maxWaitMs: number;
}

export const DEFAULT_RETRY_POLICY: Readonly<RetryPolicy> = {
  maxAttempts: 5,
  backoffMs: 60 * 1000,
};

export const DEFAULT_POLLING_POLICY: Readonly<PollingPolicy> = {
  pollIntervalMs: 60 * 1000,
  maxWaitMs: 30 * 60 * 1000,
};

/**
 * How long a claimed accession stays hidden from other passes while its
 * external call runs
 */
export const DEFAULT_LEASE_MS = 10 * 60 * 1000;

export function retryPolicyFromConfig(): RetryPolicy {
  const config = loadConfig();
  return {
    maxAttempts: config.ingestionMaxAttempts,
    backoffMs: config.ingestionRetryBackoffSeconds * 1000,
  };
}

export function pollingPolicyFromConfig(): PollingPolicy {
  const config = loadConfig();
  return {
    pollIntervalMs: config.crawlPollIntervalSeconds * 1000,
    maxWaitMs: config.crawlMaxWaitMinutes * 60 * 1000,
  };
}

export function leaseMsFromConfig(): number {
  return loadConfig().ingestionClaimTimeoutSeconds * 1000;
}

/**
 * True once a failed attempt has used up the budget
 *
 * @param attemptCount - attempt count after recording the failure
 */
export function isExhausted(policy: RetryPolicy, attemptCount: number): boolean {
  return attemptCount >= policy.maxAttempts;
}

export function getNextAttemptAt(policy: RetryPolicy, now: Date): Date {
  return new Date(now.getTime() + policy.backoffMs);
}

export function hasExceededWait(
  policy: PollingPolicy,
  pollingStartedAt: Date,
  now: Date
): boolean {
  return now.getTime() - pollingStartedAt.getTime() >= policy.maxWaitMs;
}
