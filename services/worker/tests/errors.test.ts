import { describe, expect, it } from 'vitest';
import { ConflictError, CrawlTimeoutError } from '../src/lib/errors.js';

describe('CrawlTimeoutError', () => {
  it.each([
    [60_000, 'crawl timed out after 1 minute'],
    [90_000, 'crawl timed out after 2 minutes'],
    [1_800_000, 'crawl timed out after 30 minutes'],
    [20_000, 'crawl timed out after 20 seconds'],
    [1_000, 'crawl timed out after 1 second'],
  ])('describes a %i ms wait', (waitedMs, message) => {
    expect(new CrawlTimeoutError(waitedMs).message).toBe(message);
  });
});

describe('ConflictError', () => {
  it('names the status when the status moved', () => {
    expect(new ConflictError('a1', 'PENDING', 'POLLING', 0, 3).message).toBe(
      'Accession a1 is POLLING, expected PENDING'
    );
  });

  it('names the version when only the version moved', () => {
    expect(new ConflictError('a1', 'PENDING', 'PENDING', 0, 1).message).toBe(
      'Accession a1 is at version 1, expected 0'
    );
  });
});
