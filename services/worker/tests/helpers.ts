import { expect } from 'vitest';
import { findInvariantViolations, type Accession } from '../src/lib/accession.js';

export const START = new Date('2026-01-01T00:00:00.000Z');

/**
 * Controllable clock for orchestrator and worker tests
 */
export function createClock(start: Date = START) {
  let current = new Date(start);
  return {
    now: (): Date => new Date(current),
    advance(ms: number): void {
      current = new Date(current.getTime() + ms);
    },
  };
}

export function expectConsistent(accession: Accession): void {
  expect(findInvariantViolations(accession)).toEqual([]);
}
