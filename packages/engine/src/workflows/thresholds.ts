/**
 * Threshold helpers shared by every variant.
 */

import type { ProgressRecord } from '../progress/types.js';

export class InvalidThresholdsError extends Error {
  constructor(workflow: string, reason: string) {
    super(`Invalid thresholds for ${workflow}: ${reason}`);
    this.name = 'InvalidThresholdsError';
  }
}

/**
 * Thresholds must be positive integers, strictly ascending.
 */
export function validateThresholds(workflow: string, thresholds: readonly number[]): readonly number[] {
  if (thresholds.length === 0) {
    throw new InvalidThresholdsError(workflow, 'at least one threshold is required');
  }
  thresholds.forEach((value, i) => {
    if (!Number.isInteger(value) || value <= 0) {
      throw new InvalidThresholdsError(workflow, `${value} is not a positive integer`);
    }
    if (i > 0 && value <= thresholds[i - 1]) {
      throw new InvalidThresholdsError(workflow, 'thresholds must be strictly ascending');
    }
  });
  return Object.freeze([...thresholds]);
}

export function highestThreshold(thresholds: readonly number[]): number {
  return thresholds[thresholds.length - 1];
}

/**
 * Thresholds reached by `counter` that the record has not crossed yet,
 * ascending.
 */
export function newlyCrossed(
  thresholds: readonly number[],
  record: ProgressRecord,
  counter: number
): number[] {
  const crossed = new Set(record.crossed_thresholds);
  return thresholds.filter((t) => t <= counter && !crossed.has(t));
}

/**
 * Shared DONE rule: completed flag set, or the highest threshold reached.
 */
export function isFinished(thresholds: readonly number[], record: ProgressRecord): boolean {
  return record.completed || record.counter >= highestThreshold(thresholds);
}

export function nextThreshold(thresholds: readonly number[], counter: number): number | null {
  return thresholds.find((t) => t > counter) ?? null;
}
