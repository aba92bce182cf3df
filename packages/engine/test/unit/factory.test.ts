/**
 * Workflow Factory and Threshold Tests
 */

import { describe, it, expect } from 'vitest';
import { emptyRecord } from '../../src/progress/record.js';
import { createWorkflow, DEFAULT_WORKFLOWS } from '../../src/workflows/factory.js';
import {
  InvalidThresholdsError,
  isFinished,
  newlyCrossed,
  nextThreshold,
  validateThresholds,
} from '../../src/workflows/thresholds.js';
import { WORKFLOW_KINDS } from '../../src/workflows/types.js';
import { START_TIME } from '../mocks.js';

describe('createWorkflow', () => {
  it('builds every default workflow', () => {
    const built = Object.entries(DEFAULT_WORKFLOWS).map(([name, options]) => createWorkflow(name, options));

    expect(built.map((w) => [w.name, w.kind])).toEqual([
      ['merged-changes', 'batch-counter'],
      ['quick-close', 'time-boxed'],
      ['co-authored-commits', 'co-attribution'],
      ['accepted-answers', 'question-answer'],
      ['review-bypass', 'review-bypass'],
    ]);
    expect(built.map((w) => w.kind).sort()).toEqual([...WORKFLOW_KINDS].sort());
  });

  it('applies default thresholds per kind', () => {
    const thresholds = Object.entries(DEFAULT_WORKFLOWS).map(([name, options]) => [
      name,
      createWorkflow(name, options).thresholds,
    ]);

    expect(Object.fromEntries(thresholds)).toEqual({
      'merged-changes': [2, 16, 128, 1024],
      'quick-close': [1],
      'co-authored-commits': [10, 24, 48],
      'accepted-answers': [8, 16, 32, 64],
      'review-bypass': [1],
    });
  });

  it('declares the credentials each kind needs', () => {
    expect(createWorkflow('a', { kind: 'batch-counter' }).roles).toEqual(['primary']);
    expect(createWorkflow('b', { kind: 'co-attribution' }).roles).toEqual(['primary', 'secondary']);
    expect(createWorkflow('c', { kind: 'question-answer' }).roles).toEqual(['primary', 'secondary']);
    expect(createWorkflow('d', { kind: 'review-bypass' }).roles).toEqual(['primary']);
  });
});

describe('thresholds', () => {
  it.each<[number[], string]>([
    [[], 'at least one threshold is required'],
    [[2, 2], 'thresholds must be strictly ascending'],
    [[0, 4], '0 is not a positive integer'],
    [[1.5], '1.5 is not a positive integer'],
  ])('rejects %j', (thresholds, reason) => {
    expect(() => validateThresholds('merged', thresholds)).toThrow(
      new InvalidThresholdsError('merged', reason)
    );
  });

  it('returns a frozen copy', () => {
    const input = [1, 2];
    const validated = validateThresholds('merged', input);

    input.push(3);
    expect(validated).toEqual([1, 2]);
    expect(Object.isFrozen(validated)).toBe(true);
  });

  it('finds thresholds newly reached by a counter', () => {
    const record = { ...emptyRecord('merged', START_TIME), counter: 15, crossed_thresholds: [2] };

    expect(newlyCrossed([2, 16, 128], record, 16)).toEqual([16]);
    expect(newlyCrossed([2, 16, 128], record, 15)).toEqual([]);
  });

  it('catches up on thresholds skipped by a large delta', () => {
    const record = emptyRecord('merged', START_TIME);

    expect(newlyCrossed([2, 16, 128], record, 20)).toEqual([2, 16]);
  });

  it('is finished at the highest threshold or once completed', () => {
    const record = emptyRecord('merged', START_TIME);

    expect(isFinished([2, 4], { ...record, counter: 3 })).toBe(false);
    expect(isFinished([2, 4], { ...record, counter: 4 })).toBe(true);
    expect(isFinished([2, 4], { ...record, counter: 1, completed: true })).toBe(true);
  });

  it('names the next threshold', () => {
    expect(nextThreshold([2, 16], 0)).toBe(2);
    expect(nextThreshold([2, 16], 2)).toBe(16);
    expect(nextThreshold([2, 16], 16)).toBeNull();
  });
});
