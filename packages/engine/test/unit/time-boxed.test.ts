/**
 * Time-Boxed Workflow Tests
 *
 * Proves:
 * - A close inside the deadline completes the workflow
 * - A close past the deadline is FATAL_DEADLINE and clears the checkpoint
 * - A resumed step closes the checkpointed issue instead of opening another
 */

import { describe, it, expect } from 'vitest';
import { emptyRecord } from '../../src/progress/record.js';
import { InMemoryProgressStore } from '../../src/progress/store.js';
import { TimeBoxedWorkflow } from '../../src/workflows/time-boxed.js';
import { ManualClock, START_TIME, createHarness } from '../mocks.js';

const live = () => new AbortController().signal;

describe('TimeBoxedWorkflow', () => {
  it('completes when the issue closes within the deadline', async () => {
    const { runner, client, clock, store } = await createHarness();
    client.onCall('closeIssue', () => clock.advance(299_000));

    const report = await runner.run(new TimeBoxedWorkflow('quick'), live());

    expect(report).toMatchObject({ status: 'completed', counter: 1, crossedThresholds: [1] });
    expect(client.callsOf('closeIssue')[0]?.args[1]).toBe(1);
    expect((await store.load('quick'))?.checkpoint).toBeNull();
  });

  it('accepts a close exactly at the deadline', async () => {
    const { runner, client, clock } = await createHarness();
    client.onCall('closeIssue', () => clock.advance(300_000));

    const report = await runner.run(new TimeBoxedWorkflow('quick'), live());

    expect(report.status).toBe('completed');
  });

  it('fails as unachievable when the close is late', async () => {
    const { runner, client, clock, store } = await createHarness();
    client.onCall('closeIssue', () => clock.advance(301_000));

    const report = await runner.run(new TimeBoxedWorkflow('quick'), live());

    expect(report).toMatchObject({
      status: 'failed',
      counter: 0,
      stepId: 'quick#1',
      disposition: 'unachievable',
      error: {
        category: 'FATAL_DEADLINE',
        code: 'DEADLINE_EXCEEDED',
        message: 'Issue #1 closed after 301000ms, deadline is 300000ms',
      },
    });
    const record = await store.load('quick');
    expect(record?.checkpoint).toBeNull();
    expect(record?.last_error?.category).toBe('FATAL_DEADLINE');
  });

  it('opens a fresh issue on the run after a missed deadline', async () => {
    const { runner, client, clock } = await createHarness();
    let late = true;
    client.onCall('closeIssue', () => {
      if (late) clock.advance(301_000);
      late = false;
    });
    const workflow = new TimeBoxedWorkflow('quick');
    await runner.run(workflow, live());

    const report = await runner.run(workflow, live());

    expect(report.status).toBe('completed');
    expect(client.callsOf('createIssue')).toHaveLength(2);
    expect(client.callsOf('closeIssue').map((call) => call.args[1])).toEqual([1, 2]);
  });

  it('only closes when resuming from a checkpoint', async () => {
    const clock = new ManualClock();
    const store = new InMemoryProgressStore(clock);
    store.seed([
      {
        ...emptyRecord('quick', START_TIME),
        checkpoint: { step_id: 'quick#1', data: { issue_number: 42, opened_at: START_TIME } },
      },
    ]);
    const { runner, client } = await createHarness({ clock, store });

    const report = await runner.run(new TimeBoxedWorkflow('quick'), live());

    expect(report.status).toBe('completed');
    expect(client.callsOf('createIssue')).toHaveLength(0);
    expect(client.callsOf('closeIssue')[0]?.args[1]).toBe(42);
  });

  it('measures the deadline from the checkpointed open time', async () => {
    const clock = new ManualClock();
    const store = new InMemoryProgressStore(clock);
    store.seed([
      {
        ...emptyRecord('quick', START_TIME),
        checkpoint: { step_id: 'quick#1', data: { issue_number: 42, opened_at: START_TIME - 400_000 } },
      },
    ]);
    const { runner } = await createHarness({ clock, store });

    const report = await runner.run(new TimeBoxedWorkflow('quick'), live());

    expect(report.error?.message).toBe('Issue #42 closed after 400000ms, deadline is 300000ms');
  });

  it('ignores a checkpoint left by another step', async () => {
    const clock = new ManualClock();
    const store = new InMemoryProgressStore(clock);
    store.seed([
      {
        ...emptyRecord('quick', START_TIME),
        checkpoint: { step_id: 'other#1', data: { issue_number: 42, opened_at: START_TIME } },
      },
    ]);
    const { runner, client } = await createHarness({ clock, store });

    await runner.run(new TimeBoxedWorkflow('quick'), live());

    expect(client.callsOf('createIssue')).toHaveLength(1);
  });

  it('takes a custom deadline', async () => {
    const { runner, client, clock } = await createHarness();
    client.onCall('closeIssue', () => clock.advance(61_000));

    const report = await runner.run(new TimeBoxedWorkflow('quick', { deadlineMs: 60_000 }), live());

    expect(report.error?.code).toBe('DEADLINE_EXCEEDED');
  });
});
