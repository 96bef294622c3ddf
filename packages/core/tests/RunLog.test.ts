import { describe, it, expect } from 'vitest';
import { RunLog } from '../src/RunLog.js';
import type { ActionLogEntry } from '../src/types.js';

function entry(stepIndex: number, agentId: number, sentimentScore = 0.1): ActionLogEntry {
  return {
    agentId,
    day: 1,
    step: stepIndex,
    stepIndex,
    timestamp: `2021-01-11T${String(9 + stepIndex).padStart(2, '0')}:00:00.000Z`,
    actionType: 'POST',
    content: `agent ${agentId} at ${stepIndex}`,
    sentimentScore,
  };
}

describe('RunLog', () => {
  it('appends whole steps and remembers the last step posts', () => {
    const log = new RunLog();
    log.commitStep(0, [entry(0, 1, 0.5), entry(0, 4, -0.25)]);
    log.commitStep(1, [entry(1, 2, 0.75)]);

    expect(log.size).toBe(3);
    expect([...log.previousStepPosts()]).toEqual([[2, 0.75]]);
    expect(log.all().map(e => e.agentId)).toEqual([1, 4, 2]);
  });

  it('an empty step clears the previous posts', () => {
    const log = new RunLog();
    log.commitStep(0, [entry(0, 1)]);
    log.commitStep(1, []);
    expect(log.previousStepPosts().size).toBe(0);
  });

  it('rejects steps out of order', () => {
    const log = new RunLog();
    log.commitStep(2, []);
    expect(() => log.commitStep(2, [])).toThrow('[RunLog] step 2 committed after step 2');
    expect(() => log.commitStep(1, [])).toThrow('[RunLog] step 1 committed after step 2');
  });

  it('rejects entries of another step without committing any', () => {
    const log = new RunLog();
    expect(() => log.commitStep(0, [entry(0, 1), entry(1, 2)])).toThrow(
      '[RunLog] entry for step 1 committed with step 0',
    );
    expect(log.size).toBe(0);
  });

  it('filters by step range and agent', () => {
    const log = new RunLog();
    for (let step = 0; step < 4; step++) log.commitStep(step, [entry(step, 1), entry(step, 2)]);
    expect(log.query({ since: 1, until: 2 })).toHaveLength(4);
    expect(log.query({ agentId: 2 }).map(e => e.stepIndex)).toEqual([0, 1, 2, 3]);
    expect(log.query()).toHaveLength(8);
  });

  it('recent() returns the newest entries oldest first', () => {
    const log = new RunLog();
    for (let step = 0; step < 3; step++) log.commitStep(step, [entry(step, step)]);
    expect(log.recent(2)).toEqual([
      { agentId: 1, actionType: 'POST', content: 'agent 1 at 1', timestamp: '2021-01-11T10:00:00.000Z' },
      { agentId: 2, actionType: 'POST', content: 'agent 2 at 2', timestamp: '2021-01-11T11:00:00.000Z' },
    ]);
  });

  it('exports as text', () => {
    const log = new RunLog();
    log.commitStep(0, [entry(0, 3, -0.5)]);
    expect(log.export('text')).toBe('[2021-01-11T09:00:00.000Z] agent 3 POST (-0.50): agent 3 at 0');
    expect(JSON.parse(log.export())).toEqual([entry(0, 3, -0.5)]);
  });
});
