import { describe, it, expect } from 'vitest';
import { StartupWarmCycle, type WarmProgress, type WarmStep, type WarmSummary } from '../src/systems/StartupWarmCycle';
import { IdleTaskScheduler, TaskPriority } from '../src/systems/IdleTaskScheduler';
import { EventBus, type EventMap } from '../src/core/EventBus';
import { Logger } from '../src/core/Logger';
import { FakeScheduler } from './helpers/FakeScheduler';

interface Ctx { label: string }

function makeCycle(steps: WarmStep<Ctx>[]) {
  const sched = new FakeScheduler();
  const events = new EventBus();
  const idle = new IdleTaskScheduler({ scheduler: sched, frameBudgetMs: 16, minTaskBudgetMs: 1 });
  const cycle = new StartupWarmCycle<Ctx>({ idle, clock: sched, steps, events, sliceBudgetMs: 4 });
  return { sched, events, idle, cycle };
}

function recordingSteps(names: string[], ran: string[], costMs = 0, sched?: FakeScheduler): WarmStep<Ctx>[] {
  return names.map((name) => ({
    name,
    run: (ctx: Ctx) => {
      ran.push(`${ctx.label}:${name}`);
      if (sched && costMs > 0) sched.elapse(costMs);
    },
  }));
}

describe('StartupWarmCycle', () => {
  it('runs every step in order and completes once', () => {
    const ran: string[] = [];
    const { sched, cycle } = makeCycle(recordingSteps(['assets', 'pools', 'tiles'], ran));
    const summaries: WarmSummary[] = [];
    const progress: WarmProgress[] = [];
    expect(cycle.run({ label: 'boot' }, (s) => summaries.push(s), (p) => progress.push(p))).toBe(true);
    expect(cycle.state).toBe('running');
    expect(ran).toEqual([]);
    sched.flushIdle();
    expect(ran).toEqual(['boot:assets', 'boot:pools', 'boot:tiles']);
    expect(progress.map((p) => p.completed)).toEqual([1, 2, 3]);
    expect(summaries).toEqual([{ completed: 3, failed: 0, total: 3, cancelled: false, elapsedMs: 0 }]);
    expect(cycle.state).toBe('completed');
  });

  it('scenario: cancel after the second of four steps', () => {
    const ran: string[] = [];
    const { sched, cycle } = makeCycle(recordingSteps(['s1', 's2', 's3', 's4'], ran));
    let completed = false;
    cycle.run({ label: 'c' }, () => { completed = true; }, (p) => {
      if (p.completed === 2) cycle.cancel();
    });
    sched.flushIdle();
    expect(ran).toEqual(['c:s1', 'c:s2']);
    expect(completed).toBe(false);
    expect(cycle.state).toBe('cancelled');
    expect(cycle.progress).toEqual({ completed: 2, failed: 0, total: 4 });
  });

  it('lets an in-flight step finish but starts no further step after cancel', () => {
    const ran: string[] = [];
    const sched = new FakeScheduler();
    const idle = new IdleTaskScheduler({ scheduler: sched, frameBudgetMs: 16, minTaskBudgetMs: 1 });
    const cycle = new StartupWarmCycle<Ctx>({
      idle,
      clock: sched,
      steps: recordingSteps(['s1', 's2', 's3', 's4'], ran, 10, sched),
    });
    let completed = false;
    cycle.run({ label: 'x' }, () => { completed = true; });
    // 10ms steps: s1 (budget 16), s2 (budget 6, overruns), then the slot defers
    sched.runIdle();
    expect(ran).toEqual(['x:s1', 'x:s2']);
    expect(cycle.cancel()).toBe(true);
    sched.flushIdle();
    expect(ran).toEqual(['x:s1', 'x:s2']);
    expect(completed).toBe(false);
    expect(cycle.cancel()).toBe(false);
  });

  it('ignores a duplicate run while running and allows a rerun afterwards', () => {
    const ran: string[] = [];
    const { sched, cycle } = makeCycle(recordingSteps(['only'], ran));
    expect(cycle.run({ label: 'a' })).toBe(true);
    expect(cycle.run({ label: 'b' })).toBe(false);
    sched.flushIdle();
    expect(ran).toEqual(['a:only']);
    expect(cycle.run({ label: 'c' })).toBe(true);
    sched.flushIdle();
    expect(ran).toEqual(['a:only', 'c:only']);
  });

  it('continues after a failing step', () => {
    const ran: string[] = [];
    const steps: WarmStep<Ctx>[] = [
      ...recordingSteps(['first'], ran),
      { name: 'broken', run: () => { throw new Error('step failed'); } },
      ...recordingSteps(['last'], ran),
    ];
    const { sched, cycle } = makeCycle(steps);
    const summaries: WarmSummary[] = [];
    cycle.run({ label: 'f' }, (s) => summaries.push(s));
    sched.flushIdle();
    expect(ran).toEqual(['f:first', 'f:last']);
    expect(summaries[0]).toMatchObject({ completed: 2, failed: 1, total: 3, cancelled: false });
  });

  it('schedules steps ahead of lower priority idle work', () => {
    const order: string[] = [];
    const { idle, cycle } = makeCycle([{ name: 'warm', run: () => { order.push('warm'); } }]);
    idle.scheduleTask(() => { order.push('maintenance'); }, TaskPriority.Low);
    cycle.run({ label: 'p' });
    idle.runSlot(0);
    expect(order).toEqual(['warm', 'maintenance']);
  });

  it('logs steps that exceed the slice budget', () => {
    const warnings: string[] = [];
    const remove = Logger.addTelemetryHook((level, message) => {
      if (level === 'warn') warnings.push(message);
    });
    try {
      const sched = new FakeScheduler();
      const idle = new IdleTaskScheduler({ scheduler: sched });
      const cycle = new StartupWarmCycle<Ctx>({
        idle,
        clock: sched,
        steps: [{ name: 'slow', run: () => sched.elapse(6) }],
      });
      cycle.run({ label: 's' });
      sched.flushIdle();
      expect(warnings).toContain('[WarmCycle] Step "slow" took 6.0ms (budget 4ms)');
    } finally {
      remove();
    }
  });

  it('emits warmCycleFinished for completion and cancellation', () => {
    const { sched, events, cycle } = makeCycle(recordingSteps(['a', 'b'], []));
    const seen: EventMap['warmCycleFinished'][] = [];
    events.on('warmCycleFinished', (e) => seen.push(e));
    cycle.run({ label: 'e' });
    cycle.cancel();
    cycle.run({ label: 'e' });
    sched.flushIdle();
    expect(seen.map((e) => e.cancelled)).toEqual([true, false]);
    expect(seen[1]).toEqual({ completed: 2, failed: 0, total: 2, cancelled: false, elapsedMs: 0 });
  });

  it('completes immediately with no steps', () => {
    const { cycle } = makeCycle([]);
    let summary: WarmSummary | null = null;
    cycle.run({ label: 'none' }, (s) => { summary = s; });
    expect(cycle.state).toBe('completed');
    expect(summary).toEqual({ completed: 0, failed: 0, total: 0, cancelled: false, elapsedMs: 0 });
  });
});
