import { describe, it, expect } from 'vitest';
import { AdaptiveLodController } from '../src/lod/AdaptiveLodController';
import { LodMode, type LodConfig, type LodDependent, type LodProfile } from '../src/lod/types';
import { EventBus, type EventMap } from '../src/core/EventBus';
import { getLodProfile } from '../src/config/lodProfiles';
import { FakeScheduler } from './helpers/FakeScheduler';

function recorder(): LodDependent & { calls: Array<{ mode: LodMode; config: Readonly<LodConfig> }> } {
  const calls: Array<{ mode: LodMode; config: Readonly<LodConfig> }> = [];
  return {
    calls,
    applyLodConfig(mode, config) { calls.push({ mode, config }); },
  };
}

function makeController(gracePeriodMs = 3000) {
  const sched = new FakeScheduler();
  const events = new EventBus();
  const pools = recorder();
  const controller = new AdaptiveLodController({ clock: sched, gracePeriodMs, events, pools });
  return { sched, events, pools, controller };
}

describe('AdaptiveLodController', () => {
  it('starts in High with an unbounded entity cap', () => {
    const { controller } = makeController();
    expect(controller.mode).toBe(LodMode.High);
    expect(controller.config().entityCap).toBeNull();
    expect(Object.isFrozen(controller.config())).toBe(true);
  });

  it('does not transition before the grace period since construction', () => {
    const { sched, controller } = makeController();
    expect(controller.updateByFps(30)).toBe(LodMode.High);
    sched.elapse(2999);
    expect(controller.updateByFps(30)).toBe(LodMode.High);
    sched.elapse(1);
    expect(controller.updateByFps(30)).toBe(LodMode.Medium);
  });

  it('scenario: 65 then sustained 48 fps ends at Medium, one step', () => {
    const { sched, controller } = makeController();
    controller.updateByFps(65);
    for (let t = 0; t < 6000; t += 16) {
      sched.elapse(16);
      controller.updateByFps(48);
    }
    expect(controller.mode).toBe(LodMode.Medium);
    expect(controller.modeChangeCount).toBe(1);
  });

  it('never skips a tier, even at very low fps', () => {
    const { sched, controller } = makeController();
    sched.elapse(3000);
    expect(controller.updateByFps(5)).toBe(LodMode.Medium);
    expect(controller.updateByFps(5)).toBe(LodMode.Medium);
    sched.elapse(3000);
    expect(controller.updateByFps(5)).toBe(LodMode.Low);
    sched.elapse(3000);
    expect(controller.updateByFps(5)).toBe(LodMode.Low);
  });

  it('raises one tier above the raise threshold and holds inside the dead zone', () => {
    const { sched, controller } = makeController();
    sched.elapse(3000);
    controller.updateByFps(10);
    expect(controller.mode).toBe(LodMode.Medium);
    sched.elapse(3000);
    expect(controller.updateByFps(50)).toBe(LodMode.Medium);
    expect(controller.updateByFps(58)).toBe(LodMode.Medium);
    expect(controller.updateByFps(59)).toBe(LodMode.High);
  });

  it('never changes mode twice inside one grace window for an arbitrary fps sequence', () => {
    const { sched, events, controller } = makeController(3000);
    const transitions: EventMap['lodChanged'][] = [];
    events.on('lodChanged', (e) => transitions.push(e));
    let seed = 12345;
    const next = () => {
      seed = (seed * 1103515245 + 12345) % 2147483648;
      return seed / 2147483648;
    };
    for (let i = 0; i < 5000; i++) {
      sched.elapse(Math.floor(next() * 40));
      controller.updateByFps(next() * 120);
    }
    expect(transitions.length).toBeGreaterThan(1);
    for (let i = 1; i < transitions.length; i++) {
      expect(transitions[i].at - transitions[i - 1].at).toBeGreaterThanOrEqual(3000);
    }
    for (const t of transitions) {
      expect(Math.abs(t.to - t.from)).toBe(1);
    }
  });

  it('ignores invalid fps readings', () => {
    const { sched, controller } = makeController();
    sched.elapse(5000);
    expect(controller.updateByFps(Number.NaN)).toBe(LodMode.High);
    expect(controller.updateByFps(-5)).toBe(LodMode.High);
    expect(controller.updateByFps(Number.POSITIVE_INFINITY)).toBe(LodMode.High);
    expect(controller.lastEvaluatedFps).toBeNull();
    expect(controller.modeChangeCount).toBe(0);
  });

  it('reconfigures pools and dependents and emits on every transition', () => {
    const { sched, events, pools, controller } = makeController();
    const dep = recorder();
    controller.attach(dep);
    expect(dep.calls.map((c) => c.mode)).toEqual([LodMode.High]);

    const seen: EventMap['lodChanged'][] = [];
    events.on('lodChanged', (e) => seen.push(e));
    sched.elapse(3000);
    controller.updateByFps(30);

    expect(pools.calls.map((c) => c.mode)).toEqual([LodMode.Medium]);
    expect(dep.calls.map((c) => c.mode)).toEqual([LodMode.High, LodMode.Medium]);
    expect(dep.calls[1].config.entityCap).toBe(900);
    expect(seen).toEqual([{ from: LodMode.High, to: LodMode.Medium, fps: 30, forced: false, at: 3000 }]);
  });

  it('stops notifying a detached dependent and survives a throwing one', () => {
    const { sched, controller } = makeController();
    const dep = recorder();
    const detach = controller.attach(dep);
    controller.attach({ applyLodConfig: () => { throw new Error('boom'); } });
    detach();
    sched.elapse(3000);
    controller.updateByFps(30);
    expect(controller.mode).toBe(LodMode.Medium);
    expect(dep.calls).toHaveLength(1);
  });

  it('configurePools pushes the current tier to the pool dependent', () => {
    const { pools, controller } = makeController();
    controller.configurePools();
    expect(pools.calls).toHaveLength(1);
    expect(pools.calls[0].mode).toBe(LodMode.High);
    expect(pools.calls[0].config.poolCapacityEntries).toBe(100);
  });

  it('clamps a profile without a dead zone', () => {
    const base = getLodProfile('standard');
    const bad: LodProfile = {
      ...base,
      name: 'bad',
      thresholds: { dropFps: { high: 50, medium: 45 }, raiseFps: { medium: 40, low: 30 } },
    };
    const controller = new AdaptiveLodController({ clock: new FakeScheduler(), profile: bad });
    expect(controller.thresholdsInUse).toEqual({
      dropFps: { high: 50, medium: 45 },
      raiseFps: { medium: 51, low: 46 },
    });
  });

  it('uses the lowEnd profile thresholds', () => {
    const sched = new FakeScheduler();
    const controller = new AdaptiveLodController({ clock: sched, profile: 'lowEnd' });
    sched.elapse(3000);
    expect(controller.updateByFps(46)).toBe(LodMode.High);
    expect(controller.updateByFps(44)).toBe(LodMode.Medium);
    expect(controller.config().entityCap).toBe(600);
  });

  it('forceMode bypasses hysteresis and reset returns to High', () => {
    const { events, controller } = makeController();
    const seen: EventMap['lodChanged'][] = [];
    events.on('lodChanged', (e) => seen.push(e));
    controller.forceMode(LodMode.Low);
    expect(controller.mode).toBe(LodMode.Low);
    expect(controller.isAggressiveMode()).toBe(true);
    expect(controller.isPerformanceMode()).toBe(true);
    expect(seen[0]).toEqual({ from: LodMode.High, to: LodMode.Low, fps: null, forced: true, at: 0 });
    controller.reset();
    expect(controller.mode).toBe(LodMode.High);
    expect(controller.isPerformanceMode()).toBe(false);
    expect(controller.modeChangeCount).toBe(2);
  });

  it('forceMode restarts the grace period', () => {
    const { sched, controller } = makeController();
    sched.elapse(5000);
    controller.forceMode(LodMode.Medium);
    expect(controller.updateByFps(10)).toBe(LodMode.Medium);
    sched.elapse(3000);
    expect(controller.updateByFps(10)).toBe(LodMode.Low);
  });
});
