import { describe, it, expect } from 'vitest';
import { UpdateThrottle } from '../src/lod/UpdateThrottle';
import { LodMode } from '../src/lod/types';
import { getLodProfile } from '../src/config/lodProfiles';
import { FakeScheduler } from './helpers/FakeScheduler';

const tiers = getLodProfile('standard').tiers;

function makeThrottle() {
  const sched = new FakeScheduler();
  const throttle = new UpdateThrottle('camera', sched, {
    [LodMode.High]: 0,
    [LodMode.Medium]: 100,
    [LodMode.Low]: 1000,
  });
  return { sched, throttle };
}

describe('UpdateThrottle', () => {
  it('never throttles the highest tier', () => {
    const { throttle } = makeThrottle();
    for (let i = 0; i < 5; i++) expect(throttle.tryAccept()).toBe(true);
  });

  it('accepts exactly once for N calls inside one interval', () => {
    const { sched, throttle } = makeThrottle();
    throttle.applyLodConfig(LodMode.Medium, { ...tiers[LodMode.Medium], updateThrottleMs: 100 });
    let accepted = 0;
    for (let i = 0; i < 10; i++) {
      if (throttle.tryAccept()) accepted++;
      sched.elapse(5);
    }
    expect(accepted).toBe(1);
    expect(throttle.stats()).toEqual({
      channel: 'camera',
      totalUpdates: 1,
      skipped: 9,
      lastAcceptedAt: 0,
      intervalMs: 100,
    });
  });

  it('converges to one accepted update per interval under sustained input', () => {
    const { sched, throttle } = makeThrottle();
    throttle.applyLodConfig(LodMode.Medium, { ...tiers[LodMode.Medium], updateThrottleMs: 100 });
    const acceptedAt: number[] = [];
    for (let i = 0; i < 100; i++) {
      if (throttle.tryAccept()) acceptedAt.push(sched.now());
      sched.elapse(10);
    }
    expect(acceptedAt).toEqual([0, 100, 200, 300, 400, 500, 600, 700, 800, 900]);
  });

  it('follows the tier it was last configured for', () => {
    const { throttle } = makeThrottle();
    throttle.applyLodConfig(LodMode.Low, tiers[LodMode.Low]);
    expect(throttle.mode).toBe(LodMode.Low);
    expect(throttle.intervalFor()).toBe(150);
    expect(throttle.intervalFor(LodMode.Medium)).toBe(100);
  });

  it('shouldUpdate honours an explicit mode without recording', () => {
    const { sched, throttle } = makeThrottle();
    throttle.recordUpdate();
    sched.elapse(150);
    expect(throttle.shouldUpdate(LodMode.Medium)).toBe(true);
    expect(throttle.shouldUpdate(LodMode.Low)).toBe(false);
    expect(throttle.shouldUpdate(LodMode.High)).toBe(true);
    expect(throttle.stats().totalUpdates).toBe(1);
  });

  it('reset forgets the last accepted trigger', () => {
    const { throttle } = makeThrottle();
    throttle.applyLodConfig(LodMode.Low, tiers[LodMode.Low]);
    throttle.tryAccept();
    expect(throttle.tryAccept()).toBe(false);
    throttle.reset();
    expect(throttle.stats().lastAcceptedAt).toBeNull();
    expect(throttle.tryAccept()).toBe(true);
  });
});
