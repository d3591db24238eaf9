import { Logger } from '../core/Logger';
import type { EventBus } from '../core/EventBus';
import type { Clock } from '../core/Scheduler';
import { TaskPriority, type IdleTaskScheduler } from './IdleTaskScheduler';

export type WarmState = 'idle' | 'running' | 'cancelled' | 'completed';

export interface WarmStep<C> {
  name: string;
  run(context: C): void;
}

export interface WarmProgress {
  completed: number;
  failed: number;
  total: number;
}

export interface WarmSummary extends WarmProgress {
  cancelled: boolean;
  elapsedMs: number;
}

export interface StartupWarmCycleOptions<C> {
  idle: IdleTaskScheduler;
  clock: Clock;
  steps: ReadonlyArray<WarmStep<C>>;
  /** Steps running longer than this are logged. */
  sliceBudgetMs?: number;
  events?: EventBus;
}

/**
 * Cold-start warm-up split into small steps, each its own High-priority idle
 * task. The next step is queued only when the previous one finished, and the
 * cancel flag is checked before every step; a running step always completes.
 */
export class StartupWarmCycle<C> {
  private readonly idle: IdleTaskScheduler;
  private readonly clock: Clock;
  private readonly steps: ReadonlyArray<WarmStep<C>>;
  private readonly sliceBudgetMs: number;
  private readonly events?: EventBus;

  private currentState: WarmState = 'idle';
  private generation = 0;
  private completed = 0;
  private failed = 0;
  private startedAt = 0;

  constructor(opts: StartupWarmCycleOptions<C>) {
    this.idle = opts.idle;
    this.clock = opts.clock;
    this.steps = opts.steps.slice();
    this.sliceBudgetMs = opts.sliceBudgetMs ?? 4;
    this.events = opts.events;
  }

  public get state(): WarmState { return this.currentState; }

  public get progress(): WarmProgress {
    return { completed: this.completed, failed: this.failed, total: this.steps.length };
  }

  /**
   * Start the cycle. Ignored (returns false) while a cycle is already running.
   */
  public run(context: C, onComplete?: (summary: WarmSummary) => void, onProgress?: (progress: WarmProgress) => void): boolean {
    if (this.currentState === 'running') {
      Logger.warn('[WarmCycle] Already running, ignoring duplicate run');
      return false;
    }
    this.generation++;
    this.currentState = 'running';
    this.completed = 0;
    this.failed = 0;
    this.startedAt = this.clock.now();
    Logger.info(`[WarmCycle] Starting ${this.steps.length} step(s)`);
    this.scheduleStep(this.generation, 0, context, onComplete, onProgress);
    return true;
  }

  /** @returns true when a running cycle was cancelled */
  public cancel(): boolean {
    if (this.currentState !== 'running') return false;
    this.currentState = 'cancelled';
    Logger.info(`[WarmCycle] Cancelled after ${this.completed + this.failed}/${this.steps.length} step(s)`);
    this.events?.emit('warmCycleFinished', this.summary(true));
    return true;
  }

  private scheduleStep(
    gen: number,
    index: number,
    context: C,
    onComplete: ((summary: WarmSummary) => void) | undefined,
    onProgress: ((progress: WarmProgress) => void) | undefined,
  ): void {
    const step = this.steps[index];
    if (step === undefined) {
      this.finish(onComplete);
      return;
    }
    const queued = this.idle.scheduleTask(() => {
      // Stale task from a cancelled or superseded cycle
      if (gen !== this.generation || this.currentState !== 'running') return;
      this.runStep(step, context);
      if (onProgress) {
        try {
          onProgress(this.progress);
        } catch (e) {
          Logger.error('[WarmCycle] onProgress failed', e);
        }
      }
      if (gen !== this.generation || this.currentState !== 'running') return;
      this.scheduleStep(gen, index + 1, context, onComplete, onProgress);
    }, TaskPriority.High, `warm:${step.name}`);

    if (!queued) {
      Logger.warn('[WarmCycle] Idle scheduler unavailable, warm-up stopped');
      this.currentState = 'cancelled';
    }
  }

  private runStep(step: WarmStep<C>, context: C): void {
    const start = this.clock.now();
    try {
      step.run(context);
      this.completed++;
    } catch (e) {
      // Partial warm-up is still a valid state
      this.failed++;
      Logger.error(`[WarmCycle] Step "${step.name}" failed`, e);
    }
    const elapsed = this.clock.now() - start;
    if (elapsed > this.sliceBudgetMs) {
      Logger.warn(`[WarmCycle] Step "${step.name}" took ${elapsed.toFixed(1)}ms (budget ${this.sliceBudgetMs}ms)`);
    }
  }

  private finish(onComplete: ((summary: WarmSummary) => void) | undefined): void {
    this.currentState = 'completed';
    const summary = this.summary(false);
    Logger.info(`[WarmCycle] Completed ${summary.completed}/${summary.total} step(s) in ${summary.elapsedMs.toFixed(0)}ms`);
    this.events?.emit('warmCycleFinished', summary);
    if (!onComplete) return;
    try {
      onComplete(summary);
    } catch (e) {
      Logger.error('[WarmCycle] onComplete failed', e);
    }
  }

  private summary(cancelled: boolean): WarmSummary {
    return {
      completed: this.completed,
      failed: this.failed,
      total: this.steps.length,
      cancelled,
      elapsedMs: this.clock.now() - this.startedAt,
    };
  }
}
