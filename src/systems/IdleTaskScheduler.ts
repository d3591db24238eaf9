import { Logger } from '../core/Logger';
import type { EventBus } from '../core/EventBus';
import type { CancelFn, Scheduler } from '../core/Scheduler';

export enum TaskPriority {
  Low = 0,
  Medium = 1,
  High = 2,
  Critical = 3,
}

/** Dequeue order: highest priority first. */
const LANE_ORDER: readonly TaskPriority[] = [TaskPriority.Critical, TaskPriority.High, TaskPriority.Medium, TaskPriority.Low];

export interface IdleTask {
  priority: TaskPriority;
  action: () => void;
  name: string;
  enqueuedAt: number;
}

export interface IdleTaskSchedulerOptions {
  scheduler: Scheduler;
  frameBudgetMs?: number;
  /** Below this remaining budget the rest of the queue waits for another slot. */
  minTaskBudgetMs?: number;
  gcHintCooldownMs?: number;
  /** Advisory collection hook (e.g. a host's `gc()`); best effort. */
  gcHint?: (reason: string) => void;
  events?: EventBus;
}

export interface IdleTaskStats {
  queued: number;
  queuedByPriority: Record<TaskPriority, number>;
  totalScheduled: number;
  /** Tasks that ran, including ones that threw. */
  completed: number;
  failed: number;
  deferredSlots: number;
  overrunCount: number;
  overrunRate: number;
  oldestWaitMs: number;
  gcHintCount: number;
}

/** FIFO queue with a head index; the consumed prefix is compacted lazily. */
class TaskLane {
  private items: IdleTask[] = [];
  private head = 0;

  public get length(): number { return this.items.length - this.head; }

  public push(task: IdleTask): void {
    this.items.push(task);
  }

  public peek(): IdleTask | undefined {
    return this.items[this.head];
  }

  public shift(): IdleTask | undefined {
    if (this.head >= this.items.length) return undefined;
    const task = this.items[this.head++];
    if (this.head > 64 && this.head * 2 > this.items.length) {
      this.items = this.items.slice(this.head);
      this.head = 0;
    } else if (this.head === this.items.length) {
      this.items = [];
      this.head = 0;
    }
    return task;
  }

  public clear(): void {
    this.items = [];
    this.head = 0;
  }
}

/**
 * Runs deferred maintenance in frame idle time. Four FIFO lanes; before each
 * task the remaining frame budget is checked, but a started task is never
 * interrupted: overrun is measured afterwards and reported, not prevented.
 */
export class IdleTaskScheduler {
  private readonly scheduler: Scheduler;
  private readonly events?: EventBus;
  private readonly gcHint?: (reason: string) => void;
  private readonly frameBudgetMs: number;
  private readonly minTaskBudgetMs: number;
  private readonly gcHintCooldownMs: number;
  private readonly lanes: Record<TaskPriority, TaskLane> = {
    [TaskPriority.Low]: new TaskLane(),
    [TaskPriority.Medium]: new TaskLane(),
    [TaskPriority.High]: new TaskLane(),
    [TaskPriority.Critical]: new TaskLane(),
  };

  private pendingSlot: CancelFn | null = null;
  private isShutdown = false;
  private totalScheduled = 0;
  private completed = 0;
  private failed = 0;
  private deferredSlots = 0;
  private overrunCount = 0;
  private gcHintCount = 0;
  private lastGcHintAt: number | null = null;

  constructor(opts: IdleTaskSchedulerOptions) {
    this.scheduler = opts.scheduler;
    this.events = opts.events;
    this.gcHint = opts.gcHint;
    this.frameBudgetMs = opts.frameBudgetMs ?? 16;
    this.minTaskBudgetMs = opts.minTaskBudgetMs ?? 1;
    this.gcHintCooldownMs = opts.gcHintCooldownMs ?? 120_000;
  }

  public get queued(): number {
    return LANE_ORDER.reduce((n, p) => n + this.lanes[p].length, 0);
  }

  public get shutDown(): boolean { return this.isShutdown; }

  /**
   * Enqueue a task and request an idle slot.
   * @returns false after shutdown
   */
  public scheduleTask(action: () => void, priority: TaskPriority = TaskPriority.Medium, name?: string): boolean {
    if (this.isShutdown) {
      Logger.warn(`[IdleTasks] Ignoring "${name ?? 'task'}" after shutdown`);
      return false;
    }
    this.totalScheduled++;
    this.lanes[priority].push({
      priority,
      action,
      name: name ?? `task-${this.totalScheduled}`,
      enqueuedAt: this.scheduler.now(),
    });
    this.requestSlot();
    return true;
  }

  /**
   * Post-frame / idle hook. `elapsedInFrameMs` is the time the frame already used.
   * @returns number of tasks run in this slot
   */
  public runSlot(elapsedInFrameMs = 0): number {
    if (this.isShutdown) return 0;
    const used = Number.isFinite(elapsedInFrameMs) && elapsedInFrameMs > 0 ? elapsedInFrameMs : 0;
    const slotStart = this.scheduler.now();
    let ran = 0;

    while (this.queued > 0) {
      const remaining = this.frameBudgetMs - used - (this.scheduler.now() - slotStart);
      if (remaining < this.minTaskBudgetMs) {
        this.deferredSlots++;
        this.requestSlot();
        break;
      }
      const task = this.dequeue();
      if (!task) break;
      this.execute(task, remaining);
      ran++;
    }
    return ran;
  }

  /**
   * Advisory GC request, at most once per cooldown.
   * @returns whether a hint was issued
   */
  public maybeGcHint(reason: string): boolean {
    const now = this.scheduler.now();
    if (this.lastGcHintAt !== null && now - this.lastGcHintAt < this.gcHintCooldownMs) return false;
    this.lastGcHintAt = now;
    this.gcHintCount++;
    Logger.debug(`[IdleTasks] GC hint (${reason})`);
    if (this.gcHint) {
      try {
        this.gcHint(reason);
      } catch (e) {
        Logger.error('[IdleTasks] gcHint hook failed', e);
      }
    }
    return true;
  }

  /** Drops queued tasks and the pending slot; further scheduling is ignored. */
  public shutdown(): void {
    if (this.isShutdown) return;
    this.isShutdown = true;
    const dropped = this.queued;
    for (const p of LANE_ORDER) this.lanes[p].clear();
    this.pendingSlot?.();
    this.pendingSlot = null;
    Logger.info(`[IdleTasks] Shut down, dropped ${dropped} queued task(s)`);
  }

  public stats(): IdleTaskStats {
    const now = this.scheduler.now();
    let oldest = 0;
    for (const p of LANE_ORDER) {
      const head = this.lanes[p].peek();
      if (head) oldest = Math.max(oldest, now - head.enqueuedAt);
    }
    return {
      queued: this.queued,
      queuedByPriority: {
        [TaskPriority.Low]: this.lanes[TaskPriority.Low].length,
        [TaskPriority.Medium]: this.lanes[TaskPriority.Medium].length,
        [TaskPriority.High]: this.lanes[TaskPriority.High].length,
        [TaskPriority.Critical]: this.lanes[TaskPriority.Critical].length,
      },
      totalScheduled: this.totalScheduled,
      completed: this.completed,
      failed: this.failed,
      deferredSlots: this.deferredSlots,
      overrunCount: this.overrunCount,
      overrunRate: this.completed > 0 ? this.overrunCount / this.completed : 0,
      oldestWaitMs: oldest,
      gcHintCount: this.gcHintCount,
    };
  }

  private dequeue(): IdleTask | undefined {
    for (const p of LANE_ORDER) {
      const task = this.lanes[p].shift();
      if (task) return task;
    }
    return undefined;
  }

  private execute(task: IdleTask, budgetMs: number): void {
    const start = this.scheduler.now();
    try {
      task.action();
    } catch (e) {
      this.failed++;
      Logger.error(`[IdleTasks] Task "${task.name}" failed`, e);
    }
    this.completed++;
    const elapsed = this.scheduler.now() - start;
    if (elapsed > budgetMs) {
      this.overrunCount++;
      Logger.debug(`[IdleTasks] "${task.name}" overran: ${elapsed.toFixed(1)}ms of ${budgetMs.toFixed(1)}ms`);
      this.events?.emit('idleTaskOverrun', { name: task.name, elapsedMs: elapsed, budgetMs });
    }
  }

  private requestSlot(): void {
    if (this.pendingSlot || this.isShutdown) return;
    this.pendingSlot = this.scheduler.scheduleIdle(() => {
      this.pendingSlot = null;
      this.runSlot(0);
    });
  }
}
