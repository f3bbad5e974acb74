/**
 * Rotation Scheduler
 *
 * One background task per log directory: run a rotation pass, wait the policy's
 * check cycle, repeat. SchedulerRegistry makes registration idempotent per
 * directory, so a second rotate() for a directory that is already running is a
 * no-op.
 *
 * Timer passes and manual runs share one queue per task, and the next timer is
 * set only once the queue drains; passes for a directory never overlap. Timers
 * are unref'd and do not hold the process open.
 */

import { resolve } from 'path';
import { logger } from '../config/logger';
import type { RotationPassResult } from '../repositories/rotation-history.repository';
import { describeError } from '../strategies/rotation-strategy.interface';
import type { RotationPolicy, RotationReporter } from '../strategies/rotation-strategy.interface';
import type { RotationOrchestrator } from './rotation-orchestrator';
import { rotationMetrics } from './rotation-metrics';

export type PassRunner = Pick<RotationOrchestrator, 'logRotate'>;

export interface RotationTaskSnapshot {
  key: string;
  policy: RotationPolicy;
  running: boolean;
  passes: number;
  lastPass: RotationPassResult | null;
}

export class RotationTask {
  private timer: NodeJS.Timeout | null = null;
  private stopped = false;
  private started = false;
  private passes = 0;
  private lastPass: RotationPassResult | null = null;
  private queue: Promise<unknown> = Promise.resolve();
  private queued = 0;

  constructor(
    readonly key: string,
    readonly policy: RotationPolicy,
    private runner: PassRunner,
    private reporter: RotationReporter
  ) {}

  get running(): boolean {
    return this.started && !this.stopped;
  }

  start(): void {
    if (this.started) {
      return;
    }
    this.started = true;
    this.reporter.info('RotationScheduler: Starting log rotate task', {
      directory: this.key,
      rollingPolicy: this.policy.rollingPolicy,
      checkCycleMs: this.policy.checkCycleMs,
    });
    this.schedule(0);
  }

  stop(): void {
    if (this.stopped) {
      return;
    }
    this.stopped = true;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  /**
   * Runs a pass now. A pass already in flight finishes first; the timer is
   * re-armed for a full cycle once the queue drains. Resolves to null when the
   * pass raised instead of returning a result.
   */
  runNow(): Promise<RotationPassResult | null> {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    return this.enqueue();
  }

  snapshot(): RotationTaskSnapshot {
    return {
      key: this.key,
      policy: this.policy,
      running: this.running,
      passes: this.passes,
      lastPass: this.lastPass,
    };
  }

  private schedule(delayMs: number): void {
    if (this.stopped) {
      return;
    }
    if (this.timer) {
      clearTimeout(this.timer);
    }
    this.timer = setTimeout(() => {
      this.timer = null;
      void this.enqueue();
    }, delayMs);
    this.timer.unref();
  }

  private async enqueue(): Promise<RotationPassResult | null> {
    this.queued++;
    const pass = this.queue.then(() => this.runPass());
    this.queue = pass;
    try {
      return await pass;
    } finally {
      this.queued--;
      if (this.queued === 0) {
        this.schedule(this.policy.checkCycleMs);
      }
    }
  }

  private async runPass(): Promise<RotationPassResult | null> {
    const { maxSizeMB, maxBackupCount } = this.policy;
    try {
      const result = await this.runner.logRotate(this.key, maxSizeMB, maxBackupCount);
      this.lastPass = result;
      this.passes++;
      return result;
    } catch (error) {
      this.reporter.error('RotationScheduler: Rotation pass raised an unexpected error', {
        directory: this.key,
        error: describeError(error),
      });
      return null;
    }
  }
}

export class SchedulerRegistry {
  constructor(
    private runner: PassRunner,
    private reporter: RotationReporter = logger,
    private tasks: Map<string, RotationTask> = new Map()
  ) {}

  /**
   * Registers a background rotation task for the policy's directory, at most once.
   * The check-and-insert runs synchronously, so it cannot interleave with
   * another registration.
   */
  rotate(policy: RotationPolicy): void {
    const key = resolve(policy.target.directory);
    if (this.tasks.has(key)) {
      return;
    }

    const task = new RotationTask(key, policy, this.runner, this.reporter);
    this.tasks.set(key, task);
    task.start();
    rotationMetrics.schedulersActive.set(this.runningCount());
  }

  get(directory: string): RotationTask | undefined {
    return this.tasks.get(resolve(directory));
  }

  list(): RotationTaskSnapshot[] {
    return [...this.tasks.values()].map((task) => task.snapshot());
  }

  /**
   * One pass now for every registered directory, in registration order, each
   * queued behind any pass its task already has in flight.
   */
  async runAll(): Promise<RotationPassResult[]> {
    const passes: RotationPassResult[] = [];
    for (const task of this.tasks.values()) {
      const pass = await task.runNow();
      if (pass) {
        passes.push(pass);
      }
    }
    return passes;
  }

  runningCount(): number {
    let count = 0;
    for (const task of this.tasks.values()) {
      if (task.running) {
        count++;
      }
    }
    return count;
  }

  /**
   * Stops every task. Entries stay registered, so a stopped directory is not
   * started again by a later rotate().
   */
  stopAll(): void {
    for (const task of this.tasks.values()) {
      task.stop();
    }
    rotationMetrics.schedulersActive.set(0);
  }
}
