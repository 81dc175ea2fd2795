/**
 * Scheduler
 *
 * Each loop is a ScheduledTask: run the body, log anything it throws, sleep the
 * interval, repeat until stopped. A cycle never starts while the previous one
 * is still running.
 */

import { EventEmitter } from 'events';
import type { ActivityLog } from '../logging/index.js';

export type TaskBody = () => Promise<void>;

export interface ScheduledTaskEvents {
  cycleComplete: [name: string, durationMs: number];
  cycleError: [name: string, error: unknown];
}

export class ScheduledTask extends EventEmitter<ScheduledTaskEvents> {
  readonly name: string;
  readonly intervalMs: number;
  private body: TaskBody;
  private log: ActivityLog;
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<void> | null = null;
  private isRunning = false;
  private cycleCount = 0;

  constructor(name: string, intervalMs: number, body: TaskBody, log: ActivityLog) {
    super();
    this.name = name;
    this.intervalMs = intervalMs;
    this.body = body;
    this.log = log;
  }

  start(): void {
    if (this.isRunning) return;
    this.isRunning = true;
    this.log.info(this.name, `Started (every ${this.intervalMs / 1000}s)`);
    // Restarted before the last cycle finished: its finally schedules the next one
    if (this.inFlight) return;
    this.runNow();
  }

  /**
   * Stop scheduling cycles and wait for the one in flight, if any
   */
  async stop(): Promise<void> {
    this.isRunning = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.inFlight) {
      await this.inFlight;
    }
    this.log.info(this.name, 'Stopped');
  }

  /**
   * Run a cycle now instead of waiting for the timer. No-op while one is running.
   */
  trigger(): void {
    if (!this.isRunning || this.inFlight) return;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.runNow();
  }

  getCycleCount(): number {
    return this.cycleCount;
  }

  running(): boolean {
    return this.isRunning;
  }

  private runNow(): void {
    this.inFlight = this.tick().finally(() => {
      this.inFlight = null;
      this.scheduleNext();
    });
  }

  private scheduleNext(): void {
    if (!this.isRunning) return;
    this.timer = setTimeout(() => {
      this.timer = null;
      this.runNow();
    }, this.intervalMs);
  }

  private async tick(): Promise<void> {
    const startedAt = Date.now();
    try {
      await this.body();
      this.cycleCount++;
      this.emit('cycleComplete', this.name, Date.now() - startedAt);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.log.error(this.name, `Cycle failed: ${message}`);
      this.emit('cycleError', this.name, error);
    }
  }
}

/**
 * Starts and stops a set of tasks together
 */
export class TaskGroup {
  private tasks: ScheduledTask[] = [];

  add(task: ScheduledTask): ScheduledTask {
    this.tasks.push(task);
    return task;
  }

  get(name: string): ScheduledTask | undefined {
    return this.tasks.find(task => task.name === name);
  }

  list(): ScheduledTask[] {
    return [...this.tasks];
  }

  startAll(): void {
    for (const task of this.tasks) task.start();
  }

  async stopAll(): Promise<void> {
    await Promise.all(this.tasks.map(task => task.stop()));
  }
}
