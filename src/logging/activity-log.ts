/**
 * Activity Log
 *
 * Single sink for every component's activity. Prints `[Component] message` lines,
 * keeps a bounded feed of recent entries for report consumers, and throttles
 * error storms so one failing collaborator cannot flood the console.
 */

import { EventEmitter } from 'events';

export type LogLevel = 'info' | 'warn' | 'error' | 'trade';

export interface ActivityEntry {
  timestamp: number;
  level: LogLevel;
  component: string;
  message: string;
}

export interface ActivityLogOptions {
  maxEntries?: number;
  errorBurstLimit?: number;   // Errors allowed per second before suppression
  console?: boolean;
}

export interface ActivityLogEvents {
  entry: [entry: ActivityEntry];
}

const DEFAULT_MAX_ENTRIES = 100;
const DEFAULT_ERROR_BURST_LIMIT = 5;
const BURST_WINDOW_MS = 1000;

export class ActivityLog extends EventEmitter<ActivityLogEvents> {
  private entries: ActivityEntry[] = [];
  private errorTimestamps: number[] = [];
  private suppressedCount = 0;
  private maxEntries: number;
  private errorBurstLimit: number;
  private toConsole: boolean;

  constructor(options: ActivityLogOptions = {}) {
    super();
    this.maxEntries = options.maxEntries ?? DEFAULT_MAX_ENTRIES;
    this.errorBurstLimit = options.errorBurstLimit ?? DEFAULT_ERROR_BURST_LIMIT;
    this.toConsole = options.console ?? true;
  }

  info(component: string, message: string): void {
    this.write('info', component, message);
  }

  warn(component: string, message: string): void {
    this.write('warn', component, message);
  }

  error(component: string, message: string): void {
    this.write('error', component, message);
  }

  /**
   * Trade opened or settled
   */
  trade(component: string, message: string): void {
    this.write('trade', component, message);
  }

  /**
   * Most recent entries, newest last
   */
  getRecent(limit: number = this.maxEntries): ActivityEntry[] {
    return this.entries.slice(-limit);
  }

  getSuppressedCount(): number {
    return this.suppressedCount;
  }

  private write(level: LogLevel, component: string, message: string): void {
    const now = Date.now();

    if (level === 'error') {
      this.errorTimestamps = this.errorTimestamps.filter(t => now - t < BURST_WINDOW_MS);
      this.errorTimestamps.push(now);

      if (this.errorTimestamps.length > this.errorBurstLimit) {
        this.suppressedCount++;
        if (this.suppressedCount === 1) {
          this.append({
            timestamp: now,
            level: 'warn',
            component: 'ActivityLog',
            message: 'Too many errors, suppressing further error messages',
          });
        }
        return;
      }
    }

    if (this.suppressedCount > 0) {
      const suppressed = this.suppressedCount;
      this.suppressedCount = 0;
      this.append({
        timestamp: now,
        level: 'info',
        component: 'ActivityLog',
        message: `Suppressed ${suppressed} error messages`,
      });
    }

    this.append({ timestamp: now, level, component, message });
  }

  private append(entry: ActivityEntry): void {
    this.entries.push(entry);
    if (this.entries.length > this.maxEntries) {
      this.entries = this.entries.slice(-this.maxEntries);
    }

    if (this.toConsole) {
      const line = `[${entry.component}] ${entry.message}`;
      if (entry.level === 'error') {
        console.error(line);
      } else {
        console.log(line);
      }
    }

    this.emit('entry', entry);
  }
}
