import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { ScheduledTask, TaskGroup } from './scheduler.js';
import { ActivityLog } from '../logging/index.js';

describe('ScheduledTask', () => {
  let log: ActivityLog;

  beforeEach(() => {
    vi.useFakeTimers();
    log = new ActivityLog({ console: false });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('runs immediately and then once per interval', async () => {
    const body = vi.fn(async () => {});
    const task = new ScheduledTask('Test', 1000, body, log);

    task.start();
    await vi.advanceTimersByTimeAsync(0);
    expect(body).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(1000);
    expect(body).toHaveBeenCalledTimes(2);

    await vi.advanceTimersByTimeAsync(1000);
    expect(body).toHaveBeenCalledTimes(3);
    expect(task.getCycleCount()).toBe(3);

    await task.stop();
  });

  it('logs a failing cycle and keeps going', async () => {
    let calls = 0;
    const task = new ScheduledTask('Flaky', 1000, async () => {
      calls++;
      if (calls === 1) throw new Error('boom');
    }, log);
    const errors: string[] = [];
    task.on('cycleError', name => errors.push(name));

    task.start();
    await vi.advanceTimersByTimeAsync(0);
    expect(errors).toEqual(['Flaky']);
    expect(log.getRecent().some(e => e.level === 'error' && e.message === 'Cycle failed: boom')).toBe(true);

    await vi.advanceTimersByTimeAsync(1000);
    expect(calls).toBe(2);
    expect(task.getCycleCount()).toBe(1);

    await task.stop();
  });

  it('never overlaps cycles', async () => {
    let active = 0;
    let maxActive = 0;
    let calls = 0;
    const task = new ScheduledTask('Slow', 1000, async () => {
      calls++;
      active++;
      maxActive = Math.max(maxActive, active);
      await new Promise(resolve => setTimeout(resolve, 2500));
      active--;
    }, log);

    task.start();
    await vi.advanceTimersByTimeAsync(5000);
    expect(maxActive).toBe(1);
    // cycle takes 2.5s, then 1s sleep: starts at 0 and 3.5s
    expect(calls).toBe(2);

    const stopped = task.stop();
    await vi.advanceTimersByTimeAsync(2500);
    await stopped;
  });

  it('stop waits for the cycle in flight and schedules nothing after', async () => {
    let finished = false;
    const body = vi.fn(async () => {
      await new Promise(resolve => setTimeout(resolve, 500));
      finished = true;
    });
    const task = new ScheduledTask('Stopper', 1000, body, log);

    task.start();
    const stopped = task.stop();
    expect(task.running()).toBe(false);

    await vi.advanceTimersByTimeAsync(500);
    await stopped;
    expect(finished).toBe(true);

    await vi.advanceTimersByTimeAsync(5000);
    expect(body).toHaveBeenCalledTimes(1);
  });

  it('restarting during a cycle does not start a second one', async () => {
    let active = 0;
    let maxActive = 0;
    const body = vi.fn(async () => {
      active++;
      maxActive = Math.max(maxActive, active);
      await new Promise(resolve => setTimeout(resolve, 500));
      active--;
    });
    const task = new ScheduledTask('Restart', 1000, body, log);

    task.start();
    const stopped = task.stop();
    task.start();
    expect(task.running()).toBe(true);
    expect(body).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(500);
    await stopped;
    expect(maxActive).toBe(1);
    expect(body).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(1000);
    expect(body).toHaveBeenCalledTimes(2);
    expect(maxActive).toBe(1);

    const stoppedAgain = task.stop();
    await vi.advanceTimersByTimeAsync(500);
    await stoppedAgain;
  });

  it('trigger runs a cycle before the interval elapses', async () => {
    const body = vi.fn(async () => {});
    const task = new ScheduledTask('Wake', 60_000, body, log);

    task.start();
    await vi.advanceTimersByTimeAsync(0);
    task.trigger();
    await vi.advanceTimersByTimeAsync(0);
    expect(body).toHaveBeenCalledTimes(2);

    await task.stop();
  });
});

describe('TaskGroup', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('starts and stops every task together', async () => {
    const log = new ActivityLog({ console: false });
    const group = new TaskGroup();
    const a = group.add(new ScheduledTask('A', 1000, async () => {}, log));
    const b = group.add(new ScheduledTask('B', 2000, async () => {}, log));

    group.startAll();
    expect(a.running() && b.running()).toBe(true);
    expect(group.get('B')).toBe(b);
    expect(group.list()).toHaveLength(2);

    await group.stopAll();
    expect(a.running() || b.running()).toBe(false);
  });
});
