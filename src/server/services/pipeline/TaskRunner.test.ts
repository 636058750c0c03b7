import { describe, it, expect } from 'vitest';
import { TaskRunner, type TaskCompletedEvent, type TaskFailedEvent } from './TaskRunner.js';

describe('TaskRunner', () => {
  it('starts work on a later turn than the submit call', async () => {
    const runner = new TaskRunner();
    let started = false;

    const handle = runner.submit('unit', () => {
      started = true;
      return 42;
    });

    expect(started).toBe(false);
    expect(runner.activeCount).toBe(1);
    expect(await handle.result).toEqual({ status: 'completed', value: 42 });
    expect(started).toBe(true);
    expect(runner.activeCount).toBe(0);
  });

  it('emits completed with the task result', async () => {
    const runner = new TaskRunner();
    const events: TaskCompletedEvent[] = [];
    runner.on('completed', (event: TaskCompletedEvent) => events.push(event));

    const handle = runner.submit('async-work', async () => 'done');
    await handle.result;

    expect(events).toEqual([{ id: handle.id, name: 'async-work', result: 'done' }]);
  });

  it('resolves failed work instead of rejecting', async () => {
    const runner = new TaskRunner();
    const failures: TaskFailedEvent[] = [];
    runner.on('failed', (event: TaskFailedEvent) => failures.push(event));

    const handle = runner.submit('broken', async () => {
      throw new Error('boom');
    });
    const outcome = await handle.result;

    expect(outcome.status).toBe('failed');
    expect(outcome.status === 'failed' && outcome.error.message).toBe('boom');
    expect(failures.map((event) => event.error.message)).toEqual(['boom']);
    expect(runner.activeCount).toBe(0);
  });

  it('wraps non-error throws', async () => {
    const runner = new TaskRunner();
    const outcome = await runner.submit('odd', () => Promise.reject('plain string')).result;

    expect(outcome).toMatchObject({ status: 'failed', error: { message: 'plain string' } });
  });

  it('runs tasks concurrently with distinct ids', async () => {
    const runner = new TaskRunner();
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const slow = runner.submit('slow', async () => {
      await gate;
      return 'slow';
    });
    const fast = runner.submit('fast', async () => 'fast');

    expect(await fast.result).toEqual({ status: 'completed', value: 'fast' });
    expect(runner.activeCount).toBe(1);
    release();
    expect(await slow.result).toEqual({ status: 'completed', value: 'slow' });
    expect(slow.id).not.toBe(fast.id);
  });

  it('survives a listener that throws', async () => {
    const runner = new TaskRunner();
    runner.on('completed', () => {
      throw new Error('listener broke');
    });

    expect(await runner.submit('work', () => 1).result).toEqual({ status: 'completed', value: 1 });
  });
});
