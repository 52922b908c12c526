import { describe, it, expect } from 'vitest';
import { ConcurrencyController } from '../../src/application/concurrency-controller.js';
import type { Invocation } from '../../src/application/concurrency-controller.js';
import {
  ExecutionFailure,
  HandlerError,
  HandlerTimeoutError,
} from '../../src/domain/index.js';
import { fakeLogger, sleep } from '../helpers.js';

let nextId = 0;

function invocation(name: string, run: Invocation['run']): Invocation {
  return { descriptor: { id: nextId++, name, kind: 'any' }, run };
}

const SWALLOW = { timeout_seconds: 5, swallow_exceptions: true };
const FAIL_FAST = { timeout_seconds: 5, swallow_exceptions: false };

describe('ConcurrencyController', () => {
  it('returns outcomes in input order regardless of completion order', async () => {
    const controller = new ConcurrencyController(10, fakeLogger());
    const finished: string[] = [];

    const results = await controller.execute([
      invocation('slow', async () => {
        await sleep(40);
        finished.push('slow');
      }),
      invocation('fast', () => {
        finished.push('fast');
      }),
    ], SWALLOW);

    expect(finished).toEqual(['fast', 'slow']);
    expect(results.map((r) => [r.handler.name, r.outcome.status])).toEqual([
      ['slow', 'success'],
      ['fast', 'success'],
    ]);
  });

  it('maps sync throws and async rejections to HandlerError', async () => {
    const controller = new ConcurrencyController(10, fakeLogger());

    const results = await controller.execute([
      invocation('sync', () => {
        throw new Error('sync boom');
      }),
      invocation('async', async () => {
        await sleep(5);
        throw new Error('async boom');
      }),
      invocation('fine', () => 'ok'),
    ], SWALLOW);

    const [sync, rejected, fine] = results.map((r) => r.outcome);
    expect(sync?.status).toBe('error');
    expect(rejected?.status).toBe('error');
    expect(fine?.status).toBe('success');

    if (sync?.status !== 'error') return;
    expect(sync.error).toBeInstanceOf(HandlerError);
    expect(sync.error.handler).toBe('sync');
    expect(sync.error.message).toBe('Handler "sync" failed: sync boom');
  });

  it('times out a handler, aborts its signal and stops waiting', async () => {
    const controller = new ConcurrencyController(10, fakeLogger());
    let seen: AbortSignal | undefined;

    const started = performance.now();
    const [result] = await controller.execute([
      invocation('sleepy', (signal) => {
        seen = signal;
        return sleep(1_000, signal);
      }),
    ], { timeout_seconds: 0.01, swallow_exceptions: true });

    expect(performance.now() - started).toBeLessThan(500);
    expect(result?.outcome.status).toBe('timeout');
    if (result?.outcome.status !== 'timeout') return;
    expect(result.outcome.error).toBeInstanceOf(HandlerTimeoutError);
    expect(result.outcome.error.timeout_seconds).toBe(0.01);
    expect(result.outcome.error.code).toBe('HANDLER_TIMEOUT');
    expect(seen?.aborted).toBe(true);
    expect(seen?.reason).toBe(result.outcome.error);
  });

  it('releases the slot of a timed out handler', async () => {
    const controller = new ConcurrencyController(1, fakeLogger());

    const results = await controller.execute([
      invocation('hang', () => new Promise(() => undefined)),
      invocation('next', () => undefined),
    ], { timeout_seconds: 0.02, swallow_exceptions: true });

    expect(results.map((r) => r.outcome.status)).toEqual(['timeout', 'success']);
    expect(controller.active).toBe(0);
  });

  it('never runs more handlers than the bound', async () => {
    const controller = new ConcurrencyController(1, fakeLogger());
    let running = 0;
    let peak = 0;

    const task = async () => {
      running++;
      peak = Math.max(peak, running);
      await sleep(100);
      running--;
    };

    const started = performance.now();
    await controller.execute([invocation('a', task), invocation('b', task), invocation('c', task)], SWALLOW);
    const elapsed = performance.now() - started;

    expect(peak).toBe(1);
    expect(elapsed).toBeGreaterThanOrEqual(295);
  });

  it('shares the bound across concurrent executions', async () => {
    const controller = new ConcurrencyController(2, fakeLogger());
    let running = 0;
    let peak = 0;

    const task = async () => {
      running++;
      peak = Math.max(peak, running);
      await sleep(30);
      running--;
    };

    await Promise.all([
      controller.execute([invocation('a1', task), invocation('a2', task)], SWALLOW),
      controller.execute([invocation('b1', task), invocation('b2', task)], SWALLOW),
    ]);

    expect(peak).toBe(2);
    expect(controller.active).toBe(0);
    expect(controller.waiting).toBe(0);
  });

  it('cancels the rest and throws on the first failure when not swallowing', async () => {
    const controller = new ConcurrencyController(2, fakeLogger());
    let queuedRan = false;
    let runningSignal: AbortSignal | undefined;

    const attempt = controller.execute([
      invocation('fails', async () => {
        await sleep(10);
        throw new Error('boom');
      }),
      invocation('running', (signal) => {
        runningSignal = signal;
        return sleep(1_000, signal);
      }),
      invocation('queued', () => {
        queuedRan = true;
      }),
    ], FAIL_FAST);

    const error = await attempt.catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ExecutionFailure);
    if (!(error instanceof ExecutionFailure)) return;
    expect(error.failed.name).toBe('fails');
    expect(error.error.message).toBe('Handler "fails" failed: boom');
    expect(error.succeeded).toEqual([]);
    expect(error.invocations.map((i) => i.outcome.status)).toEqual(['error', 'cancelled', 'cancelled']);
    expect(runningSignal?.aborted).toBe(true);
    expect(queuedRan).toBe(false);
    expect(controller.active).toBe(0);
  });

  it('lists handlers that succeeded before the failure', async () => {
    const controller = new ConcurrencyController(5, fakeLogger());

    const error = await controller.execute([
      invocation('quick', () => undefined),
      invocation('fails', async () => {
        await sleep(20);
        throw new Error('late');
      }),
    ], FAIL_FAST).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ExecutionFailure);
    if (!(error instanceof ExecutionFailure)) return;
    expect(error.succeeded.map((d) => d.name)).toEqual(['quick']);
  });

  it('treats a timeout as a failure when not swallowing', async () => {
    const controller = new ConcurrencyController(5, fakeLogger());

    const error = await controller.execute([
      invocation('hang', () => new Promise(() => undefined)),
    ], { timeout_seconds: 0.01, swallow_exceptions: false }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ExecutionFailure);
    if (!(error instanceof ExecutionFailure)) return;
    expect(error.error).toBeInstanceOf(HandlerTimeoutError);
  });

  it('returns an empty list for no invocations', async () => {
    const controller = new ConcurrencyController(1, fakeLogger());
    expect(await controller.execute([], FAIL_FAST)).toEqual([]);
  });
});
