import type { Logger } from 'pino';
import {
  ExecutionFailure,
  HandlerError,
  HandlerTimeoutError,
  isFailedOutcome,
} from '../domain/index.js';
import type { HandlerDescriptor, HandlerInvocation, HandlerOutcome } from '../domain/index.js';
import { AdmissionGate } from './admission-gate.js';

/** One unit of work handed to the controller. */
export interface Invocation {
  readonly descriptor: HandlerDescriptor;
  readonly run: (signal: AbortSignal) => unknown;
}

export interface ExecuteOptions {
  readonly timeout_seconds: number;
  readonly swallow_exceptions: boolean;
}

interface FirstFailure {
  readonly error: HandlerError;
  readonly failed: HandlerDescriptor;
  readonly succeeded: readonly HandlerDescriptor[];
}

/**
 * Runs handler invocations concurrently under one admission gate.
 *
 * The gate belongs to the controller, not to a call, so the bound holds
 * across every dispatch sharing this instance. Each admitted handler gets
 * its own timer and AbortSignal. A timeout or cancellation only stops the
 * controller from waiting; the handler decides whether to honour its signal.
 */
export class ConcurrencyController {
  private readonly gate: AdmissionGate;
  private readonly log: Logger;

  constructor(maxConcurrent: number, log: Logger) {
    this.gate = new AdmissionGate(maxConcurrent);
    this.log = log.child({ component: 'concurrency-controller' });
  }

  get maxConcurrent(): number {
    return this.gate.limit;
  }

  /** Handlers currently holding a slot, across all callers. */
  get active(): number {
    return this.gate.active;
  }

  /** Handlers queued for a slot, across all callers. */
  get waiting(): number {
    return this.gate.waiting;
  }

  /**
   * Executes every invocation and returns outcomes in input order.
   *
   * With `swallow_exceptions`, every invocation runs to success, error or
   * timeout independently. Without it, the first error or timeout aborts
   * all other running and queued invocations and the call rejects with
   * ExecutionFailure.
   */
  async execute(invocations: readonly Invocation[], options: ExecuteOptions): Promise<HandlerInvocation[]> {
    const cancel = new AbortController();
    const outcomes: Array<HandlerOutcome | undefined> = invocations.map(() => undefined);
    const state: { failure?: FirstFailure } = {};

    await Promise.all(invocations.map(async (invocation, index) => {
      const outcome = await this.runOne(invocation, options.timeout_seconds, cancel.signal);
      outcomes[index] = outcome;

      if (options.swallow_exceptions || state.failure !== undefined || !isFailedOutcome(outcome)) return;

      state.failure = {
        error: outcome.error,
        failed: invocation.descriptor,
        succeeded: invocations
          .filter((_, i) => outcomes[i]?.status === 'success')
          .map((inv) => inv.descriptor),
      };
      cancel.abort(outcome.error);
    }));

    const results = invocations.map((invocation, index): HandlerInvocation => ({
      handler: invocation.descriptor,
      outcome: outcomes[index] ?? { status: 'cancelled', duration_ms: 0 },
    }));

    if (state.failure !== undefined) {
      const { error, failed, succeeded } = state.failure;
      throw new ExecutionFailure(error, failed, succeeded, results);
    }

    return results;
  }

  private async runOne(invocation: Invocation, timeoutSeconds: number, cancel: AbortSignal): Promise<HandlerOutcome> {
    const release = await this.gate.acquire(cancel);
    if (release === null) return { status: 'cancelled', duration_ms: 0 };

    const { descriptor } = invocation;
    const controller = new AbortController();
    const started = performance.now();
    const elapsed = (): number => performance.now() - started;

    let timer: NodeJS.Timeout | undefined;
    let onCancel: (() => void) | undefined;

    try {
      const outcome = await new Promise<HandlerOutcome>((resolve) => {
        timer = setTimeout(() => {
          const error = new HandlerTimeoutError(descriptor.name, timeoutSeconds);
          controller.abort(error);
          resolve({ status: 'timeout', duration_ms: elapsed(), error });
        }, timeoutSeconds * 1000);

        onCancel = () => {
          controller.abort(cancel.reason);
          resolve({ status: 'cancelled', duration_ms: elapsed() });
        };

        if (cancel.aborted) {
          onCancel();
          return;
        }
        cancel.addEventListener('abort', onCancel, { once: true });

        // A fail-fast abort can land between admission and this microtask.
        void Promise.resolve()
          .then(() => (controller.signal.aborted ? undefined : invocation.run(controller.signal)))
          .then(
            () => resolve({ status: 'success', duration_ms: elapsed() }),
            (err: unknown) => resolve({
              status: 'error',
              duration_ms: elapsed(),
              error: new HandlerError(descriptor.name, err),
            }),
          );
      });

      this.logOutcome(descriptor, outcome);
      return outcome;
    } finally {
      clearTimeout(timer);
      if (onCancel !== undefined) cancel.removeEventListener('abort', onCancel);
      release();
    }
  }

  private logOutcome(descriptor: HandlerDescriptor, outcome: HandlerOutcome): void {
    const context = { handler: descriptor.name, handler_id: descriptor.id, duration_ms: outcome.duration_ms };

    switch (outcome.status) {
      case 'success':
        this.log.debug(context, 'Handler completed');
        break;
      case 'error':
        this.log.error({ ...context, err: outcome.error.cause }, 'Handler failed');
        break;
      case 'timeout':
        this.log.warn({ ...context, timeout_seconds: outcome.error.timeout_seconds }, 'Handler timed out');
        break;
      case 'cancelled':
        this.log.debug(context, 'Handler cancelled');
        break;
    }
  }
}
