import type { DispatchResult } from '../domain/index.js';

/**
 * Point-in-time view of the dispatch counters.
 *
 * Times are milliseconds. Ratios are 0 while their denominator is 0.
 */
export interface MetricsSnapshot {
  readonly total_dispatches: number;
  readonly successes: number;
  readonly failures: number;
  readonly success_rate: number;
  readonly total_processing_time: number;
  readonly average_processing_time: number;
  readonly per_activity_counts: Readonly<Record<string, number>>;
  readonly pattern_matches: number;
  readonly unmatched_dispatches: number;
  readonly handler_executions: number;
  readonly handler_failures: number;
  readonly handler_timeouts: number;
  readonly handler_success_rate: number;
}

interface Counters {
  total_dispatches: number;
  successes: number;
  failures: number;
  total_processing_time: number;
  per_activity_counts: Map<string, number>;
  pattern_matches: number;
  unmatched_dispatches: number;
  handler_executions: number;
  handler_failures: number;
  handler_timeouts: number;
}

function zeroed(): Counters {
  return {
    total_dispatches: 0,
    successes: 0,
    failures: 0,
    total_processing_time: 0,
    per_activity_counts: new Map(),
    pattern_matches: 0,
    unmatched_dispatches: 0,
    handler_executions: 0,
    handler_failures: 0,
    handler_timeouts: 0,
  };
}

function ratio(numerator: number, denominator: number): number {
  return denominator === 0 ? 0 : numerator / denominator;
}

/**
 * Cumulative dispatch counters.
 *
 * `record()` and `reset()` are synchronous, so on the single-threaded
 * event loop each one runs to completion before any other touches the
 * counters: `successes + failures === total_dispatches` holds after any
 * interleaving of dispatches and resets.
 */
export class MetricsCollector {
  private counters: Counters = zeroed();

  record(result: DispatchResult): void {
    const c = this.counters;

    c.total_dispatches++;
    if (result.success) {
      c.successes++;
    } else {
      c.failures++;
    }
    c.total_processing_time += result.elapsed_ms;

    const activity = result.event.activity;
    c.per_activity_counts.set(activity, (c.per_activity_counts.get(activity) ?? 0) + 1);

    if (result.matched) {
      c.pattern_matches++;
    } else {
      c.unmatched_dispatches++;
    }

    for (const { outcome } of result.invocations) {
      if (outcome.status === 'cancelled') continue;
      c.handler_executions++;
      if (outcome.status === 'error') c.handler_failures++;
      if (outcome.status === 'timeout') {
        c.handler_failures++;
        c.handler_timeouts++;
      }
    }
  }

  getMetrics(): MetricsSnapshot {
    const c = this.counters;
    return {
      total_dispatches: c.total_dispatches,
      successes: c.successes,
      failures: c.failures,
      success_rate: ratio(c.successes, c.total_dispatches),
      total_processing_time: c.total_processing_time,
      average_processing_time: ratio(c.total_processing_time, c.total_dispatches),
      per_activity_counts: Object.fromEntries(c.per_activity_counts),
      pattern_matches: c.pattern_matches,
      unmatched_dispatches: c.unmatched_dispatches,
      handler_executions: c.handler_executions,
      handler_failures: c.handler_failures,
      handler_timeouts: c.handler_timeouts,
      handler_success_rate: ratio(c.handler_executions - c.handler_failures, c.handler_executions),
    };
  }

  /** Zeroes every counter by swapping in a fresh set. */
  reset(): void {
    this.counters = zeroed();
  }
}
