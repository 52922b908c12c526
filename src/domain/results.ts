import type { EventDefinition } from './definition.js';
import type { EventPayload, WebhookEvent } from './event.js';
import type { HandlerError, HandlerTimeoutError } from './errors.js';
import type { HandlerKind } from './handler.js';

/** One failed field check. `field` is the dotted path, or `$` for the whole payload. */
export interface FieldIssue {
  readonly field: string;
  readonly message: string;
}

/** Issues per attempted definition name, in attempt order. */
export type MatchErrors = Readonly<Record<string, readonly FieldIssue[]>>;

/**
 * Result of matching one payload against the registry.
 *
 * `errors` holds the issues of every definition tried and rejected
 * before the winner (or of all of them when nothing matched).
 */
export type MatchResult =
  | {
      readonly matched: true;
      readonly definition: EventDefinition;
      readonly payload: EventPayload;
      readonly errors: MatchErrors;
    }
  | {
      readonly matched: false;
      readonly definition: null;
      readonly payload: null;
      readonly errors: MatchErrors;
    };

/** Identifies one handler (or definition trigger) within a dispatch. */
export interface HandlerDescriptor {
  readonly id: number;
  readonly name: string;
  readonly kind: HandlerKind | 'trigger';
}

export type HandlerOutcome =
  | { readonly status: 'success'; readonly duration_ms: number }
  | { readonly status: 'error'; readonly duration_ms: number; readonly error: HandlerError }
  | { readonly status: 'timeout'; readonly duration_ms: number; readonly error: HandlerTimeoutError }
  | { readonly status: 'cancelled'; readonly duration_ms: number };

export type OutcomeStatus = HandlerOutcome['status'];

export interface HandlerInvocation {
  readonly handler: HandlerDescriptor;
  readonly outcome: HandlerOutcome;
}

/**
 * Aggregated outcome of one dispatch.
 *
 * `invocations` preserves registration order regardless of the order in
 * which handlers finished. `errors` and `failed` are keyed by the same
 * descriptor objects found in `invocations`.
 */
export interface DispatchResult {
  readonly event: WebhookEvent;
  readonly matched: boolean;
  readonly invocations: readonly HandlerInvocation[];
  readonly success: boolean;
  readonly errors: ReadonlyMap<HandlerDescriptor, HandlerError>;
  readonly failed: ReadonlySet<HandlerDescriptor>;
  readonly elapsed_ms: number;
}

/** True for outcomes that count as a handler failure. */
export function isFailedOutcome(
  outcome: HandlerOutcome,
): outcome is Extract<HandlerOutcome, { status: 'error' | 'timeout' }> {
  return outcome.status === 'error' || outcome.status === 'timeout';
}
