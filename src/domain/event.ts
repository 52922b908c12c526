/**
 * Core domain types for the webhook event model.
 *
 * These types define the shape of a payload as it flows from the
 * ingress layer through matching and into handlers. They carry no
 * framework dependencies.
 */
import type { EventDefinition } from './definition.js';

/** Arbitrarily nested, schema-less payload as received from the sender. */
export type RawPayload = Record<string, unknown>;

/** Canonical payload produced by a definition's transform. */
export type EventPayload = Record<string, unknown>;

/** Insertion-ordered request headers. */
export type HeaderMap = Readonly<Record<string, string>>;

/** Activity label used when nothing in the payload names one. */
export const UNMATCHED_ACTIVITY = 'unmatched';

/**
 * Event handed to every handler of one dispatch.
 *
 * `definition === null` means no registered pattern matched and
 * `payload` is the raw passthrough. That is a normal outcome, not an error.
 */
export interface WebhookEvent {
  readonly event_id: string;
  readonly definition: EventDefinition | null;
  readonly payload: EventPayload;
  readonly raw: RawPayload;
  readonly headers: HeaderMap;
  /** Opaque value from the ingress layer; never inspected by the core. */
  readonly source_info: unknown;
  readonly activity: string;
  readonly received_at: string; // ISO-8601
}
