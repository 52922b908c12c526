import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';
import {
  DispatchFailure,
  ExecutionFailure,
  isFailedOutcome,
  verbCovers,
} from '../domain/index.js';
import type {
  DispatchResult,
  EventDefinition,
  EventHandler,
  HandlerDescriptor,
  HandlerError,
  HandlerKind,
  HandlerInvocation,
  HandlerRegistration,
  HandlerSpec,
  HeaderMap,
  MatchResult,
  RawPayload,
  WebhookEvent,
} from '../domain/index.js';
import type { PatternRegistry, ValidationReport } from './pattern-registry.js';
import { ConcurrencyController } from './concurrency-controller.js';
import type { Invocation } from './concurrency-controller.js';
import { MetricsCollector } from './metrics-collector.js';
import type { MetricsSnapshot } from './metrics-collector.js';
import { MAX_TIMEOUT_SECONDS, timeoutSecondsSchema } from './config-schema.js';
import type { DispatchConfig } from './config-schema.js';

export type EventBusConfig = Pick<
  DispatchConfig,
  'timeout_seconds' | 'max_concurrent_handlers' | 'swallow_exceptions' | 'enable_metrics' | 'activity_groups'
>;

export interface EventBusOptions {
  readonly config: EventBusConfig;
  readonly log: Logger;
  readonly metrics?: MetricsCollector | undefined;
  readonly controller?: ConcurrencyController | undefined;
}

export interface DispatchOptions {
  /**
   * Overrides the bus-wide handler timeout for this dispatch only.
   * Must be positive, finite and at most MAX_TIMEOUT_SECONDS.
   */
  readonly timeout_seconds?: number | undefined;
}

/** A batch of definitions and handlers to add in one exclusive step. */
export interface ChangeSet {
  readonly definitions?: readonly EventDefinition[] | undefined;
  readonly handlers?: readonly HandlerSpec[] | undefined;
}

/** What `applyChanges()` actually added; pass it to `revertChanges()` to undo. */
export interface AppliedChanges {
  readonly definitions: readonly string[];
  readonly handlers: readonly HandlerRegistration[];
}

/**
 * Routes raw payloads to handlers.
 *
 * Handler registrations live in an immutable snapshot array, like the
 * registry's definitions. A dispatch reads the match and the handler
 * snapshot in the same synchronous step, so it never observes a plugin's
 * definitions without its handlers or the other way round.
 */
export class EventBus {
  readonly registry: PatternRegistry;
  private readonly config: EventBusConfig;
  private readonly log: Logger;
  private readonly metrics: MetricsCollector;
  private readonly controller: ConcurrencyController;
  private readonly groups: ReadonlyMap<string, ReadonlySet<string>>;
  private registrations: readonly HandlerRegistration[] = [];
  private nextId = 0;

  constructor(registry: PatternRegistry, options: EventBusOptions) {
    this.registry = registry;
    this.config = options.config;
    this.log = options.log.child({ component: 'event-bus' });
    this.metrics = options.metrics ?? new MetricsCollector();
    this.controller = options.controller ?? new ConcurrencyController(options.config.max_concurrent_handlers, options.log);
    this.groups = new Map(
      Object.entries(options.config.activity_groups).map(([name, activities]) => [name, new Set(activities)]),
    );
  }

  // --------------------------------------------------
  // Registration
  // --------------------------------------------------

  registerHandler(kind: HandlerKind, selector: Iterable<string>, handler: EventHandler, name?: string): HandlerRegistration {
    const [registration] = this.applyChanges({ handlers: [{ kind, selector, handler, name }] }).handlers;
    if (registration === undefined) {
      throw new Error('Handler registration produced no entry');
    }
    return registration;
  }

  onPattern(definitions: string | readonly string[], handler: EventHandler, name?: string): HandlerRegistration {
    return this.registerHandler('pattern', toList(definitions), handler, name);
  }

  onActivity(activities: string | readonly string[], handler: EventHandler, name?: string): HandlerRegistration {
    return this.registerHandler('activity', toList(activities), handler, name);
  }

  onGroup(groups: string | readonly string[], handler: EventHandler, name?: string): HandlerRegistration {
    return this.registerHandler('group', toList(groups), handler, name);
  }

  onAny(handler: EventHandler, name?: string): HandlerRegistration {
    return this.registerHandler('any', [], handler, name);
  }

  /** Removes one registration. Returns false if it was not live on this bus. */
  unregisterHandler(handle: HandlerRegistration): boolean {
    if (!this.registrations.includes(handle)) return false;
    this.registrations = this.registrations.filter((r) => r !== handle);
    this.log.debug({ handler: handle.name, handler_id: handle.id }, 'Handler unregistered');
    return true;
  }

  /**
   * Adds definitions and handlers as one mutation.
   *
   * Definitions are validated by the registry first; if they are
   * rejected nothing is added at all.
   */
  applyChanges(changes: ChangeSet): AppliedChanges {
    const definitions = changes.definitions ?? [];
    const specs = changes.handlers ?? [];

    this.registry.registerAll(definitions);

    const handlers = specs.map((spec) => this.createRegistration(spec));
    if (handlers.length > 0) {
      this.registrations = [...this.registrations, ...handlers];
    }

    return { definitions: definitions.map((d) => d.name), handlers };
  }

  /** Removes exactly what an `applyChanges()` call added. */
  revertChanges(applied: AppliedChanges): void {
    const owned = new Set(applied.handlers);
    this.registrations = this.registrations.filter((r) => !owned.has(r));
    this.registry.unregisterAll(applied.definitions);
  }

  private createRegistration(spec: HandlerSpec): HandlerRegistration {
    const selector = spec.kind === 'any' ? new Set<string>() : new Set(spec.selector);
    const name = spec.name ?? (spec.handler.name || `${spec.kind}-handler`);

    if (spec.kind === 'group') {
      for (const group of selector) {
        if (!this.groups.has(group)) {
          this.log.warn({ handler: name, group }, 'Handler references an unknown activity group');
        }
      }
    }

    const registration: HandlerRegistration = Object.freeze({
      id: this.nextId++,
      kind: spec.kind,
      selector,
      handler: spec.handler,
      name,
    });

    this.log.debug({ handler: name, kind: spec.kind, selector: [...selector] }, 'Handler registered');
    return registration;
  }

  // --------------------------------------------------
  // Dispatch
  // --------------------------------------------------

  /**
   * Matches a raw payload and runs every applicable handler.
   *
   * Resolves with the aggregated result. Rejects with DispatchFailure only
   * when exceptions are not swallowed and a handler failed, and with
   * RangeError, before any matching, for an out-of-range timeout override.
   */
  async dispatchRaw(
    raw: RawPayload,
    headers: HeaderMap = {},
    source_info: unknown = null,
    options: DispatchOptions = {},
  ): Promise<DispatchResult> {
    const started = performance.now();
    const timeout_seconds = this.timeoutFor(options);

    // Match and handler snapshot are read in the same synchronous step.
    const registrations = this.registrations;
    const match = this.registry.match(raw, headers);
    const activity = this.registry.getActivity(raw, match);
    const event = buildEvent(raw, headers, source_info, match, activity);

    return this.run(event, registrations, started, timeout_seconds);
  }

  /** Runs handlers for an already built event, skipping pattern matching. */
  async dispatchEvent(event: WebhookEvent, options: DispatchOptions = {}): Promise<DispatchResult> {
    const timeout_seconds = this.timeoutFor(options);
    return this.run(event, this.registrations, performance.now(), timeout_seconds);
  }

  /** Registrations that would run for the event, in registration order. */
  resolveHandlers(event: WebhookEvent): HandlerRegistration[] {
    return this.resolve(event, this.registrations);
  }

  /** Diagnostic: which definitions a payload satisfies and why the others fail. */
  validate(raw: RawPayload, headers: HeaderMap = {}): ValidationReport {
    return this.registry.validate(raw, headers);
  }

  private timeoutFor(options: DispatchOptions): number {
    if (options.timeout_seconds === undefined) return this.config.timeout_seconds;
    if (!timeoutSecondsSchema.safeParse(options.timeout_seconds).success) {
      throw new RangeError(
        `timeout_seconds must be a positive number no greater than ${MAX_TIMEOUT_SECONDS}, got ${options.timeout_seconds}`,
      );
    }
    return options.timeout_seconds;
  }

  private async run(
    event: WebhookEvent,
    registrations: readonly HandlerRegistration[],
    started: number,
    timeout_seconds: number,
  ): Promise<DispatchResult> {
    const invocations = [
      ...this.resolve(event, registrations).map(toInvocation(event)),
      ...triggerInvocations(event),
    ];

    this.log.debug(
      { event_id: event.event_id, definition: event.definition?.name ?? null, activity: event.activity, handlers: invocations.length },
      'Dispatching event',
    );

    let outcomes: HandlerInvocation[];
    try {
      outcomes = await this.controller.execute(invocations, {
        timeout_seconds,
        swallow_exceptions: this.config.swallow_exceptions,
      });
    } catch (err: unknown) {
      if (!(err instanceof ExecutionFailure)) throw err;

      const result = buildResult(event, err.invocations, started);
      this.record(result);
      this.log.error(
        { err: err.error, event_id: event.event_id, handler: err.failed.name },
        'Dispatch aborted by handler failure',
      );
      throw new DispatchFailure(err.error, err.succeeded, result);
    }

    const result = buildResult(event, outcomes, started);
    this.record(result);

    if (!result.success) {
      this.log.warn(
        { event_id: event.event_id, failed: [...result.failed].map((h) => h.name) },
        'Dispatch completed with handler failures',
      );
    }

    return result;
  }

  private resolve(event: WebhookEvent, registrations: readonly HandlerRegistration[]): HandlerRegistration[] {
    return registrations.filter((registration) => this.selects(registration, event));
  }

  private selects(registration: HandlerRegistration, event: WebhookEvent): boolean {
    switch (registration.kind) {
      case 'pattern':
        return event.definition !== null && registration.selector.has(event.definition.name);
      case 'activity':
        return registration.selector.has(event.activity);
      case 'group':
        for (const group of registration.selector) {
          if (this.groups.get(group)?.has(event.activity)) return true;
        }
        return false;
      case 'any':
        return true;
    }
  }

  private record(result: DispatchResult): void {
    if (this.config.enable_metrics) {
      this.metrics.record(result);
    }
  }

  // --------------------------------------------------
  // Introspection
  // --------------------------------------------------

  handlers(): readonly HandlerRegistration[] {
    return this.registrations;
  }

  getHandlerCounts(): Record<HandlerKind, number> {
    const counts: Record<HandlerKind, number> = { pattern: 0, activity: 0, group: 0, any: 0 };
    for (const registration of this.registrations) {
      counts[registration.kind]++;
    }
    return counts;
  }

  /** Definition names targeted by pattern handlers. */
  getRegisteredPatterns(): string[] {
    return selectorsOf(this.registrations, 'pattern');
  }

  /** Activities targeted by activity handlers. */
  getRegisteredActivities(): string[] {
    return selectorsOf(this.registrations, 'activity');
  }

  activityGroups(): ReadonlyMap<string, ReadonlySet<string>> {
    return this.groups;
  }

  get concurrency(): ConcurrencyController {
    return this.controller;
  }

  getMetrics(): MetricsSnapshot {
    return this.metrics.getMetrics();
  }

  resetMetrics(): void {
    this.metrics.reset();
    this.log.info('Bus metrics reset');
  }
}

function toList(value: string | readonly string[]): readonly string[] {
  return typeof value === 'string' ? [value] : value;
}

function selectorsOf(registrations: readonly HandlerRegistration[], kind: HandlerKind): string[] {
  const seen = new Set<string>();
  for (const registration of registrations) {
    if (registration.kind !== kind) continue;
    for (const value of registration.selector) seen.add(value);
  }
  return [...seen];
}

function buildEvent(
  raw: RawPayload,
  headers: HeaderMap,
  source_info: unknown,
  match: MatchResult,
  activity: string,
): WebhookEvent {
  return {
    event_id: randomUUID(),
    definition: match.definition,
    payload: match.matched ? match.payload : raw,
    raw,
    headers,
    source_info,
    activity,
    received_at: new Date().toISOString(),
  };
}

function toInvocation(event: WebhookEvent) {
  return (registration: HandlerRegistration): Invocation => ({
    descriptor: { id: registration.id, name: registration.name, kind: registration.kind },
    run: (signal) => registration.handler(event, signal),
  });
}

/**
 * Trigger bindings of the matched definition whose verb covers the
 * activity, in declaration order. Their ids are negative so they never
 * collide with handler registration indexes.
 */
function triggerInvocations(event: WebhookEvent): Invocation[] {
  const definition = event.definition;
  if (definition === null) return [];

  return definition.triggers
    .map((trigger, index) => ({ trigger, index }))
    .filter(({ trigger }) => verbCovers(trigger.verb, event.activity))
    .map(({ trigger, index }): Invocation => ({
      descriptor: { id: -(index + 1), name: `${definition.name}.${trigger.name}`, kind: 'trigger' },
      run: (signal) => trigger.run(event, signal),
    }));
}

function buildResult(event: WebhookEvent, invocations: readonly HandlerInvocation[], started: number): DispatchResult {
  const errors = new Map<HandlerDescriptor, HandlerError>();
  const failed = new Set<HandlerDescriptor>();

  for (const { handler, outcome } of invocations) {
    if (isFailedOutcome(outcome)) {
      errors.set(handler, outcome.error);
      failed.add(handler);
    }
  }

  return {
    event,
    matched: event.definition !== null,
    invocations,
    success: failed.size === 0,
    errors,
    failed,
    elapsed_ms: performance.now() - started,
  };
}
