import { z } from 'zod';
import type { Logger } from 'pino';
import {
  DuplicateDefinitionError,
  InvalidDefinitionError,
  UNMATCHED_ACTIVITY,
  ValidationError,
  describeCause,
  isEventDefinition,
} from '../domain/index.js';
import type {
  EventDefinition,
  EventPayload,
  FieldIssue,
  FieldSpec,
  FieldType,
  HeaderMap,
  MatchResult,
  RawPayload,
} from '../domain/index.js';

/** Payload keys consulted, in order, when no extractor names the activity. */
export const DISCRIMINATOR_FIELDS = ['action', 'event', 'type', 'activity', 'event_type'] as const;

const TYPE_SCHEMAS: Record<FieldType, z.ZodTypeAny> = {
  string: z.string(),
  number: z.number().finite(),
  integer: z.number().int(),
  boolean: z.boolean(),
  object: z.record(z.string(), z.unknown()),
  array: z.array(z.unknown()),
  any: z.unknown(),
};

/** Per-definition counters kept for diagnostics. */
export interface DefinitionStats {
  match_attempts: number;
  successful_matches: number;
  validation_errors: number;
}

export interface FieldSchema {
  readonly name: string;
  readonly type: FieldType;
  readonly required: boolean;
  readonly constraint: string | null;
}

export interface DefinitionSchema {
  readonly name: string;
  readonly description: string | null;
  readonly fields: readonly FieldSchema[];
  readonly triggers: readonly string[];
}

/** Diagnostic view of a payload checked against every definition. */
export interface ValidationReport {
  readonly checked_at: string; // ISO-8601
  readonly total_definitions: number;
  /** Every definition the payload satisfies, in registration order. */
  readonly matches: readonly string[];
  readonly errors: Readonly<Record<string, readonly FieldIssue[]>>;
}

type Attempt =
  | { readonly ok: true; readonly payload: EventPayload }
  | { readonly ok: false; readonly issues: readonly FieldIssue[] };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Reads a top-level key or a dotted path. Missing segments yield undefined. */
export function readField(payload: EventPayload, path: string): unknown {
  let current: unknown = payload;
  for (const key of path.split('.')) {
    if (!isRecord(current) || !Object.hasOwn(current, key)) return undefined;
    current = current[key];
  }
  return current;
}

/**
 * Checks every field of a definition and collects all issues.
 *
 * Null counts as missing. Validators only run once the type check passed.
 */
export function validateFields(fields: readonly FieldSpec[], payload: EventPayload): FieldIssue[] {
  const issues: FieldIssue[] = [];

  for (const field of fields) {
    const value = readField(payload, field.name);

    if (value == null) {
      if (field.required) issues.push({ field: field.name, message: 'is required' });
      continue;
    }

    const typed = TYPE_SCHEMAS[field.type].safeParse(value);
    if (!typed.success) {
      issues.push({ field: field.name, message: typed.error.issues[0]?.message ?? `must be ${field.type}` });
      continue;
    }

    if (field.validator !== undefined) {
      let outcome: true | string;
      try {
        outcome = field.validator(value);
      } catch (err: unknown) {
        outcome = `validator threw: ${describeCause(err)}`;
      }
      if (outcome !== true) issues.push({ field: field.name, message: outcome });
    }
  }

  return issues;
}

/** Default activity extraction: first primitive discriminator field, else the sentinel. */
export function defaultActivity(raw: RawPayload): string {
  for (const key of DISCRIMINATOR_FIELDS) {
    const value = raw[key];
    if ((typeof value === 'string' && value !== '') || typeof value === 'number' || typeof value === 'boolean') {
      return String(value);
    }
  }
  return UNMATCHED_ACTIVITY;
}

/**
 * Ordered table of event definitions with first-match-wins matching.
 *
 * The definition list is an immutable snapshot replaced wholesale on
 * every mutation. `match()` captures one snapshot and runs synchronously,
 * so a concurrent register/unregister is seen either entirely or not at all.
 */
export class PatternRegistry {
  private snapshot: readonly EventDefinition[] = [];
  private readonly stats: Map<string, DefinitionStats> = new Map();
  private readonly log: Logger;

  constructor(log: Logger) {
    this.log = log.child({ component: 'pattern-registry' });
  }

  /** Appends a definition. Lower registration index means higher priority. */
  register(definition: EventDefinition): void {
    this.registerAll([definition]);
  }

  /**
   * Appends several definitions as one mutation.
   * Nothing is registered if any of them is invalid or collides.
   */
  registerAll(definitions: readonly EventDefinition[]): void {
    const taken = new Set(this.snapshot.map((d) => d.name));

    for (const definition of definitions) {
      if (!isEventDefinition(definition)) {
        throw new InvalidDefinitionError('Event definitions must be created with defineEvent()');
      }
      if (taken.has(definition.name)) {
        throw new DuplicateDefinitionError(definition.name);
      }
      taken.add(definition.name);
    }

    if (definitions.length === 0) return;

    this.snapshot = [...this.snapshot, ...definitions];
    for (const definition of definitions) {
      this.stats.set(definition.name, emptyStats());
      this.log.debug({ definition: definition.name, fields: definition.fields.length }, 'Event definition registered');
    }
  }

  /** Removes a definition by name. Returns false when it was not registered. */
  unregister(name: string): boolean {
    return this.unregisterAll([name]).length === 1;
  }

  /** Removes several definitions as one mutation; returns the names actually removed. */
  unregisterAll(names: Iterable<string>): string[] {
    const wanted = new Set(names);
    const removed = this.snapshot.filter((d) => wanted.has(d.name)).map((d) => d.name);
    if (removed.length === 0) return removed;

    this.snapshot = this.snapshot.filter((d) => !wanted.has(d.name));
    for (const name of removed) {
      this.stats.delete(name);
      this.log.debug({ definition: name }, 'Event definition unregistered');
    }
    return removed;
  }

  get(name: string): EventDefinition | undefined {
    return this.snapshot.find((d) => d.name === name);
  }

  has(name: string): boolean {
    return this.get(name) !== undefined;
  }

  /** Current definitions in registration order. */
  definitions(): readonly EventDefinition[] {
    return this.snapshot;
  }

  names(): string[] {
    return this.snapshot.map((d) => d.name);
  }

  get size(): number {
    return this.snapshot.length;
  }

  /**
   * Returns the first definition whose transform and field checks succeed.
   * Rejections along the way are collected in `errors`.
   */
  match(raw: RawPayload, headers: HeaderMap = {}): MatchResult {
    return this.firstMatch(raw, headers, true);
  }

  /**
   * Activity label for a payload.
   *
   * Uses the matched definition's extractor when it yields a non-empty
   * string, otherwise the default discriminator lookup. A throwing
   * extractor is logged and falls back to the default lookup. Without
   * `match`, the payload is matched again with no headers; that lookup
   * does not count in the statistics.
   */
  getActivity(raw: RawPayload, match: MatchResult = this.firstMatch(raw, {}, false)): string {
    if (match.matched && match.definition.activity !== undefined) {
      let extracted: unknown;
      try {
        extracted = match.definition.activity(match.payload, raw);
      } catch (err: unknown) {
        this.log.warn({ err, definition: match.definition.name }, 'Activity extractor failed');
        return defaultActivity(raw);
      }
      if (typeof extracted === 'string' && extracted !== '') return extracted;
    }
    return defaultActivity(raw);
  }

  /**
   * Checks a payload against every definition, not only the first match.
   * Does not touch the match statistics.
   */
  validate(raw: RawPayload, headers: HeaderMap = {}): ValidationReport {
    const definitions = this.snapshot;
    const matches: string[] = [];
    const errors: Record<string, readonly FieldIssue[]> = {};

    for (const definition of definitions) {
      const attempt = attemptDefinition(definition, raw, headers);
      if (attempt.ok) {
        matches.push(definition.name);
      } else {
        errors[definition.name] = attempt.issues;
      }
    }

    return {
      checked_at: new Date().toISOString(),
      total_definitions: definitions.length,
      matches,
      errors,
    };
  }

  /**
   * Runs one named definition against a payload and returns the canonical
   * payload. Throws ValidationError listing every issue.
   */
  parseWith(name: string, raw: RawPayload, headers: HeaderMap = {}): EventPayload {
    const definition = this.get(name);
    if (definition === undefined) {
      throw new InvalidDefinitionError(`Event definition "${name}" is not registered`, name);
    }

    const attempt = attemptDefinition(definition, raw, headers);
    if (!attempt.ok) throw new ValidationError(name, attempt.issues);
    return attempt.payload;
  }

  /** Field layout of every definition, in registration order. */
  exportSchema(): DefinitionSchema[] {
    return this.snapshot.map((definition) => ({
      name: definition.name,
      description: definition.description ?? null,
      fields: definition.fields.map((field) => ({
        name: field.name,
        type: field.type,
        required: field.required,
        constraint: field.description ?? (field.validator ? 'custom validator' : null),
      })),
      triggers: definition.triggers.map((t) => t.verb),
    }));
  }

  private firstMatch(raw: RawPayload, headers: HeaderMap, counted: boolean): MatchResult {
    const definitions = this.snapshot;
    const errors: Record<string, readonly FieldIssue[]> = {};

    for (const definition of definitions) {
      const stats = counted ? this.stats.get(definition.name) : undefined;
      if (stats) stats.match_attempts++;

      const attempt = attemptDefinition(definition, raw, headers);

      if (attempt.ok) {
        if (stats) stats.successful_matches++;
        this.log.debug({ definition: definition.name }, 'Pattern matched');
        return { matched: true, definition, payload: attempt.payload, errors };
      }

      if (stats) stats.validation_errors++;
      errors[definition.name] = attempt.issues;
    }

    this.log.debug({ attempted: definitions.length }, 'No pattern matched');
    return { matched: false, definition: null, payload: null, errors };
  }

  getStats(): Record<string, DefinitionStats> {
    const copy: Record<string, DefinitionStats> = {};
    for (const [name, stats] of this.stats) {
      copy[name] = { ...stats };
    }
    return copy;
  }

  resetStats(): void {
    for (const name of this.stats.keys()) {
      this.stats.set(name, emptyStats());
    }
    this.log.info('Registry statistics reset');
  }
}

function emptyStats(): DefinitionStats {
  return { match_attempts: 0, successful_matches: 0, validation_errors: 0 };
}

function attemptDefinition(definition: EventDefinition, raw: RawPayload, headers: HeaderMap): Attempt {
  let payload: unknown = raw;

  if (definition.transform !== undefined) {
    try {
      payload = definition.transform(raw, headers);
    } catch (err: unknown) {
      return { ok: false, issues: [{ field: '$', message: `transform failed: ${describeCause(err)}` }] };
    }
  }

  if (!isRecord(payload)) {
    return { ok: false, issues: [{ field: '$', message: 'transform must return an object' }] };
  }

  const issues = validateFields(definition.fields, payload);
  return issues.length === 0 ? { ok: true, payload } : { ok: false, issues };
}
