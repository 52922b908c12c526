import { z } from 'zod';
import type { EventPayload, HeaderMap, RawPayload, WebhookEvent } from './event.js';
import { InvalidDefinitionError } from './errors.js';

/** Field types a definition can require. */
export const FIELD_TYPES = ['string', 'number', 'integer', 'boolean', 'object', 'array', 'any'] as const;
export type FieldType = (typeof FIELD_TYPES)[number];

/**
 * Result of a field validator: `true` when the value is acceptable,
 * otherwise a message describing what is wrong.
 */
export type ValidationOutcome = true | string;

export type FieldValidator = (value: unknown) => ValidationOutcome;

export interface FieldSpec {
  /** Top-level key or dotted path into nested objects (`repository.name`). */
  readonly name: string;
  readonly type: FieldType;
  readonly required: boolean;
  readonly validator?: FieldValidator | undefined;
  /** Human-readable constraint, surfaced by schema export. */
  readonly description?: string | undefined;
}

/** Maps the raw payload to the canonical shape validated by the field schema. */
export type PayloadTransform = (raw: RawPayload, headers: HeaderMap) => EventPayload;

/** Derives the activity label for a matched payload. Empty or nullish falls back to the default. */
export type ActivityExtractor = (payload: EventPayload, raw: RawPayload) => string | null | undefined;

export type TriggerCallable = (event: WebhookEvent, signal: AbortSignal) => unknown;

export interface TriggerBinding {
  /** Lifecycle verb (`create`, `update`, `any`, ...) or a literal activity. */
  readonly verb: string;
  readonly name: string;
  readonly run: TriggerCallable;
}

const DEFINITION_BRAND: unique symbol = Symbol.for('hookbus.definition');

/**
 * Immutable event pattern.
 *
 * Produced by `defineEvent()` only; the registry rejects look-alikes.
 */
export interface EventDefinition {
  readonly [DEFINITION_BRAND]: true;
  readonly name: string;
  readonly description: string | undefined;
  readonly fields: readonly FieldSpec[];
  readonly transform: PayloadTransform | undefined;
  readonly activity: ActivityExtractor | undefined;
  readonly triggers: readonly TriggerBinding[];
}

/**
 * Activities covered by each lifecycle verb.
 *
 * A verb outside this table matches only the activity of the same name;
 * `any` matches every activity.
 */
export const TRIGGER_VERBS: Readonly<Record<string, readonly string[]>> = {
  create: ['create', 'created', 'add', 'added'],
  update: ['update', 'updated', 'edit', 'edited', 'modify', 'modified'],
  delete: ['delete', 'deleted', 'remove', 'removed'],
  push: ['push', 'commit'],
  pull_request: ['pull_request', 'pr', 'merge_request', 'mr'],
};

export const ANY_VERB = 'any';

/** Whether a trigger verb covers the given activity. */
export function verbCovers(verb: string, activity: string): boolean {
  if (verb === ANY_VERB) return true;
  const activities = TRIGGER_VERBS[verb];
  if (activities !== undefined) return activities.includes(activity);
  return verb === activity;
}

const isFunction = (value: unknown): boolean => typeof value === 'function';

const fieldSchema = z.object({
  name: z.string().min(1),
  type: z.enum(FIELD_TYPES).default('any'),
  required: z.boolean().default(true),
  validator: z.custom<FieldValidator>(isFunction, { message: 'validator must be a function' }).optional(),
  description: z.string().optional(),
});

const triggerSchema = z.object({
  on: z.string().min(1),
  name: z.string().min(1).optional(),
  run: z.custom<TriggerCallable>(isFunction, { message: 'run must be a function' }),
});

/**
 * Zod schema for a definition declaration.
 *
 * Field names must be unique; everything else is optional so that an
 * empty declaration acts as a catch-all pattern.
 */
const definitionSchema = z.object({
  name: z.string().min(1).max(255),
  description: z.string().optional(),
  fields: z.array(fieldSchema).default([]).superRefine((fields, ctx) => {
    const seen = new Set<string>();
    for (const field of fields) {
      if (seen.has(field.name)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `duplicate field "${field.name}"` });
      }
      seen.add(field.name);
    }
  }),
  transform: z.custom<PayloadTransform>(isFunction, { message: 'transform must be a function' }).optional(),
  activity: z.custom<ActivityExtractor>(isFunction, { message: 'activity must be a function' }).optional(),
  triggers: z.array(triggerSchema).default([]),
});

export type FieldSpecInput = z.input<typeof fieldSchema>;
export type TriggerInput = z.input<typeof triggerSchema>;
export type EventDefinitionInput = z.input<typeof definitionSchema>;

/**
 * Declares an event pattern.
 *
 * Throws InvalidDefinitionError when the declaration is malformed, so
 * mistakes surface at startup or plugin load, never at dispatch time.
 *
 * @example
 * const push = defineEvent({
 *   name: 'GitHubPush',
 *   fields: [
 *     { name: 'ref', type: 'string', validator: startsWith('refs/') },
 *     { name: 'repository.name', type: 'string' },
 *   ],
 *   triggers: [{ on: 'push', run: (event) => deploy(event.payload) }],
 * });
 */
export function defineEvent(input: EventDefinitionInput): EventDefinition {
  const parsed = definitionSchema.safeParse(input);

  if (!parsed.success) {
    const name = typeof input.name === 'string' ? input.name : undefined;
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '$'}: ${issue.message}`);
    throw new InvalidDefinitionError(
      `Invalid event definition${name ? ` "${name}"` : ''}: ${issues.join('; ')}`,
      name,
      issues,
    );
  }

  const data = parsed.data;

  const fields = data.fields.map((field): FieldSpec => Object.freeze({
    name: field.name,
    type: field.type,
    required: field.required,
    validator: field.validator,
    description: field.description,
  }));

  const triggers = data.triggers.map((trigger, index): TriggerBinding => Object.freeze({
    verb: trigger.on,
    name: trigger.name ?? (trigger.run.name || `${trigger.on}#${index}`),
    run: trigger.run,
  }));

  return Object.freeze({
    [DEFINITION_BRAND]: true as const,
    name: data.name,
    description: data.description,
    fields: Object.freeze(fields),
    transform: data.transform,
    activity: data.activity,
    triggers: Object.freeze(triggers),
  });
}

/** Type guard for values produced by `defineEvent()`. */
export function isEventDefinition(value: unknown): value is EventDefinition {
  return typeof value === 'object'
    && value !== null
    && DEFINITION_BRAND in value
    && value[DEFINITION_BRAND] === true;
}
