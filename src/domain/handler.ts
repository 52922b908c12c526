import type { WebhookEvent } from './event.js';
import { InvalidDefinitionError } from './errors.js';

/** How a registration selects the dispatches it runs for. */
export type HandlerKind = 'pattern' | 'activity' | 'group' | 'any';

/**
 * A handler receives the resolved event and an AbortSignal that fires when
 * the dispatcher stops waiting on it (timeout or fail-fast cancellation).
 * Honouring the signal is up to the handler.
 */
export type EventHandler = (event: WebhookEvent, signal: AbortSignal) => unknown;

/**
 * A live registration on an EventBus. Also serves as the removal handle.
 *
 * `id` is the registration index; resolution order follows it.
 */
export interface HandlerRegistration {
  readonly id: number;
  readonly kind: HandlerKind;
  /** Definition names, activities, or group names; empty for `any`. */
  readonly selector: ReadonlySet<string>;
  readonly handler: EventHandler;
  readonly name: string;
}

/** Registration request, before the bus assigns an id. */
export interface HandlerSpec {
  readonly kind: HandlerKind;
  readonly selector: Iterable<string>;
  readonly handler: EventHandler;
  readonly name?: string | undefined;
}

const HANDLER_BRAND: unique symbol = Symbol.for('hookbus.handler');

/**
 * Handler marked for discovery inside a plugin module.
 *
 * `kind === 'any'` with `implicit === true` means no selector was given;
 * the plugin manager warns about those when loading.
 */
export interface HandlerDeclaration extends HandlerSpec {
  readonly [HANDLER_BRAND]: true;
  readonly selector: readonly string[];
  readonly name: string;
  readonly implicit: boolean;
}

export interface HandlerSelectorOptions {
  readonly pattern?: string | readonly string[];
  readonly activity?: string | readonly string[];
  readonly group?: string | readonly string[];
  readonly name?: string;
}

function toList(value: string | readonly string[]): readonly string[] {
  return typeof value === 'string' ? [value] : value;
}

/**
 * Marks a function as a plugin handler.
 *
 * At most one of `pattern`, `activity` or `group` may be given. With none,
 * the handler runs for every dispatch.
 */
export function defineHandler(options: HandlerSelectorOptions, handler: EventHandler): HandlerDeclaration {
  const given = (['pattern', 'activity', 'group'] as const).filter((key) => options[key] !== undefined);
  const name = options.name ?? (handler.name || 'anonymous');

  if (given.length > 1) {
    throw new InvalidDefinitionError(
      `Handler "${name}" declares more than one selector kind: ${given.join(', ')}`,
      name,
    );
  }

  const kind = given[0];
  const raw = kind === undefined ? undefined : options[kind];
  const selector = raw === undefined ? [] : [...toList(raw)];

  if (kind !== undefined && selector.length === 0) {
    throw new InvalidDefinitionError(`Handler "${name}" has an empty ${kind} selector`, name);
  }

  return Object.freeze({
    [HANDLER_BRAND]: true as const,
    kind: kind ?? 'any',
    selector: Object.freeze(selector),
    handler,
    name,
    implicit: kind === undefined,
  });
}

/** Type guard for values produced by `defineHandler()`. */
export function isHandlerDeclaration(value: unknown): value is HandlerDeclaration {
  return typeof value === 'object'
    && value !== null
    && HANDLER_BRAND in value
    && value[HANDLER_BRAND] === true;
}
