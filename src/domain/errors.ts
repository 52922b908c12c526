import type { FieldIssue, HandlerDescriptor, HandlerInvocation, DispatchResult } from './results.js';

/**
 * Error code shared by every error the engine throws.
 */
export type HookbusErrorCode =
  | 'VALIDATION_FAILED'
  | 'INVALID_DEFINITION'
  | 'DUPLICATE_DEFINITION'
  | 'HANDLER_FAILED'
  | 'HANDLER_TIMEOUT'
  | 'EXECUTION_FAILED'
  | 'DISPATCH_FAILED'
  | 'PLUGIN_LOAD_FAILED'
  | 'PLUGIN_NOT_LOADED'
  | 'INVALID_CONFIG';

/**
 * Base error class.
 *
 * Check `code` for programmatic handling; `cause` carries the
 * underlying error where there is one.
 */
export class HookbusError extends Error {
  declare readonly code: HookbusErrorCode;

  override cause?: unknown;

  constructor(message: string, code: HookbusErrorCode, cause?: unknown) {
    super(message);
    this.name = 'HookbusError';
    this.code = code;
    if (cause !== undefined) {
      this.cause = cause;
    }
    Object.setPrototypeOf(this, HookbusError.prototype);
  }
}

/**
 * A payload failed one definition's transform or field checks.
 *
 * Local to that definition: the registry moves on to the next one.
 */
export class ValidationError extends HookbusError {
  declare readonly code: 'VALIDATION_FAILED';
  readonly definition: string;
  readonly issues: readonly FieldIssue[];

  constructor(definition: string, issues: readonly FieldIssue[]) {
    super(
      `Payload does not match "${definition}": ${issues.map((i) => `${i.field}: ${i.message}`).join('; ')}`,
      'VALIDATION_FAILED',
    );
    this.name = 'ValidationError';
    this.definition = definition;
    this.issues = issues;
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

/** A definition declaration is malformed. Raised at declaration or registration time. */
export class InvalidDefinitionError extends HookbusError {
  declare readonly code: 'INVALID_DEFINITION';
  readonly definition: string | undefined;
  readonly issues: readonly string[];

  constructor(message: string, definition?: string, issues: readonly string[] = []) {
    super(message, 'INVALID_DEFINITION');
    this.name = 'InvalidDefinitionError';
    this.definition = definition;
    this.issues = issues;
    Object.setPrototypeOf(this, InvalidDefinitionError.prototype);
  }
}

export class DuplicateDefinitionError extends HookbusError {
  declare readonly code: 'DUPLICATE_DEFINITION';
  readonly definition: string;

  constructor(definition: string) {
    super(`Event definition "${definition}" is already registered`, 'DUPLICATE_DEFINITION');
    this.name = 'DuplicateDefinitionError';
    this.definition = definition;
    Object.setPrototypeOf(this, DuplicateDefinitionError.prototype);
  }
}

/** A handler threw or rejected. */
export class HandlerError extends HookbusError {
  readonly handler: string;

  constructor(handler: string, cause: unknown, message?: string, code: HookbusErrorCode = 'HANDLER_FAILED') {
    super(message ?? `Handler "${handler}" failed: ${describeCause(cause)}`, code, cause);
    this.name = 'HandlerError';
    this.handler = handler;
    Object.setPrototypeOf(this, HandlerError.prototype);
  }
}

/**
 * A handler did not settle within its timeout.
 *
 * The dispatcher stopped waiting; the handler's own work may still be running.
 */
export class HandlerTimeoutError extends HandlerError {
  declare readonly code: 'HANDLER_TIMEOUT';
  readonly timeout_seconds: number;

  constructor(handler: string, timeoutSeconds: number) {
    super(handler, undefined, `Handler "${handler}" timed out after ${timeoutSeconds}s`, 'HANDLER_TIMEOUT');
    this.name = 'HandlerTimeoutError';
    this.timeout_seconds = timeoutSeconds;
    Object.setPrototypeOf(this, HandlerTimeoutError.prototype);
  }
}

/**
 * Raised by the concurrency controller when exceptions are not swallowed
 * and one handler failed. Remaining handlers were signalled to cancel.
 */
export class ExecutionFailure extends HookbusError {
  declare readonly code: 'EXECUTION_FAILED';
  readonly error: HandlerError;
  readonly failed: HandlerDescriptor;
  readonly succeeded: readonly HandlerDescriptor[];
  readonly invocations: readonly HandlerInvocation[];

  constructor(
    error: HandlerError,
    failed: HandlerDescriptor,
    succeeded: readonly HandlerDescriptor[],
    invocations: readonly HandlerInvocation[],
  ) {
    super(`Handler execution aborted: ${error.message}`, 'EXECUTION_FAILED', error);
    this.name = 'ExecutionFailure';
    this.error = error;
    this.failed = failed;
    this.succeeded = succeeded;
    this.invocations = invocations;
    Object.setPrototypeOf(this, ExecutionFailure.prototype);
  }
}

/**
 * Raised to the `dispatchRaw` caller when exceptions are not swallowed
 * and a handler failed. Carries the partial result.
 */
export class DispatchFailure extends HookbusError {
  declare readonly code: 'DISPATCH_FAILED';
  readonly error: HandlerError;
  readonly succeeded: readonly HandlerDescriptor[];
  readonly result: DispatchResult;

  constructor(error: HandlerError, succeeded: readonly HandlerDescriptor[], result: DispatchResult) {
    super(`Dispatch failed: ${error.message}`, 'DISPATCH_FAILED', error);
    this.name = 'DispatchFailure';
    this.error = error;
    this.succeeded = succeeded;
    this.result = result;
    Object.setPrototypeOf(this, DispatchFailure.prototype);
  }
}

export class PluginLoadError extends HookbusError {
  declare readonly code: 'PLUGIN_LOAD_FAILED';
  readonly plugin: string;

  constructor(plugin: string, message: string, cause?: unknown) {
    super(`Failed to load plugin "${plugin}": ${message}`, 'PLUGIN_LOAD_FAILED', cause);
    this.name = 'PluginLoadError';
    this.plugin = plugin;
    Object.setPrototypeOf(this, PluginLoadError.prototype);
  }
}

export class PluginNotLoadedError extends HookbusError {
  declare readonly code: 'PLUGIN_NOT_LOADED';
  readonly plugin: string;

  constructor(plugin: string) {
    super(`Plugin "${plugin}" is not loaded`, 'PLUGIN_NOT_LOADED');
    this.name = 'PluginNotLoadedError';
    this.plugin = plugin;
    Object.setPrototypeOf(this, PluginNotLoadedError.prototype);
  }
}

export class ConfigError extends HookbusError {
  declare readonly code: 'INVALID_CONFIG';
  readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[] = [], cause?: unknown) {
    super(message, 'INVALID_CONFIG', cause);
    this.name = 'ConfigError';
    this.issues = issues;
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

/** Human-readable summary of a thrown value. */
export function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  if (typeof cause === 'string') return cause;
  try {
    return JSON.stringify(cause) ?? String(cause);
  } catch {
    return String(cause);
  }
}
