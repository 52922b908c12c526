export type { RawPayload, EventPayload, HeaderMap, WebhookEvent } from './event.js';
export { UNMATCHED_ACTIVITY } from './event.js';
export type {
  FieldType,
  FieldSpec,
  FieldSpecInput,
  FieldValidator,
  ValidationOutcome,
  PayloadTransform,
  ActivityExtractor,
  TriggerCallable,
  TriggerBinding,
  TriggerInput,
  EventDefinition,
  EventDefinitionInput,
} from './definition.js';
export { FIELD_TYPES, TRIGGER_VERBS, ANY_VERB, defineEvent, isEventDefinition, verbCovers } from './definition.js';
export type {
  HandlerKind,
  EventHandler,
  HandlerRegistration,
  HandlerSpec,
  HandlerDeclaration,
  HandlerSelectorOptions,
} from './handler.js';
export { defineHandler, isHandlerDeclaration } from './handler.js';
export type {
  FieldIssue,
  MatchErrors,
  MatchResult,
  HandlerDescriptor,
  HandlerOutcome,
  OutcomeStatus,
  HandlerInvocation,
  DispatchResult,
} from './results.js';
export { isFailedOutcome } from './results.js';
export {
  HookbusError,
  ValidationError,
  InvalidDefinitionError,
  DuplicateDefinitionError,
  HandlerError,
  HandlerTimeoutError,
  ExecutionFailure,
  DispatchFailure,
  PluginLoadError,
  PluginNotLoadedError,
  ConfigError,
  describeCause,
} from './errors.js';
export type { HookbusErrorCode } from './errors.js';
export * as validators from './validators.js';
