import { z } from 'zod';
import { ConfigError } from '../domain/index.js';

/** Activity groups available when the configuration names none. */
export const DEFAULT_ACTIVITY_GROUPS: Readonly<Record<string, readonly string[]>> = {
  create: ['create', 'created', 'add', 'added'],
  update: ['update', 'updated', 'edit', 'edited', 'modify', 'modified'],
  delete: ['delete', 'deleted', 'remove', 'removed'],
  github: ['push', 'pull_request', 'issue', 'release'],
};

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

/** Longest handler timeout a Node.js timer can hold, in whole seconds. */
export const MAX_TIMEOUT_SECONDS = 2_147_483;

export const timeoutSecondsSchema = z.number().finite().positive().max(MAX_TIMEOUT_SECONDS);

/**
 * Zod schema for the dispatch engine configuration.
 *
 * Every field has a default, so `{}` is a valid input.
 */
export const dispatchConfigSchema = z.object({
  timeout_seconds: timeoutSecondsSchema.default(30),
  max_concurrent_handlers: z.number().int().min(1).default(50),
  swallow_exceptions: z.boolean().default(true),
  enable_metrics: z.boolean().default(true),
  log_level: z.enum(LOG_LEVELS).default('info'),
  activity_groups: z
    .record(z.string().min(1), z.array(z.string().min(1)))
    .default(() => cloneGroups(DEFAULT_ACTIVITY_GROUPS)),
  plugins: z.object({
    enabled: z.boolean().default(true),
    directories: z.array(z.string().min(1)).default([]),
  }).default({}),
});

export type DispatchConfig = z.infer<typeof dispatchConfigSchema>;
export type DispatchConfigInput = z.input<typeof dispatchConfigSchema>;
export type LogLevel = DispatchConfig['log_level'];

function cloneGroups(groups: Readonly<Record<string, readonly string[]>>): Record<string, string[]> {
  return Object.fromEntries(Object.entries(groups).map(([name, activities]) => [name, [...activities]]));
}

/**
 * Validates raw configuration input and applies defaults.
 * Throws ConfigError listing every issue.
 */
export function parseDispatchConfig(input: unknown = {}): DispatchConfig {
  const parsed = dispatchConfigSchema.safeParse(input);

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '$'}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, issues, parsed.error);
  }

  return parsed.data;
}

/** Named starting points; explicit values override them. */
export const CONFIG_PRESETS = {
  development: {
    timeout_seconds: 10,
    max_concurrent_handlers: 20,
    swallow_exceptions: false,
    log_level: 'debug',
    enable_metrics: true,
  },
  production: {
    timeout_seconds: 30,
    max_concurrent_handlers: 100,
    swallow_exceptions: true,
    log_level: 'info',
    enable_metrics: true,
  },
  minimal: {
    timeout_seconds: 5,
    max_concurrent_handlers: 10,
    swallow_exceptions: true,
    log_level: 'warn',
    enable_metrics: false,
    plugins: { enabled: false },
  },
} as const satisfies Record<string, DispatchConfigInput>;

export type ConfigPreset = keyof typeof CONFIG_PRESETS;

export function presetConfig(preset: ConfigPreset, overrides: DispatchConfigInput = {}): DispatchConfig {
  return parseDispatchConfig({ ...CONFIG_PRESETS[preset], ...overrides });
}

/**
 * Advisory checks on an already valid configuration.
 * Returns human-readable warnings; never throws.
 */
export function checkRuntimeWarnings(config: DispatchConfig): string[] {
  const warnings: string[] = [];

  if (config.max_concurrent_handlers > 100) {
    warnings.push(`High concurrency (${config.max_concurrent_handlers}) may consume significant resources`);
  }
  if (config.timeout_seconds > 300) {
    warnings.push(`Handler timeout of ${config.timeout_seconds}s exceeds 5 minutes`);
  }
  if (!config.swallow_exceptions) {
    warnings.push('swallow_exceptions is disabled: one failing handler aborts the whole dispatch');
  }
  for (const [group, activities] of Object.entries(config.activity_groups)) {
    if (activities.length === 0) warnings.push(`Activity group "${group}" is empty`);
  }

  return warnings;
}
