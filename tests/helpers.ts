import { vi } from 'vitest';
import type { Logger } from 'pino';
import { defineEvent, validators } from '../src/domain/index.js';
import type { DispatchConfig } from '../src/application/index.js';
import { parseDispatchConfig } from '../src/application/index.js';

/**
 * Minimal fake logger. `child()` returns the same object, so assertions
 * on the root see what components log through their children.
 */
export function fakeLogger() {
  const log = {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: vi.fn(),
  };
  log.child.mockReturnValue(log);
  return log as unknown as Logger;
}

/** Resolves after `ms`, or rejects with the signal's reason when it aborts first. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(resolve, ms);
    signal?.addEventListener('abort', () => {
      clearTimeout(timer);
      reject(signal.reason);
    }, { once: true });
  });
}

export function testConfig(overrides: Partial<DispatchConfig> = {}): DispatchConfig {
  return { ...parseDispatchConfig({}), ...overrides };
}

export const GitHubPush = defineEvent({
  name: 'GitHubPush',
  fields: [
    { name: 'ref', type: 'string', validator: validators.startsWith('refs/') },
    { name: 'repository.name', type: 'string' },
    { name: 'commits', type: 'array', required: false },
  ],
  activity: () => 'push',
});

export const GenericAction = defineEvent({
  name: 'GenericAction',
  fields: [{ name: 'action', type: 'string' }],
});

export const pushPayload = {
  ref: 'refs/heads/main',
  repository: { name: 'hookbus' },
  commits: [{ id: 'abc123' }],
};
