import { describe, it, expect, vi } from 'vitest';
import { createDispatchEngine } from '../src/engine.js';
import { StaticPluginProvider } from '../src/infrastructure/index.js';
import { defineEvent, defineHandler } from '../src/domain/index.js';
import { fakeLogger } from './helpers.js';

function makeCrmPlugin() {
  return {
    Contact: defineEvent({
      name: 'Contact',
      fields: [
        { name: 'contact.email', type: 'string' },
        { name: 'action', type: 'string' },
      ],
    }),
    onCreate: defineHandler({ group: 'create', name: 'onCreate' }, vi.fn()),
  };
}

describe('createDispatchEngine', () => {
  it('wires registry, bus, metrics and plugins from one configuration', async () => {
    const crm = makeCrmPlugin();
    const engine = createDispatchEngine({
      config: { timeout_seconds: 5 },
      log: fakeLogger(),
      provider: new StaticPluginProvider({ crm }),
    });

    const outcomes = await engine.start();
    expect(outcomes.map((o) => [o.name, o.ok])).toEqual([['crm', true]]);

    const result = await engine.bus.dispatchRaw({ action: 'created', contact: { email: 'a@example.com' } });

    expect(result.event.definition?.name).toBe('Contact');
    expect(result.invocations.map((i) => i.handler.name)).toEqual(['onCreate']);
    expect(crm.onCreate.handler).toHaveBeenCalledTimes(1);
    expect(engine.metrics.getMetrics().total_dispatches).toBe(1);
    expect(engine.bus.registry).toBe(engine.registry);

    await engine.stop();
    expect(engine.registry.size).toBe(0);
    expect(engine.bus.handlers()).toEqual([]);
  });

  it('builds independent engines', () => {
    const first = createDispatchEngine({ log: fakeLogger() });
    const second = createDispatchEngine({ log: fakeLogger() });

    first.registry.register(defineEvent({ name: 'OnlyFirst' }));

    expect(second.registry.has('OnlyFirst')).toBe(false);
    expect(first.bus).not.toBe(second.bus);
  });

  it('logs configuration warnings', () => {
    const log = fakeLogger();
    createDispatchEngine({ config: { max_concurrent_handlers: 150 }, log });

    expect(log.warn).toHaveBeenCalledWith(
      { warning: 'High concurrency (150) may consume significant resources' },
      'Configuration warning',
    );
  });

  it('skips plugin loading when plugins are disabled', async () => {
    const log = fakeLogger();
    const engine = createDispatchEngine({
      config: { plugins: { enabled: false } },
      log,
      provider: new StaticPluginProvider({ crm: makeCrmPlugin() }),
    });

    expect(await engine.start()).toEqual([]);
    expect(engine.plugins.loadedPlugins()).toEqual([]);
    expect(log.info).toHaveBeenCalledWith('Plugin loading disabled');
  });

  it('uses the configured concurrency bound', () => {
    const engine = createDispatchEngine({ config: { max_concurrent_handlers: 3 }, log: fakeLogger() });
    expect(engine.bus.concurrency.maxConcurrent).toBe(3);
  });
});
