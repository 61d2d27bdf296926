import { describe, it, expect } from 'vitest';
import { ConnectionRegistry } from './registry.js';
import { FakeEngine } from '../testing/fakeEngine.js';

describe('ConnectionRegistry', () => {
  it('should create the dispatcher lazily and reuse it', async () => {
    const registry = new ConnectionRegistry({}, new FakeEngine().deps());

    expect(registry.has()).toBe(false);
    expect(registry.peek()).toBeNull();

    const first = await registry.get();
    expect(registry.has()).toBe(true);
    expect(await registry.get()).toBe(first);
    expect(registry.peek()).toBe(first);
  });

  it('should hand out one dispatcher to concurrent first callers', async () => {
    const registry = new ConnectionRegistry({}, new FakeEngine().deps());

    const [a, b] = await Promise.all([registry.get(), registry.get()]);

    expect(a).toBe(b);
  });

  it('should pass its options to the dispatcher', async () => {
    const registry = new ConnectionRegistry({ port: 60001 }, new FakeEngine().deps());
    const dispatcher = await registry.get();

    expect(registry.options.port).toBe(60001);
    expect(dispatcher.options.port).toBe(60001);
    expect(dispatcher.connection.endpoint).toBe('127.0.0.1:60001');
  });

  it('should drop the dispatcher on reset', async () => {
    const engine = new FakeEngine();
    const registry = new ConnectionRegistry({}, engine.deps());
    const first = await registry.get();
    await first.connect();

    await registry.reset();

    expect(registry.has()).toBe(false);
    expect(first.state).toBe('disconnected');
    expect(engine.events).toEqual(['connect:1', 'close:1']);
    expect(await registry.get()).not.toBe(first);
  });

  it('should tolerate reset before first use', async () => {
    const registry = new ConnectionRegistry({}, new FakeEngine().deps());

    await registry.reset();

    expect(registry.has()).toBe(false);
  });

  it('should serve commands through the shared dispatcher', async () => {
    const engine = new FakeEngine().respond({ status: 'success', result: [] });
    const registry = new ConnectionRegistry({}, engine.deps());

    const response = await (await registry.get()).sendCommand('get_actors_in_level');

    expect(response).toEqual({ status: 'success', result: [] });
  });

  it('should not build a new dispatcher until a reset has drained the in-flight command', async () => {
    const engine = new FakeEngine()
      .enqueue({
        reply: [
          { kind: 'data', chunk: '{"status":' },
          { kind: 'data', chunk: '"success",' },
          { kind: 'data', chunk: '"result":' },
          { kind: 'data', chunk: '[]}' },
        ],
      })
      .respond({ status: 'success' });
    const registry = new ConnectionRegistry({}, engine.deps());
    const firstDispatcher = await registry.get();

    const first = firstDispatcher.sendCommand('get_actors_in_level');
    const reset = registry.reset();
    await new Promise(resolve => setImmediate(resolve));
    const second = registry.get().then(dispatcher => {
      expect(dispatcher).not.toBe(firstDispatcher);
      return dispatcher.sendCommand('find_actors_by_name', { pattern: 'Floor' });
    });

    const [firstResponse, , secondResponse] = await Promise.all([first, reset, second]);

    expect(firstResponse).toEqual({ status: 'success', result: [] });
    expect(secondResponse).toEqual({ status: 'success' });
    expect(engine.events).toEqual(['connect:1', 'write:1', 'close:1', 'connect:2', 'write:2', 'close:2']);
    expect(engine.maxOpenSockets).toBe(1);
  });
});
