// src/connection/registry.ts
// One shared dispatcher per registry, created on first use and dropped on
// reset. The registry's mutex covers creating and destroying the instance;
// commands are serialized by the dispatcher's own guard. A reset holds the
// registry mutex until the old dispatcher has finished its in-flight command,
// so get() cannot hand out a second dispatcher while the first is on the wire.

import { type ConnectionOptions, resolveConnectionOptions } from './config.js';
import { CommandDispatcher, type CommandDispatcherDeps } from './dispatcher.js';
import { Mutex } from './mutex.js';
import { createLogger } from '../logger.js';

const log = createLogger('ConnectionRegistry');

export class ConnectionRegistry {
  private instance: CommandDispatcher | null = null;
  private readonly lock = new Mutex();

  readonly options: ConnectionOptions;

  constructor(
    options: Partial<ConnectionOptions> = {},
    private readonly deps: CommandDispatcherDeps = {}
  ) {
    this.options = resolveConnectionOptions(options);
  }

  /** The shared dispatcher, created lazily; waits out a pending reset */
  get(): Promise<CommandDispatcher> {
    return this.lock.runExclusive(() => {
      if (!this.instance) {
        log.info('Creating new Unreal connection instance');
        this.instance = new CommandDispatcher(this.options, this.deps);
      }
      return this.instance;
    });
  }

  has(): boolean {
    return this.instance !== null;
  }

  /** The current dispatcher without creating one */
  peek(): CommandDispatcher | null {
    return this.instance;
  }

  /** Disconnect and drop the shared dispatcher; the next get() builds a new one */
  async reset(): Promise<void> {
    await this.lock.runExclusive(async () => {
      const instance = this.instance;
      if (instance) {
        await instance.disconnect();
        this.instance = null;
      }
      log.info('Unreal connection reset');
    });
  }
}

export const defaultRegistry = new ConnectionRegistry();

export function getConnection(): Promise<CommandDispatcher> {
  return defaultRegistry.get();
}

export function resetConnection(): Promise<void> {
  return defaultRegistry.reset();
}
