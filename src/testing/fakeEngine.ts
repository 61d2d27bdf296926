// src/testing/fakeEngine.ts
// Scripted in-process stand-in for the editor plugin. Each socket the bridge
// creates takes the next exchange from the script; time only moves when a
// read times out or the bridge sleeps.

import type { CommandDispatcherDeps } from '../connection/dispatcher.js';
import { type ConnectResult, type SendResult, failure, transportError } from '../connection/errors.js';
import type { EngineSocket, EngineSocketFactory, JsonValue, ReadOutcome } from '../connection/types.js';

export type ReplyStep =
  | { kind: 'data'; chunk: string | Buffer }
  | { kind: 'end' }
  | { kind: 'timeout' }
  | { kind: 'error'; message: string };

export interface FakeExchange {
  /** Defaults to a successful connect */
  connect?: ConnectResult;
  /** Defaults to a successful write */
  write?: SendResult;
  /** Successive read() results; once used up, reads see end of stream */
  reply?: ReplyStep[];
}

const tick = () => new Promise<void>(resolve => setImmediate(resolve));

export class FakeClock {
  private current = 0;

  readonly now = (): number => this.current;

  advance(ms: number): void {
    this.current += ms;
  }
}

export class FakeEngine {
  readonly clock = new FakeClock();
  /** `connect:N`, `write:N` and `close:N` in the order they happened */
  readonly events: string[] = [];
  /** Parsed request documents, in arrival order */
  readonly requests: JsonValue[] = [];
  readonly sleeps: number[] = [];
  maxOpenSockets = 0;

  private readonly script: FakeExchange[] = [];
  private socketCount = 0;
  private openSockets = 0;

  readonly factory: EngineSocketFactory = () => {
    this.socketCount++;
    return new FakeSocket(this, this.socketCount, this.script.shift() ?? {});
  };

  readonly sleep = async (ms: number): Promise<void> => {
    this.sleeps.push(ms);
    this.clock.advance(ms);
  };

  get socketsCreated(): number {
    return this.socketCount;
  }

  deps(): CommandDispatcherDeps {
    return { socketFactory: this.factory, sleep: this.sleep, now: this.clock.now };
  }

  enqueue(...exchanges: FakeExchange[]): this {
    this.script.push(...exchanges);
    return this;
  }

  /** Answer the next request with `document` in one chunk */
  respond(document: JsonValue): this {
    return this.enqueue({ reply: [{ kind: 'data', chunk: JSON.stringify(document) }] });
  }

  refuse(times = 1): this {
    for (let i = 0; i < times; i++) {
      this.enqueue({ connect: failure('connection_refused', 'Connection refused: connect ECONNREFUSED 127.0.0.1:55557') });
    }
    return this;
  }

  /** @internal */
  record(event: string): void {
    this.events.push(event);
  }

  /** @internal */
  opened(): void {
    this.openSockets++;
    this.maxOpenSockets = Math.max(this.maxOpenSockets, this.openSockets);
  }

  /** @internal */
  closed(): void {
    this.openSockets--;
  }
}

class FakeSocket implements EngineSocket {
  private readonly pending: ReplyStep[];
  private open = false;

  constructor(
    private readonly engine: FakeEngine,
    private readonly id: number,
    private readonly exchange: FakeExchange
  ) {
    this.pending = [...(exchange.reply ?? [])];
  }

  async connect(): Promise<ConnectResult> {
    await tick();
    this.engine.record(`connect:${this.id}`);
    const result = this.exchange.connect ?? { ok: true };
    if (result.ok) {
      this.open = true;
      this.engine.opened();
    }
    return result;
  }

  async write(data: Buffer): Promise<SendResult> {
    await tick();
    this.engine.record(`write:${this.id}`);
    if (this.exchange.write && !this.exchange.write.ok) {
      return this.exchange.write;
    }
    const text = data.toString('utf-8');
    try {
      const request: JsonValue = JSON.parse(text);
      this.engine.requests.push(request);
    } catch {
      this.engine.requests.push(text);
    }
    return { ok: true };
  }

  async read(maxBytes: number, timeoutMs: number): Promise<ReadOutcome> {
    await tick();
    const step = this.pending.shift();
    if (!step) {
      return { kind: 'end' };
    }
    switch (step.kind) {
      case 'data': {
        const chunk = Buffer.isBuffer(step.chunk) ? step.chunk : Buffer.from(step.chunk, 'utf-8');
        if (chunk.length > maxBytes) {
          this.pending.unshift({ kind: 'data', chunk: chunk.subarray(maxBytes) });
          return { kind: 'data', chunk: chunk.subarray(0, maxBytes) };
        }
        return { kind: 'data', chunk };
      }
      case 'timeout':
        this.engine.clock.advance(timeoutMs);
        return { kind: 'timeout' };
      case 'error':
        return { kind: 'error', error: transportError('socket_error', `Socket error: ${step.message}`) };
      case 'end':
        return { kind: 'end' };
    }
  }

  close(): void {
    this.engine.record(`close:${this.id}`);
    if (this.open) {
      this.open = false;
      this.engine.closed();
    }
  }
}
