// src/connection/connectionManager.ts
// Owns the socket to the editor plugin: connect with bounded exponential
// backoff, disconnect, and the connection state machine.
//
// The guard is injected (the dispatcher owns it). Public methods take the
// guard themselves; the *WhileHeld variants are for a caller that already
// holds it and prove so with its lease.

import { type ConnectionOptions, resolveConnectionOptions, retryDelayMs } from './config.js';
import { type ConnectResult, type TransportError, errorMessage, failure } from './errors.js';
import { Mutex, type MutexLease } from './mutex.js';
import { tcpSocketFactory } from './tcpSocket.js';
import type { EngineSocket, EngineSocketFactory } from './types.js';
import { createLogger } from '../logger.js';

const log = createLogger('ConnectionManager');

export type ConnectionState = 'disconnected' | 'connecting' | 'connected';

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = ms => new Promise(resolve => setTimeout(resolve, ms));

export interface ConnectionManagerDeps {
  /** Defaults to real TCP sockets built from the options */
  socketFactory?: EngineSocketFactory;
  sleep?: Sleep;
}

export class ConnectionManager {
  readonly options: ConnectionOptions;
  private readonly socketFactory: EngineSocketFactory;
  private readonly sleep: Sleep;
  private socket: EngineSocket | null = null;
  private currentState: ConnectionState = 'disconnected';
  private lastErrorMessage: string | null = null;

  constructor(
    private readonly guard: Mutex = new Mutex(),
    options: Partial<ConnectionOptions> = {},
    deps: ConnectionManagerDeps = {}
  ) {
    this.options = resolveConnectionOptions(options);
    this.socketFactory = deps.socketFactory ?? tcpSocketFactory(this.options);
    this.sleep = deps.sleep ?? sleep;
  }

  get state(): ConnectionState {
    return this.currentState;
  }

  get lastError(): string | null {
    return this.lastErrorMessage;
  }

  get endpoint(): string {
    return `${this.options.host}:${this.options.port}`;
  }

  /**
   * Connect with retry. The guard is held for each attempt and released
   * while sleeping between attempts.
   */
  async connect(): Promise<ConnectResult> {
    const totalAttempts = this.options.maxRetries + 1;

    for (let attempt = 0; attempt < totalAttempts; attempt++) {
      const result = await this.guard.runExclusive(lease => this.attemptConnect(lease, attempt));
      if (result.ok) return result;

      if (attempt < this.options.maxRetries) {
        await this.backoff(attempt);
      }
    }

    return this.exhausted();
  }

  /**
   * Connect with retry for a caller that already holds the guard. The guard
   * stays held through the backoff so the caller's exchange is not split.
   */
  async connectWhileHeld(lease: MutexLease): Promise<ConnectResult> {
    this.guard.assertHeld(lease);
    const totalAttempts = this.options.maxRetries + 1;

    for (let attempt = 0; attempt < totalAttempts; attempt++) {
      const result = await this.attemptConnect(lease, attempt);
      if (result.ok) return result;

      if (attempt < this.options.maxRetries) {
        await this.backoff(attempt);
      }
    }

    return this.exhausted();
  }

  async disconnect(): Promise<void> {
    await this.guard.runExclusive(lease => this.disconnectWhileHeld(lease));
  }

  disconnectWhileHeld(lease: MutexLease): void {
    this.guard.assertHeld(lease);
    this.closeSocket();
    log.debug('Disconnected from Unreal Engine');
  }

  /** The open socket, for the exchange running under `lease` */
  socketWhileHeld(lease: MutexLease): EngineSocket | null {
    this.guard.assertHeld(lease);
    return this.currentState === 'connected' ? this.socket : null;
  }

  private async attemptConnect(lease: MutexLease, attempt: number): Promise<ConnectResult> {
    this.guard.assertHeld(lease);
    const { host, port, maxRetries, connectTimeoutMs } = this.options;

    this.closeSocket();
    this.currentState = 'connecting';
    log.info(`Connecting to Unreal at ${host}:${port} (attempt ${attempt + 1}/${maxRetries + 1})...`);

    let result: ConnectResult;
    try {
      this.socket = this.socketFactory();
      result = await this.socket.connect(host, port, connectTimeoutMs);
    } catch (error) {
      result = failure('unexpected', `Unexpected error: ${errorMessage(error)}`);
    }

    if (result.ok) {
      this.currentState = 'connected';
      this.lastErrorMessage = null;
      log.info('Successfully connected to Unreal Engine');
      return result;
    }

    this.recordFailure(result.error, attempt);
    this.closeSocket();
    return result;
  }

  private recordFailure(error: TransportError, attempt: number): void {
    this.lastErrorMessage = error.message;
    switch (error.kind) {
      case 'connection_refused':
        log.warn(`Connection refused - is Unreal Engine running? (attempt ${attempt + 1})`);
        break;
      case 'connect_timeout':
        log.warn(`Connection timeout (attempt ${attempt + 1})`);
        break;
      case 'unexpected':
        log.error(`Unexpected connection error: ${error.message} (attempt ${attempt + 1})`);
        break;
      default:
        log.warn(`${error.message} (attempt ${attempt + 1})`);
    }
  }

  private async backoff(attempt: number): Promise<void> {
    const delay = retryDelayMs(attempt, this.options);
    log.info(`Retrying connection in ${(delay / 1000).toFixed(1)}s...`);
    await this.sleep(delay);
  }

  private exhausted(): ConnectResult {
    const attempts = this.options.maxRetries + 1;
    log.error(`Failed to connect after ${attempts} attempts. Last error: ${this.lastErrorMessage}`);
    return failure('connect_failed', `Failed to connect to Unreal Engine: ${this.lastErrorMessage ?? 'unknown error'}`);
  }

  /** Best effort; always ends in 'disconnected' */
  private closeSocket(): void {
    const socket = this.socket;
    this.socket = null;
    this.currentState = 'disconnected';
    if (!socket) return;

    try {
      socket.close();
    } catch (error) {
      log.debug(`Ignoring error while closing socket: ${errorMessage(error)}`);
    }
  }
}
