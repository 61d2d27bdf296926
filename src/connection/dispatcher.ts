// src/connection/dispatcher.ts
// "Send one command, get one response" over the editor socket.
//
// Each attempt opens a fresh connection, writes the request, reads one framed
// response and closes the socket. The guard is held for the whole cycle, so
// concurrent commands never interleave on the wire.

import { type ConnectionOptions, retryDelayMs } from './config.js';
import { ConnectionManager, type ConnectionManagerDeps, type ConnectionState, type Sleep, sleep } from './connectionManager.js';
import { type ConnectResult, type Failure, type TransportError, errorMessage, failure, isTransient } from './errors.js';
import { receiveResponse } from './framing.js';
import { Mutex, type MutexLease } from './mutex.js';
import {
  type CommandRequest,
  type CommandResponse,
  type CommandSender,
  type ErrorResponse,
  type JsonObject,
  type JsonValue,
  isJsonObject,
} from './types.js';
import { createLogger } from '../logger.js';

const log = createLogger('CommandDispatcher');

export interface CommandDispatcherDeps extends ConnectionManagerDeps {
  /** Clock used for receive deadlines */
  now?: () => number;
}

type AttemptResult = { ok: true; response: CommandResponse } | Failure;

const UNKNOWN_ERROR = 'Unknown error';

function nonEmptyString(value: JsonValue | undefined): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function errorText(response: JsonObject): string {
  return nonEmptyString(response.error) ?? nonEmptyString(response.message) ?? UNKNOWN_ERROR;
}

export function errorResponse(message: string): ErrorResponse {
  return { status: 'error', error: message };
}

/**
 * Bring a remote response to the `{ status: 'success' | 'error' }` shape.
 * `status: "error"` keeps its fields and gains a non-empty `error`; the legacy
 * `success: false` shape becomes a bare error response; anything else is a
 * success.
 */
export function normalizeResponse(response: JsonObject): CommandResponse {
  if (response.status === 'error') {
    const message = errorText(response);
    log.warn(`Unreal returned error: ${message}`);
    return { ...response, status: 'error', error: message };
  }
  if (response.success === false) {
    const message = errorText(response);
    log.warn(`Unreal returned failure: ${message}`);
    return errorResponse(message);
  }
  return { ...response, status: 'success' };
}

export class CommandDispatcher implements CommandSender {
  readonly connection: ConnectionManager;
  private readonly guard = new Mutex();
  private readonly sleep: Sleep;
  private readonly now: () => number;

  constructor(options: Partial<ConnectionOptions> = {}, deps: CommandDispatcherDeps = {}) {
    this.connection = new ConnectionManager(this.guard, options, deps);
    this.sleep = deps.sleep ?? sleep;
    this.now = deps.now ?? Date.now;
  }

  get options(): ConnectionOptions {
    return this.connection.options;
  }

  get state(): ConnectionState {
    return this.connection.state;
  }

  connect(): Promise<ConnectResult> {
    return this.connection.connect();
  }

  disconnect(): Promise<void> {
    return this.connection.disconnect();
  }

  /**
   * Send a command and wait for its response. Never rejects: every failure
   * comes back as `{ status: 'error', error }`.
   */
  async sendCommand(commandName: string, params: JsonObject = {}): Promise<CommandResponse> {
    const { maxRetries } = this.options;
    const totalAttempts = maxRetries + 1;
    let lastError: TransportError | null = null;

    for (let attempt = 0; attempt < totalAttempts; attempt++) {
      let result: AttemptResult;
      try {
        result = await this.guard.runExclusive(lease => this.sendOnce(lease, commandName, params, attempt));
      } catch (error) {
        result = failure('unexpected', errorMessage(error));
      }

      if (result.ok) {
        return result.response;
      }

      if (!isTransient(result.error.kind)) {
        log.error(`Unexpected error sending command: ${result.error.message}`);
        await this.disconnectQuietly();
        return errorResponse(result.error.message);
      }

      lastError = result.error;
      log.warn(`Command failed (attempt ${attempt + 1}/${totalAttempts}): ${result.error.message}`);
      await this.disconnectQuietly();

      if (attempt < maxRetries) {
        const delay = retryDelayMs(attempt, this.options);
        log.info(`Retrying command in ${(delay / 1000).toFixed(1)}s...`);
        await this.sleep(delay);
      }
    }

    return errorResponse(`Command failed after ${totalAttempts} attempts: ${lastError?.message ?? UNKNOWN_ERROR}`);
  }

  private async sendOnce(lease: MutexLease, commandName: string, params: JsonObject, attempt: number): Promise<AttemptResult> {
    const connected = await this.connection.connectWhileHeld(lease);
    if (!connected.ok) {
      return connected;
    }

    try {
      const socket = this.connection.socketWhileHeld(lease);
      if (!socket) {
        return failure('connection_closed', 'Connection dropped before the command was sent');
      }

      const request: CommandRequest = { type: commandName, params };
      let payload: string;
      try {
        payload = JSON.stringify(request);
      } catch (error) {
        return failure('serialization', `Could not serialize ${commandName} request: ${errorMessage(error)}`);
      }

      log.info(`Sending command (attempt ${attempt + 1}): ${commandName}`);
      log.debug(`Command payload: ${payload.slice(0, 500)}`);

      const sent = await socket.write(Buffer.from(payload, 'utf-8'), this.options.sendTimeoutMs);
      if (!sent.ok) {
        return sent;
      }

      const received = await receiveResponse(socket, commandName, this.options, this.now);
      if (!received.ok) {
        return received;
      }

      if (!isJsonObject(received.value)) {
        log.debug(`Raw response: ${received.data.subarray(0, 500).toString('utf-8')}`);
        return failure('invalid_response', `Invalid response to ${commandName}: expected a JSON object`);
      }

      log.info(`Command ${commandName} completed`);
      return { ok: true, response: normalizeResponse(received.value) };
    } finally {
      this.connection.disconnectWhileHeld(lease);
    }
  }

  private async disconnectQuietly(): Promise<void> {
    try {
      await this.connection.disconnect();
    } catch (error) {
      log.debug(`Ignoring error during disconnect: ${errorMessage(error)}`);
    }
  }
}
