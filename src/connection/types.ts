// src/connection/types.ts
// Wire types shared by the transport and the tool modules

import type { ConnectResult, SendResult, TransportError } from './errors.js';

// ─────────────────────────────────────────────────────────────────────────────
// JSON
// ─────────────────────────────────────────────────────────────────────────────

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
export interface JsonObject {
  [key: string]: JsonValue;
}

// ─────────────────────────────────────────────────────────────────────────────
// Commands
// ─────────────────────────────────────────────────────────────────────────────

export interface CommandRequest {
  type: string;
  params: JsonObject;
}

export type SuccessResponse = JsonObject & { status: 'success' };
export type ErrorResponse = JsonObject & { status: 'error'; error: string };

/** What every caller of `sendCommand` gets back, whatever happened on the wire */
export type CommandResponse = SuccessResponse | ErrorResponse;

/** The one operation tool modules depend on */
export interface CommandSender {
  sendCommand(commandName: string, params?: JsonObject): Promise<CommandResponse>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Sockets
// ─────────────────────────────────────────────────────────────────────────────

export type ReadOutcome =
  | { kind: 'data'; chunk: Buffer }
  | { kind: 'end' }
  | { kind: 'timeout' }
  | { kind: 'error'; error: TransportError };

export interface ChunkSource {
  /** Resolves with at most `maxBytes` bytes, or how the wait ended */
  read(maxBytes: number, timeoutMs: number): Promise<ReadOutcome>;
}

/** A single-use stream connection to the editor plugin */
export interface EngineSocket extends ChunkSource {
  connect(host: string, port: number, timeoutMs: number): Promise<ConnectResult>;
  write(data: Buffer, timeoutMs: number): Promise<SendResult>;
  close(): void;
}

export type EngineSocketFactory = () => EngineSocket;

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
