// src/connection/errors.ts
// Transport failures are returned as values; the retry loops match on `kind`.

export type TransportErrorKind =
  // connect phase
  | 'connect_timeout'
  | 'connection_refused'
  | 'os_error'
  | 'connect_failed'
  // exchange phase
  | 'send_timeout'
  | 'connection_closed'
  | 'receive_timeout'
  | 'socket_error'
  // not worth retrying
  | 'serialization'
  | 'invalid_response'
  | 'unexpected';

export interface TransportError {
  kind: TransportErrorKind;
  message: string;
}

export interface Failure {
  ok: false;
  error: TransportError;
}

export type ConnectResult = { ok: true } | Failure;
export type SendResult = { ok: true } | Failure;

const TERMINAL_KINDS: ReadonlySet<TransportErrorKind> = new Set<TransportErrorKind>([
  'serialization',
  'invalid_response',
  'unexpected',
]);

export function isTransient(kind: TransportErrorKind): boolean {
  return !TERMINAL_KINDS.has(kind);
}

export function transportError(kind: TransportErrorKind, message: string): TransportError {
  return { kind, message };
}

export function failure(kind: TransportErrorKind, message: string): Failure {
  return { ok: false, error: transportError(kind, message) };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** The `code` of a Node system error (ECONNREFUSED, ETIMEDOUT, ...), if any */
export function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
