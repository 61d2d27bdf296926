// src/connection/framing.ts
// Response framing for the editor socket. There is no length prefix or
// delimiter: a response is complete once everything received so far decodes
// as UTF-8 and parses as one JSON document.
//
// Known fragility: a top-level scalar can parse early ("12" of "123"), and two
// documents sent back to back would be read as one malformed document. Every
// response the plugin sends is a single JSON object, so this holds in practice.

import { type ConnectionOptions, receiveTimeoutFor } from './config.js';
import { type Failure, failure } from './errors.js';
import type { ChunkSource, JsonValue } from './types.js';
import { createLogger } from '../logger.js';

const log = createLogger('FramedReceiver');

export type ReceiveOptions = Pick<
  ConnectionOptions,
  'chunkSize' | 'defaultReceiveTimeoutMs' | 'largeOperationReceiveTimeoutMs' | 'largeOperationCommands'
>;

export interface ReceivedResponse {
  ok: true;
  /** Raw bytes of the complete document */
  data: Buffer;
  /** The parsed document */
  value: JsonValue;
  /** Number of socket reads it took */
  reads: number;
}

export type ReceiveResult = ReceivedResponse | Failure;

export type ParseAttempt = { complete: true; value: JsonValue } | { complete: false };

const decoder = new TextDecoder('utf-8', { fatal: true });

/**
 * Decode `data` as strict UTF-8 and parse it as JSON. A truncated multi-byte
 * sequence or a JSON syntax error both mean "not complete yet".
 */
export function tryParseDocument(data: Uint8Array): ParseAttempt {
  let text: string;
  try {
    text = decoder.decode(data);
  } catch {
    return { complete: false };
  }
  try {
    const value: JsonValue = JSON.parse(text);
    return { complete: true, value };
  } catch {
    return { complete: false };
  }
}

function formatSeconds(ms: number): string {
  return `${(ms / 1000).toFixed(1)}s`;
}

/**
 * Read from `source` until the accumulated bytes form a complete JSON document.
 * The class timeout applies to each read and to the whole exchange.
 */
export async function receiveResponse(
  source: ChunkSource,
  commandName: string,
  options: ReceiveOptions,
  now: () => number = Date.now
): Promise<ReceiveResult> {
  const timeoutMs = receiveTimeoutFor(commandName, options);
  const startedAt = now();
  const chunks: Buffer[] = [];
  let totalBytes = 0;
  let reads = 0;

  const timedOut = (): Failure => {
    const elapsed = formatSeconds(now() - startedAt);
    return failure(
      'receive_timeout',
      `Timeout after ${elapsed} waiting for response to ${commandName} (received ${totalBytes} bytes)`
    );
  };

  const complete = (value: JsonValue): ReceivedResponse => ({
    ok: true,
    data: Buffer.concat(chunks, totalBytes),
    value,
    reads,
  });

  while (true) {
    if (now() - startedAt > timeoutMs) {
      return timedOut();
    }

    const outcome = await source.read(options.chunkSize, timeoutMs);
    reads++;

    switch (outcome.kind) {
      case 'data': {
        chunks.push(outcome.chunk);
        totalBytes += outcome.chunk.length;
        const parsed = tryParseDocument(Buffer.concat(chunks, totalBytes));
        if (parsed.complete) {
          log.info(`Received complete response (${totalBytes} bytes) for ${commandName}`);
          return complete(parsed.value);
        }
        break;
      }

      // Every data read already tried the accumulator, so on end or timeout
      // whatever is buffered is known to be incomplete.
      case 'end':
        if (chunks.length === 0) {
          return failure('connection_closed', 'Connection closed before receiving any data');
        }
        return failure('connection_closed', `Connection closed with incomplete data (${totalBytes} bytes)`);

      case 'timeout':
        return timedOut();

      case 'error':
        return { ok: false, error: outcome.error };
    }
  }
}
