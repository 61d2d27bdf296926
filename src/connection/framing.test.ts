// ═══════════════════════════════════════════════════════════════════════════
// Framed Receiver Tests
// ═══════════════════════════════════════════════════════════════════════════

import { describe, it, expect } from 'vitest';
import { DEFAULT_CONNECTION_OPTIONS } from './config.js';
import { transportError } from './errors.js';
import { receiveResponse, tryParseDocument } from './framing.js';
import type { ChunkSource, ReadOutcome } from './types.js';

type Step = Buffer | string | { kind: 'end' } | { kind: 'timeout' } | { kind: 'error'; message: string };

/** Replays steps; each step may also move the clock forward */
class ScriptedSource implements ChunkSource {
  time = 0;
  readonly requestedTimeouts: number[] = [];
  private readonly steps: Step[];

  constructor(steps: Step[], private readonly msPerRead = 0) {
    this.steps = [...steps];
  }

  readonly now = () => this.time;

  async read(maxBytes: number, timeoutMs: number): Promise<ReadOutcome> {
    this.requestedTimeouts.push(timeoutMs);
    this.time += this.msPerRead;
    const step = this.steps.shift();
    if (step === undefined) return { kind: 'end' };
    if (typeof step === 'string' || Buffer.isBuffer(step)) {
      const chunk = typeof step === 'string' ? Buffer.from(step, 'utf-8') : step;
      if (chunk.length > maxBytes) {
        this.steps.unshift(chunk.subarray(maxBytes));
        return { kind: 'data', chunk: chunk.subarray(0, maxBytes) };
      }
      return { kind: 'data', chunk };
    }
    if (step.kind === 'timeout') {
      this.time += timeoutMs;
      return { kind: 'timeout' };
    }
    if (step.kind === 'error') {
      return { kind: 'error', error: transportError('socket_error', step.message) };
    }
    return { kind: 'end' };
  }
}

const options = DEFAULT_CONNECTION_OPTIONS;

describe('tryParseDocument', () => {
  it('should accept a complete object', () => {
    expect(tryParseDocument(Buffer.from('{"status":"success"}'))).toEqual({
      complete: true,
      value: { status: 'success' },
    });
  });

  it('should treat truncated JSON as incomplete', () => {
    expect(tryParseDocument(Buffer.from('{"status":'))).toEqual({ complete: false });
  });

  it('should treat a split multi-byte character as incomplete', () => {
    const bytes = Buffer.from('{"name":"Café"}', 'utf-8');
    expect(tryParseDocument(bytes.subarray(0, 13))).toEqual({ complete: false });
  });
});

describe('receiveResponse', () => {
  // ─────────────────────────────────────────────────────────────────────────
  // Framing
  // ─────────────────────────────────────────────────────────────────────────

  describe('framing', () => {
    it('should return after three reads when the document arrives in three chunks', async () => {
      const bytes = Buffer.from('{"name":"Café"}', 'utf-8');
      const source = new ScriptedSource([bytes.subarray(0, 13), bytes.subarray(13, 15), bytes.subarray(15)]);

      const result = await receiveResponse(source, 'get_actors_in_level', options, source.now);

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value).toEqual({ name: 'Café' });
      expect(result.reads).toBe(3);
      expect(result.data.equals(bytes)).toBe(true);
    });

    it('should reassemble a document read one byte at a time', async () => {
      const document = { status: 'success', result: { actors: ['Floor', 'Sky Sphere'], note: 'ünïcödé ✓' } };
      const text = JSON.stringify(document);
      const source = new ScriptedSource([text]);

      const result = await receiveResponse(source, 'get_actors_in_level', { ...options, chunkSize: 1 }, source.now);

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value).toEqual(document);
      expect(result.reads).toBe(Buffer.byteLength(text, 'utf-8'));
    });

    it('should read at most chunkSize bytes per read', async () => {
      const text = JSON.stringify({ padding: 'x'.repeat(20000) });
      const source = new ScriptedSource([text]);

      const result = await receiveResponse(source, 'get_actors_in_level', options, source.now);

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.reads).toBe(Math.ceil(Buffer.byteLength(text) / 8192));
    });
  });

  // ─────────────────────────────────────────────────────────────────────────
  // End of stream
  // ─────────────────────────────────────────────────────────────────────────

  describe('end of stream', () => {
    it('should fail when the peer closes before sending anything', async () => {
      const source = new ScriptedSource([{ kind: 'end' }]);

      const result = await receiveResponse(source, 'get_actors_in_level', options, source.now);

      expect(result).toEqual({
        ok: false,
        error: { kind: 'connection_closed', message: 'Connection closed before receiving any data' },
      });
    });

    it('should fail with the byte count when the peer closes mid-document', async () => {
      const source = new ScriptedSource(['{"a":', { kind: 'end' }]);

      const result = await receiveResponse(source, 'get_actors_in_level', options, source.now);

      expect(result).toEqual({
        ok: false,
        error: { kind: 'connection_closed', message: 'Connection closed with incomplete data (5 bytes)' },
      });
    });
  });

  // ─────────────────────────────────────────────────────────────────────────
  // Timeouts
  // ─────────────────────────────────────────────────────────────────────────

  describe('timeouts', () => {
    it('should report elapsed time and bytes when the peer goes silent', async () => {
      const source = new ScriptedSource(['{"a":', { kind: 'timeout' }]);

      const result = await receiveResponse(source, 'get_actors_in_level', options, source.now);

      expect(result).toEqual({
        ok: false,
        error: {
          kind: 'receive_timeout',
          message: 'Timeout after 30.0s waiting for response to get_actors_in_level (received 5 bytes)',
        },
      });
    });

    it('should return a parsed document without waiting for a later read', async () => {
      const source = new ScriptedSource(['{"a":', '1}', { kind: 'timeout' }]);

      const result = await receiveResponse(source, 'get_actors_in_level', options, source.now);

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value).toEqual({ a: 1 });
      expect(result.reads).toBe(2);
      expect(source.time).toBe(0);
    });

    it('should pass the large-operation timeout to each read', async () => {
      const source = new ScriptedSource([{ kind: 'timeout' }]);

      const result = await receiveResponse(source, 'create_town', options, source.now);

      expect(source.requestedTimeouts).toEqual([300000]);
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.message).toBe('Timeout after 300.0s waiting for response to create_town (received 0 bytes)');
    });

    it('should stop once the overall deadline passes between reads', async () => {
      const source = new ScriptedSource(['{"a"', ':', '1}'], 20000);

      const result = await receiveResponse(source, 'get_actors_in_level', options, source.now);

      expect(result).toEqual({
        ok: false,
        error: {
          kind: 'receive_timeout',
          message: 'Timeout after 40.0s waiting for response to get_actors_in_level (received 5 bytes)',
        },
      });
    });
  });

  it('should pass socket errors through', async () => {
    const source = new ScriptedSource(['{"a":', { kind: 'error', message: 'Socket error: read ECONNRESET' }]);

    const result = await receiveResponse(source, 'get_actors_in_level', options, source.now);

    expect(result).toEqual({
      ok: false,
      error: { kind: 'socket_error', message: 'Socket error: read ECONNRESET' },
    });
  });
});
