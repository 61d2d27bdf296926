// src/connection/tcpSocket.ts
// EngineSocket over a real TCP socket. The stream stays in paused mode so the
// receiver can pull bounded chunks the way a blocking recv() would.

import type * as net from 'net';

import type { ConnectionOptions } from './config.js';
import { type ConnectResult, type SendResult, errorCode, errorMessage, failure, transportError } from './errors.js';
import { closeSocket, createSocket } from './socketFactory.js';
import type { EngineSocket, EngineSocketFactory, ReadOutcome } from './types.js';

export class TcpEngineSocket implements EngineSocket {
  private ended = false;
  private closed = false;
  private connected = false;
  private socketError: Error | null = null;
  private wake: (() => void) | null = null;

  constructor(
    private readonly socket: net.Socket,
    private readonly abortiveClose: boolean = true
  ) {
    // Listeners stay attached for the socket's whole life; an 'error' with no
    // listener would take the process down.
    socket.on('readable', () => this.notify());
    socket.on('end', () => {
      this.ended = true;
      this.notify();
    });
    socket.on('error', (error: Error) => {
      this.socketError = error;
      this.notify();
    });
    socket.on('close', () => {
      this.closed = true;
      this.notify();
    });
  }

  connect(host: string, port: number, timeoutMs: number): Promise<ConnectResult> {
    return new Promise(resolve => {
      const settle = (result: ConnectResult) => {
        clearTimeout(timer);
        this.socket.off('connect', onConnect);
        this.socket.off('error', onError);
        resolve(result);
      };

      const onConnect = () => {
        this.connected = true;
        settle({ ok: true });
      };

      const onError = (error: Error) => {
        const code = errorCode(error);
        if (code === 'ECONNREFUSED') {
          settle(failure('connection_refused', `Connection refused: ${errorMessage(error)}`));
        } else if (code === 'ETIMEDOUT') {
          settle(failure('connect_timeout', `Connection timeout: ${errorMessage(error)}`));
        } else {
          settle(failure('os_error', `OS error: ${errorMessage(error)}`));
        }
      };

      const timer = setTimeout(() => {
        settle(failure('connect_timeout', `Connection timeout: no answer from ${host}:${port} within ${timeoutMs}ms`));
        this.socket.destroy();
      }, timeoutMs);

      this.socket.once('connect', onConnect);
      this.socket.once('error', onError);
      this.socket.connect({ host, port });
    });
  }

  write(data: Buffer, timeoutMs: number): Promise<SendResult> {
    return new Promise(resolve => {
      let done = false;
      const settle = (result: SendResult) => {
        if (done) return;
        done = true;
        clearTimeout(timer);
        resolve(result);
      };

      const timer = setTimeout(() => {
        settle(failure('send_timeout', `Send timed out after ${timeoutMs}ms (${data.length} bytes)`));
      }, timeoutMs);

      if (!this.connected || this.socket.destroyed) {
        settle(failure('socket_error', 'Socket is not connected'));
        return;
      }

      this.socket.write(data, error => {
        if (error) {
          settle(failure('socket_error', `Send failed: ${errorMessage(error)}`));
        } else {
          settle({ ok: true });
        }
      });
    });
  }

  read(maxBytes: number, timeoutMs: number): Promise<ReadOutcome> {
    return new Promise(resolve => {
      let timer: NodeJS.Timeout | undefined;

      const finish = (outcome: ReadOutcome) => {
        if (timer) clearTimeout(timer);
        this.wake = null;
        resolve(outcome);
      };

      const attempt = (): boolean => {
        const chunk: unknown = this.socket.read();
        if (Buffer.isBuffer(chunk)) {
          if (chunk.length > maxBytes) {
            this.socket.unshift(chunk.subarray(maxBytes));
            finish({ kind: 'data', chunk: chunk.subarray(0, maxBytes) });
          } else {
            finish({ kind: 'data', chunk });
          }
          return true;
        }
        if (this.socketError) {
          finish({ kind: 'error', error: transportError('socket_error', `Socket error: ${errorMessage(this.socketError)}`) });
          return true;
        }
        if (this.ended || this.closed) {
          finish({ kind: 'end' });
          return true;
        }
        return false;
      };

      if (attempt()) return;

      timer = setTimeout(() => finish({ kind: 'timeout' }), timeoutMs);
      this.wake = () => {
        attempt();
      };
    });
  }

  close(): void {
    this.wake = null;
    closeSocket(this.socket, this.abortiveClose, this.connected);
    this.connected = false;
  }

  private notify(): void {
    this.wake?.();
  }
}

export function tcpSocketFactory(options: Pick<ConnectionOptions, 'socketBufferSize' | 'abortiveClose'>): EngineSocketFactory {
  return () => new TcpEngineSocket(createSocket(options), options.abortiveClose);
}
