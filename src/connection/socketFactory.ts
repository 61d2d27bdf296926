// src/connection/socketFactory.ts
// Builds one configured, not-yet-connected TCP socket per connection attempt.

import * as net from 'net';

import type { ConnectionOptions } from './config.js';
import { createLogger } from '../logger.js';
import { errorMessage } from './errors.js';

const log = createLogger('SocketFactory');

export type SocketSettings = Pick<ConnectionOptions, 'socketBufferSize'>;

/**
 * No-delay and keep-alive are applied once the handle exists. Node does not
 * expose SO_RCVBUF/SO_SNDBUF on stream sockets, so the buffer size caps the
 * stream's own read and write buffers instead.
 */
export function createSocket(settings: SocketSettings): net.Socket {
  const socketOptions = {
    allowHalfOpen: false,
    readableHighWaterMark: settings.socketBufferSize,
    writableHighWaterMark: settings.socketBufferSize,
  };
  const socket = new net.Socket(socketOptions);
  socket.setNoDelay(true);
  socket.setKeepAlive(true);
  return socket;
}

/**
 * Close a socket. With `abortive` a connection that is still open both ways is
 * reset (zero linger); if the handle refuses that, fall back to a plain
 * destroy. Once either side has ended, the handle is already shutting down and
 * a reset would fail with EINVAL, so such a socket is destroyed instead, as is
 * one that never connected.
 */
export function closeSocket(socket: net.Socket, abortive: boolean, established: boolean): void {
  if (socket.destroyed) return;

  const fullyOpen = established && !socket.readableEnded && !socket.writableEnded;
  if (abortive && fullyOpen) {
    try {
      socket.resetAndDestroy();
      return;
    } catch (error) {
      log.debug(`Abortive close unavailable, destroying instead: ${errorMessage(error)}`);
    }
  } else if (fullyOpen) {
    socket.end();
  }
  socket.destroy();
}
