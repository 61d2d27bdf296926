// src/connection/index.ts

export * from './config.js';
export * from './errors.js';
export * from './types.js';
export { Mutex, type MutexLease } from './mutex.js';
export { createSocket, closeSocket } from './socketFactory.js';
export { TcpEngineSocket, tcpSocketFactory } from './tcpSocket.js';
export { receiveResponse, tryParseDocument, type ReceiveResult, type ReceivedResponse } from './framing.js';
export { ConnectionManager, type ConnectionState } from './connectionManager.js';
export { CommandDispatcher, normalizeResponse, errorResponse } from './dispatcher.js';
export { ConnectionRegistry, defaultRegistry, getConnection, resetConnection } from './registry.js';
