// src/tools/diagnostics.ts
// Bridge-side diagnostics: connection status, manual reset and the log buffer.
// None of these talk to the editor.

import { z } from 'zod';

import type { ConnectionState } from '../connection/connectionManager.js';
import type { ConnectionRegistry } from '../connection/registry.js';
import { clearLogs as clearLogBuffer, getLogs as readLogBuffer } from '../logger.js';

export interface ConnectionStatus {
  endpoint: string;
  state: ConnectionState;
  last_error: string | null;
  /** False until the first command creates the shared connection */
  initialized: boolean;
}

export function getConnectionStatus(registry: ConnectionRegistry): ConnectionStatus {
  const dispatcher = registry.peek();
  const { host, port } = registry.options;
  return {
    endpoint: `${host}:${port}`,
    state: dispatcher ? dispatcher.state : 'disconnected',
    last_error: dispatcher ? dispatcher.connection.lastError : null,
    initialized: dispatcher !== null,
  };
}

export async function resetConnection(registry: ConnectionRegistry): Promise<{ success: true; message: string }> {
  await registry.reset();
  return { success: true, message: 'Connection reset; the next command reconnects' };
}

export const GetLogsArgs = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
  source: z.string().optional(),
  limit: z.number().int().positive().default(50),
});
export type GetLogsArgs = z.infer<typeof GetLogsArgs>;

export function getLogs(args: GetLogsArgs) {
  const logs = readLogBuffer({ level: args.level, source: args.source, limit: args.limit });
  return {
    count: logs.length,
    logs: logs.map(entry => ({
      timestamp: entry.timestamp.toISOString(),
      level: entry.level,
      source: entry.source ?? null,
      message: entry.message,
    })),
  };
}

export function clearLogs(): { cleared: number } {
  return clearLogBuffer();
}
