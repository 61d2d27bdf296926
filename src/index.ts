#!/usr/bin/env node
// src/index.ts
// Unreal MCP bridge: serves editor tools over stdio and forwards them to the
// editor plugin's TCP command socket

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';

import { resetConnection } from './connection/registry.js';
import { errorMessage } from './connection/errors.js';
import { createLogger } from './logger.js';
import { createServer } from './server.js';

const log = createLogger('Main');

let shuttingDown = false;

async function shutdown(reason: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  log.info(`Shutting down (${reason})`);
  try {
    await resetConnection();
  } catch (error) {
    log.error(`Error while closing the Unreal connection: ${errorMessage(error)}`);
  }
  process.exit(0);
}

async function main() {
  const server = createServer();
  const transport = new StdioServerTransport();

  process.stdin.on('close', () => void shutdown('stdin closed'));
  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  await server.connect(transport);
  log.info('Unreal MCP bridge running on stdio');
}

main().catch(error => {
  log.error(`Fatal: ${errorMessage(error)}`);
  process.exit(1);
});
