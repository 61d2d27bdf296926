// src/connection/config.ts
// Fixed connection settings for the Unreal Editor command socket

export interface ConnectionOptions {
  /** Address the editor plugin listens on */
  host: string;
  port: number;
  /** Retries after the first try; a connect or command gets maxRetries + 1 tries */
  maxRetries: number;
  baseRetryDelayMs: number;
  maxRetryDelayMs: number;
  connectTimeoutMs: number;
  sendTimeoutMs: number;
  defaultReceiveTimeoutMs: number;
  largeOperationReceiveTimeoutMs: number;
  /** Largest read taken from the socket in one go */
  chunkSize: number;
  /** Read and write buffer size of the socket */
  socketBufferSize: number;
  /** Close with a reset instead of a graceful FIN (zero linger) */
  abortiveClose: boolean;
  /** Command names (matched as substrings) that get the long receive timeout */
  largeOperationCommands: readonly string[];
}

export type TimeoutClass = 'default' | 'large';

export const LARGE_OPERATION_COMMANDS: readonly string[] = Object.freeze([
  'get_available_materials',
  'create_town',
  'create_castle_fortress',
  'construct_mansion',
  'create_suspension_bridge',
  'create_aqueduct',
  'create_maze',
]);

export const DEFAULT_CONNECTION_OPTIONS: Readonly<ConnectionOptions> = Object.freeze({
  host: '127.0.0.1',
  port: 55557,
  maxRetries: 3,
  baseRetryDelayMs: 500,
  maxRetryDelayMs: 5000,
  connectTimeoutMs: 10_000,
  sendTimeoutMs: 10_000,
  defaultReceiveTimeoutMs: 30_000,
  largeOperationReceiveTimeoutMs: 300_000,
  chunkSize: 8192,
  socketBufferSize: 128 * 1024,
  abortiveClose: true,
  largeOperationCommands: LARGE_OPERATION_COMMANDS,
});

export function resolveConnectionOptions(overrides: Partial<ConnectionOptions> = {}): ConnectionOptions {
  const defaults = DEFAULT_CONNECTION_OPTIONS;
  return {
    host: overrides.host ?? defaults.host,
    port: overrides.port ?? defaults.port,
    maxRetries: overrides.maxRetries ?? defaults.maxRetries,
    baseRetryDelayMs: overrides.baseRetryDelayMs ?? defaults.baseRetryDelayMs,
    maxRetryDelayMs: overrides.maxRetryDelayMs ?? defaults.maxRetryDelayMs,
    connectTimeoutMs: overrides.connectTimeoutMs ?? defaults.connectTimeoutMs,
    sendTimeoutMs: overrides.sendTimeoutMs ?? defaults.sendTimeoutMs,
    defaultReceiveTimeoutMs: overrides.defaultReceiveTimeoutMs ?? defaults.defaultReceiveTimeoutMs,
    largeOperationReceiveTimeoutMs: overrides.largeOperationReceiveTimeoutMs ?? defaults.largeOperationReceiveTimeoutMs,
    chunkSize: overrides.chunkSize ?? defaults.chunkSize,
    socketBufferSize: overrides.socketBufferSize ?? defaults.socketBufferSize,
    abortiveClose: overrides.abortiveClose ?? defaults.abortiveClose,
    largeOperationCommands: overrides.largeOperationCommands ?? defaults.largeOperationCommands,
  };
}

/**
 * Backoff before the next try: base * 2^attempt, capped at maxRetryDelayMs.
 * `attempt` is zero-based, so the default schedule is 500, 1000, 2000 ms.
 */
export function retryDelayMs(attempt: number, options: Pick<ConnectionOptions, 'baseRetryDelayMs' | 'maxRetryDelayMs'>): number {
  return Math.min(options.baseRetryDelayMs * 2 ** attempt, options.maxRetryDelayMs);
}

export function timeoutClassFor(commandName: string, options: Pick<ConnectionOptions, 'largeOperationCommands'>): TimeoutClass {
  return options.largeOperationCommands.some(large => commandName.includes(large)) ? 'large' : 'default';
}

export function receiveTimeoutFor(
  commandName: string,
  options: Pick<ConnectionOptions, 'largeOperationCommands' | 'defaultReceiveTimeoutMs' | 'largeOperationReceiveTimeoutMs'>
): number {
  return timeoutClassFor(commandName, options) === 'large'
    ? options.largeOperationReceiveTimeoutMs
    : options.defaultReceiveTimeoutMs;
}
