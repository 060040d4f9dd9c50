export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface ServerConfig {
  /** Upstream base address; '' leaves the relay unconfigured. */
  upstreamUrl: string;
  host: string;
  port: number;
  staticDir: string;
  logLevel: LogLevel;
  generateTimeoutMs: number;
  statusTimeoutMs: number;
}
