import { resolve } from 'node:path';
import process from 'node:process';

import {
  DEFAULT_GENERATE_TIMEOUT_MS,
  DEFAULT_STATUS_TIMEOUT_MS,
  normalizeUpstreamBase,
} from '@prompt-relay/relay-core';

import { LOG_LEVELS, type LogLevel, type ServerConfig } from './types.js';

const DEFAULT_HOST = '127.0.0.1';
const DEFAULT_PORT = 8000;
// setTimeout fires immediately above this value
const MAX_TIMEOUT_MS = 2_147_483_647;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

function normalize(value?: string): string | undefined {
  if (typeof value !== 'string') {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function parseInteger(name: string, raw: string | undefined, fallback: number, min: number, max: number): number {
  const value = normalize(raw);
  if (value === undefined) {
    return fallback;
  }

  if (!/^\d+$/.test(value)) {
    throw new ConfigError(`${name} must be an integer (got '${value}')`);
  }

  const parsed = Number(value);
  if (parsed < min || parsed > max) {
    throw new ConfigError(`${name} must be between ${min} and ${max} (got ${parsed})`);
  }

  return parsed;
}

function parseUpstreamUrl(raw: string | undefined): string {
  try {
    return normalizeUpstreamBase(raw ?? '');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`COLAB_API_URL is not a valid http(s) URL: ${reason}`);
  }
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function parseLogLevel(raw: string | undefined): LogLevel {
  const value = normalize(raw)?.toLowerCase();
  if (value === undefined) {
    return 'info';
  }

  if (!isLogLevel(value)) {
    throw new ConfigError(`LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')} (got '${value}')`);
  }

  return value;
}

export function loadServerConfig(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): ServerConfig {
  return {
    upstreamUrl: parseUpstreamUrl(env.COLAB_API_URL),
    host: normalize(env.HOST) ?? DEFAULT_HOST,
    port: parseInteger('PORT', env.PORT, DEFAULT_PORT, 0, 65_535),
    staticDir: resolve(cwd, normalize(env.STATIC_DIR) ?? 'frontend'),
    logLevel: parseLogLevel(env.LOG_LEVEL),
    generateTimeoutMs: parseInteger(
      'GENERATE_TIMEOUT_MS',
      env.GENERATE_TIMEOUT_MS,
      DEFAULT_GENERATE_TIMEOUT_MS,
      1,
      MAX_TIMEOUT_MS,
    ),
    statusTimeoutMs: parseInteger(
      'STATUS_TIMEOUT_MS',
      env.STATUS_TIMEOUT_MS,
      DEFAULT_STATUS_TIMEOUT_MS,
      1,
      MAX_TIMEOUT_MS,
    ),
  };
}
