/**
 * Process configuration from environment variables.
 *
 * PORT       listening port (default 5000)
 * SECRET_KEY HMAC key for signed notice cookies; when unset a random key
 *            is generated, so notices do not survive a restart
 * LOG_LEVEL  debug | info | warn | error (default info)
 */

import { randomBytes } from 'crypto';
import { LogLevel, parseLogLevel } from './logger';

export interface AppConfig {
  port: number;
  secretKey: string;
  /** True when SECRET_KEY was absent and `secretKey` is a per-process random value. */
  secretKeyGenerated: boolean;
  logLevel: LogLevel;
}

export const DEFAULT_PORT = 5000;

export class ConfigError extends Error {
  constructor(
    public readonly variable: string,
    message: string,
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const port = parsePort(env.PORT);

  const configuredSecret = env.SECRET_KEY?.trim();
  const secretKeyGenerated = !configuredSecret;
  const secretKey = configuredSecret || randomBytes(32).toString('hex');

  let logLevel = LogLevel.Info;
  if (env.LOG_LEVEL) {
    const parsed = parseLogLevel(env.LOG_LEVEL);
    if (!parsed) {
      throw new ConfigError('LOG_LEVEL', `Invalid LOG_LEVEL: ${env.LOG_LEVEL}`);
    }
    logLevel = parsed;
  }

  return { port, secretKey, secretKeyGenerated, logLevel };
}

function parsePort(raw: string | undefined): number {
  if (raw === undefined || raw.trim() === '') return DEFAULT_PORT;
  const port = Number(raw);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new ConfigError('PORT', `Invalid PORT: ${raw}`);
  }
  return port;
}
