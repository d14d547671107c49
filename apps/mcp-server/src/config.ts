import type { LevelWithSilent } from 'pino';
import { DEFAULT_BASE_URL, DEFAULT_TIMEOUT_MS } from '@jobdesk/provider-adzuna';

const DEFAULT_LOG_LEVEL: LevelWithSilent = 'info';
const DEFAULT_SERVICE_NAME = 'jobdesk-mcp';
const DEFAULT_USER_AGENT = 'jobdesk-mcp/0.1';
const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const satisfies readonly LevelWithSilent[];

export interface AdzunaConfig {
  appId: string;
  appKey: string;
  baseUrl: string;
  timeoutMs: number;
  userAgent: string;
}

export interface ServerConfig {
  adzuna: AdzunaConfig;
  logLevel: LevelWithSilent;
  serviceName: string;
}

type Env = Record<string, string | undefined>;

function readStringEnv(env: Env, name: string, fallback: string): string {
  return env[name]?.trim() || fallback;
}

function readIntEnv(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (!raw) {
    return fallback;
  }

  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    return fallback;
  }

  return Math.floor(parsed);
}

function readLogLevel(env: Env): LevelWithSilent {
  const raw = env.LOG_LEVEL?.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === raw) ?? DEFAULT_LOG_LEVEL;
}

/**
 * Credentials are read as-is and never validated: with missing values every
 * upstream call is rejected and the tools report zero results.
 */
export function loadConfig(env: Env = process.env): ServerConfig {
  return {
    adzuna: {
      appId: env.ADZUNA_APP_ID?.trim() ?? '',
      appKey: env.ADZUNA_APP_KEY?.trim() ?? '',
      baseUrl: readStringEnv(env, 'ADZUNA_BASE_URL', DEFAULT_BASE_URL),
      timeoutMs: readIntEnv(env, 'ADZUNA_TIMEOUT_MS', DEFAULT_TIMEOUT_MS),
      userAgent: readStringEnv(env, 'ADZUNA_USER_AGENT', DEFAULT_USER_AGENT),
    },
    logLevel: readLogLevel(env),
    serviceName: readStringEnv(env, 'LOG_SERVICE_NAME', DEFAULT_SERVICE_NAME),
  };
}

export function hasCredentials(config: AdzunaConfig): boolean {
  return config.appId.length > 0 && config.appKey.length > 0;
}
