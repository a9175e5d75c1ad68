import { normalizeLogLevel, type LogLevel } from './logger';

export type StorageDriver = 'firestore' | 'memory';

export interface ServerConfig {
  port: number;
  corsOrigin: string | string[];
  storageDriver: StorageDriver;
  filesBaseUrl: string;
  voiceBaseUrl: string;
  typingTimeoutMs: number;
  storageTimeoutMs: number;
  inviteTtlDays: number;
  logLevel: LogLevel;
}

type Env = Record<string, string | undefined>;

const DEFAULT_PORT = 8080;
const DEFAULT_TYPING_TIMEOUT_MS = 6000;
const DEFAULT_STORAGE_TIMEOUT_MS = 12000;
const DEFAULT_INVITE_TTL_DAYS = 7;

function parseInteger(value: unknown, fallback: number): number {
  if (value === undefined || value === null || value === '') {
    return fallback;
  }
  const parsed = Number.parseInt(String(value), 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function parsePositiveInteger(value: unknown, fallback: number): number {
  const parsed = parseInteger(value, fallback);
  return parsed > 0 ? parsed : fallback;
}

function parseCorsOrigin(value: string | undefined): string | string[] {
  const trimmed = (value || '').trim();
  if (!trimmed || trimmed === '*') {
    return '*';
  }
  const origins = trimmed
    .split(',')
    .map((origin) => origin.trim())
    .filter(Boolean);
  return origins.length === 1 ? origins[0] : origins;
}

function parseStorageDriver(value: string | undefined): StorageDriver {
  return (value || '').trim().toLowerCase() === 'memory' ? 'memory' : 'firestore';
}

function trimTrailingSlashes(value: string): string {
  return value.replace(/\/+$/, '');
}

export function loadServerConfig(env: Env = process.env): ServerConfig {
  return {
    port: parsePositiveInteger(env.PORT ?? env.SERVER_PORT, DEFAULT_PORT),
    corsOrigin: parseCorsOrigin(env.CORS_ORIGIN),
    storageDriver: parseStorageDriver(env.STORAGE_DRIVER),
    filesBaseUrl: trimTrailingSlashes(env.FILES_BASE_URL?.trim() || '/u/files'),
    voiceBaseUrl: trimTrailingSlashes(env.VOICE_BASE_URL?.trim() || '/u/voices'),
    typingTimeoutMs: parsePositiveInteger(env.TYPING_TIMEOUT_MS, DEFAULT_TYPING_TIMEOUT_MS),
    storageTimeoutMs: parsePositiveInteger(env.STORAGE_TIMEOUT_MS, DEFAULT_STORAGE_TIMEOUT_MS),
    inviteTtlDays: parsePositiveInteger(env.INVITE_TTL_DAYS, DEFAULT_INVITE_TTL_DAYS),
    logLevel: normalizeLogLevel(env.LOG_LEVEL?.trim().toLowerCase()),
  };
}
