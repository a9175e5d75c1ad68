import { resolveIdentity } from '../realtime/socket-auth';
import type { Identity } from '../types/realtime';
import { loadServerConfig } from './config';
import { AuthorizationError, errorMessage, isRealtimeError } from './errors';
import { extractBearerToken, getAdminFirestore, verifyFirebaseToken, type TokenVerifier } from './firebase-admin';
import { FirestoreStorage } from './firestore-storage';
import { logger } from './logger';
import type { StorageGateway } from './storage-gateway';
import { asRecord } from './utils';

/** The parts of a Vercel request the board routes read. */
export interface ApiRequest {
  method?: string;
  headers: Record<string, string | string[] | undefined>;
  query: Record<string, string | string[] | undefined>;
  body?: unknown;
}

export interface ApiResponse {
  status(code: number): ApiResponse;
  json(body: unknown): unknown;
  end(): unknown;
  setHeader(name: string, value: string): unknown;
}

export interface ApiDeps {
  storage: StorageGateway;
  verifyToken: TokenVerifier;
  inviteTtlDays: number;
  now: () => Date;
}

export type ApiHandler = (req: ApiRequest, res: ApiResponse) => Promise<void>;

let defaultDeps: ApiDeps | null = null;

/** Firestore-backed dependencies shared by every route in one function instance. */
export function getDefaultApiDeps(): ApiDeps {
  if (!defaultDeps) {
    const config = loadServerConfig();
    defaultDeps = {
      storage: new FirestoreStorage(getAdminFirestore(), { timeoutMs: config.storageTimeoutMs }),
      verifyToken: verifyFirebaseToken,
      inviteTtlDays: config.inviteTtlDays,
      now: () => new Date(),
    };
  }
  return defaultDeps;
}

/** Answers CORS preflight; returns false when the request is already handled. */
export function applyCors(req: ApiRequest, res: ApiResponse, methods: string): boolean {
  res.setHeader('Access-Control-Allow-Origin', '*');
  res.setHeader('Access-Control-Allow-Methods', `${methods}, OPTIONS`);
  res.setHeader('Access-Control-Allow-Headers', 'Content-Type, Authorization');

  if (req.method === 'OPTIONS') {
    res.status(200).end();
    return false;
  }
  if (!methods.split(',').some((method) => method.trim() === req.method)) {
    res.status(405).json({ error: 'Method not allowed' });
    return false;
  }
  return true;
}

export function readQueryString(req: ApiRequest, key: string): string {
  const value = req.query[key];
  const first = Array.isArray(value) ? value[0] : value;
  return typeof first === 'string' ? first.trim() : '';
}

export function readBodyField(req: ApiRequest, key: string): unknown {
  return asRecord(req.body)[key];
}

/** Identity from `Authorization: Bearer`, or null when no token was sent. */
export async function readRequestIdentity(req: ApiRequest, deps: ApiDeps): Promise<Identity | null> {
  const token = extractBearerToken(req.headers.authorization);
  if (!token) {
    return null;
  }
  return resolveIdentity(token, deps);
}

export async function requireRequestIdentity(req: ApiRequest, deps: ApiDeps): Promise<Identity> {
  const identity = await readRequestIdentity(req, deps);
  if (!identity) {
    throw new AuthorizationError('auth required');
  }
  return identity;
}

const STATUS_BY_CODE = {
  validation: 400,
  not_found: 404,
  forbidden: 403,
  storage: 500,
} as const;

export function sendApiError(res: ApiResponse, route: string, err: unknown): void {
  if (isRealtimeError(err)) {
    const status =
      err.code === 'forbidden' && (err.message === 'auth required' || err.message === 'Authentication failed')
        ? 401
        : STATUS_BY_CODE[err.code];
    if (status >= 500) {
      logger.error('API', `${route} failed: ${err.message}`, { route });
    }
    res.status(status).json({ error: err.message });
    return;
  }
  logger.error('API', `${route} failed: ${errorMessage(err)}`, { route });
  res.status(500).json({ error: 'Internal server error' });
}
