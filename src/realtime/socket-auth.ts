import { logger } from '../lib/logger';
import { AuthorizationError, errorMessage } from '../lib/errors';
import type { TokenVerifier, VerifiedToken } from '../lib/firebase-admin';
import { guestDisplayName, readGuestHandshake } from '../lib/guest';
import type { StorageGateway } from '../lib/storage-gateway';
import { asRecord } from '../lib/utils';
import type { Identity } from '../types/realtime';

export interface SocketAuthDeps {
  storage: StorageGateway;
  verifyToken: TokenVerifier;
}

export interface SocketSession {
  identity: Identity | null;
  guestName: string | null;
}

function fallbackUsername(uid: string, email: string | null): string {
  const local = email?.split('@')[0]?.trim();
  return (local || uid).toLowerCase();
}

/** Resolve a verified uid to the user document, falling back to token claims. */
export async function resolveIdentity(
  token: string,
  { storage, verifyToken }: SocketAuthDeps,
): Promise<Identity> {
  let verified: VerifiedToken;
  try {
    verified = await verifyToken(token);
  } catch (err) {
    logger.warn('AUTH', `Token verification failed: ${errorMessage(err)}`);
    throw new AuthorizationError('Authentication failed');
  }
  const user = await storage.getUserById(verified.uid);
  const username = user?.username ?? fallbackUsername(verified.uid, verified.email);
  return {
    userId: verified.uid,
    username,
    displayName: user?.displayName ?? verified.name ?? username,
  };
}

/**
 * `auth.token` identifies a user; `auth.guest` opens an anonymous session.
 * Anything else is refused.
 */
export async function authenticateHandshake(
  connId: string,
  rawAuth: unknown,
  deps: SocketAuthDeps,
): Promise<SocketSession> {
  const auth = asRecord(rawAuth);
  const token = typeof auth.token === 'string' ? auth.token.trim() : '';
  if (token) {
    const identity = await resolveIdentity(token, deps);
    logger.info('AUTH', `Connection ${connId} authenticated as '${identity.username}'`, {
      connId,
      userId: identity.userId,
    });
    return { identity, guestName: null };
  }

  const guest = readGuestHandshake(auth);
  if (!guest.guest) {
    throw new AuthorizationError('Authentication failed');
  }
  return { identity: null, guestName: guestDisplayName(connId, guest.name) };
}
