import { CLIENT_NAME_MAX } from '../constants';
import { truncate } from './utils';

export interface GuestHandshake {
  guest: boolean;
  name: string | null;
}

/** Read the anonymous part of a socket handshake (`auth.guest`, `auth.guestName`). */
export function readGuestHandshake(auth: Record<string, unknown>): GuestHandshake {
  const name = truncate(auth.guestName, CLIENT_NAME_MAX);
  return {
    guest: auth.guest === true || auth.guest === 'true',
    name: name || null,
  };
}

/** Name shown for a guest that did not announce one. */
export function guestDisplayName(connId: string, announced: string | null): string {
  return announced || `Guest ${connId.slice(-4)}`;
}
