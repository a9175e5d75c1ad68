import { cert, getApps, initializeApp } from 'firebase-admin/app';
import { getAuth } from 'firebase-admin/auth';
import { getFirestore, type Firestore } from 'firebase-admin/firestore';

export interface VerifiedToken {
  uid: string;
  name: string | null;
  email: string | null;
}

export type TokenVerifier = (token: string) => Promise<VerifiedToken>;

function getFirebasePrivateKey(): string | undefined {
  const raw = process.env.FIREBASE_PRIVATE_KEY;
  if (!raw) return undefined;
  return raw.includes('\\n') ? raw.replace(/\\n/g, '\n') : raw;
}

export function ensureFirebaseAdmin(): void {
  if (getApps().length > 0) return;
  const projectId = process.env.FIREBASE_PROJECT_ID;
  const clientEmail = process.env.FIREBASE_CLIENT_EMAIL;
  const privateKey = getFirebasePrivateKey();
  if (!projectId || !clientEmail || !privateKey) {
    throw new Error('Firebase Admin is not configured');
  }
  initializeApp({ credential: cert({ projectId, clientEmail, privateKey }) });
}

export function getAdminFirestore(): Firestore {
  ensureFirebaseAdmin();
  return getFirestore();
}

export const verifyFirebaseToken: TokenVerifier = async (token) => {
  ensureFirebaseAdmin();
  const decoded = await getAuth().verifyIdToken(token);
  return {
    uid: decoded.uid,
    name: typeof decoded.name === 'string' ? decoded.name : null,
    email: typeof decoded.email === 'string' ? decoded.email : null,
  };
};

export function extractBearerToken(value: unknown): string | null {
  if (!value || typeof value !== 'string') return null;
  const match = value.match(/^Bearer\s+(.+)$/i);
  return match?.[1]?.trim() || null;
}
