import { createHash, timingSafeEqual } from 'crypto';
import type { SessionState } from '@orgld/shared';
import { InvalidCredentialsError, UnauthorizedError } from '../errors.js';
import { getSharedSecret } from '../ssm.js';
import type { Trace } from '../trace.js';

// Hash both sides so the comparison runs on equal-length buffers
function digest(value: string): Buffer {
  return createHash('sha256').update(value, 'utf8').digest();
}

export function secretsMatch(candidate: string, secret: string): boolean {
  if (!secret) return false;
  return timingSafeEqual(digest(candidate), digest(secret));
}

/**
 * Shared-secret gate. A match flips the session flag; a miss throws with no
 * attempt limit.
 */
export async function login(session: SessionState, password: string, trace: Trace): Promise<void> {
  const secret = await getSharedSecret();

  if (!secretsMatch(password, secret)) {
    trace.warn('Auth failed');
    throw new InvalidCredentialsError();
  }

  session.authenticated = true;
  trace.ok('Auth OK');
}

export function requireAuthenticated(session: SessionState): void {
  if (!session.authenticated) {
    throw new UnauthorizedError('Session is locked, log in first');
  }
}
