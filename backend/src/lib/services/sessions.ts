import { ulid } from 'ulid';
import type { EntityRecord, SessionState, SessionView, SocialLinks } from '@orgld/shared';
import { config } from '../config.js';
import { getItem, putItem, stripKeys } from '../dynamodb.js';
import { NotFoundError, SessionExpiredError } from '../errors.js';
import { Trace } from '../trace.js';
import { sessionStateSchema } from '../validation.js';
import { createEmptyRecord, createEmptySocialLinks, scoreRecord } from './entity-record.js';

const TABLE = config.tables.sessions;
const TTL_SECONDS = config.session.ttlHours * 3600;

function sessionKey(sessionId: string) {
  return { PK: `SESSION#${sessionId}`, SK: 'STATE' };
}

function expiryFrom(now: Date): number {
  return Math.floor(now.getTime() / 1000) + TTL_SECONDS;
}

export function newSessionState(now: Date = new Date()): SessionState {
  const timestamp = now.toISOString();
  return {
    sessionId: ulid(),
    authenticated: false,
    record: createEmptyRecord(),
    socialLinks: createEmptySocialLinks(),
    trace: [],
    createdAt: timestamp,
    updatedAt: timestamp,
    expiresAt: expiryFrom(now),
  };
}

async function writeSession(session: SessionState): Promise<void> {
  await putItem({
    TableName: TABLE,
    Item: {
      ...sessionKey(session.sessionId),
      ...session,
      ttl: session.expiresAt,
    },
  });
}

export async function createSession(): Promise<SessionState> {
  const session = newSessionState();
  await writeSession(session);
  return session;
}

export async function getSession(sessionId: string, now: Date = new Date()): Promise<SessionState> {
  const item = await getItem({
    TableName: TABLE,
    Key: sessionKey(sessionId),
  });

  if (!item) {
    throw new NotFoundError('Session', sessionId);
  }

  const session: SessionState = sessionStateSchema.parse(stripKeys(item));

  // DynamoDB TTL deletion is lazy
  if (session.expiresAt * 1000 < now.getTime()) {
    throw new SessionExpiredError(sessionId);
  }

  return session;
}

/**
 * Persist the session with the entries of its trace; every save extends the TTL.
 */
export async function saveSession(
  session: SessionState,
  trace: Trace,
  now: Date = new Date()
): Promise<SessionState> {
  const saved: SessionState = {
    ...session,
    trace: trace.entries,
    updatedAt: now.toISOString(),
    expiresAt: expiryFrom(now),
  };
  await writeSession(saved);
  return saved;
}

/**
 * Back to an empty record and link set. Authentication survives a reset.
 */
export function resetSession(session: SessionState, trace: Trace): void {
  session.record = createEmptyRecord();
  session.socialLinks = createEmptySocialLinks();
  trace.clear();
  trace.info('Session reset');
}

export function replaceProfile(
  session: SessionState,
  record: EntityRecord,
  socialLinks: SocialLinks
): void {
  session.record = record;
  session.socialLinks = socialLinks;
}

export function toSessionView(session: SessionState, trace: Trace): SessionView {
  return {
    sessionId: session.sessionId,
    authenticated: session.authenticated,
    record: session.record,
    socialLinks: session.socialLinks,
    score: scoreRecord(session.record),
    trace: trace.lines(),
  };
}
