import type { TraceLevel } from './enums.js';
import type { EntityRecord, SocialLinks } from './organization.js';

export interface TraceEntry {
  at: string;          // ISO timestamp
  level: TraceLevel;
  message: string;
}

// Application state owned by one user session
export interface SessionState {
  sessionId: string;   // ULID
  authenticated: boolean;
  record: EntityRecord;
  socialLinks: SocialLinks;
  trace: TraceEntry[];
  createdAt: string;
  updatedAt: string;
  expiresAt: number;   // epoch seconds, DynamoDB TTL
}

// What the API returns for a session (no TTL bookkeeping)
export interface SessionView {
  sessionId: string;
  authenticated: boolean;
  record: EntityRecord;
  socialLinks: SocialLinks;
  score: number;
  trace: string[];
}
