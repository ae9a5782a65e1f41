// src/services/session/types.ts

import { Session } from '../../models/session.model';

/**
 * Durable backend for whole session documents. Writes for one session are
 * serialized by the caller, so a backend only needs last-write-wins.
 */
export interface ConversationStore {
  readonly kind: string;
  open(): Promise<void>;
  close(): Promise<void>;
  loadSession(sessionId: string): Promise<Session | null>;
  saveSession(session: Session): Promise<void>;
  deleteSession(sessionId: string): Promise<void>;
}
