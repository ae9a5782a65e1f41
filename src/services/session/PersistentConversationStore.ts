// src/services/session/PersistentConversationStore.ts

import * as storage from 'node-persist';
import { Session, sessionSchema } from '../../models/session.model';
import { PersistenceFailure, wrapError } from '../../errors';
import { ConversationStore } from './types';

/**
 * File-backed session documents under `dir`, one file per session.
 */
export class PersistentConversationStore implements ConversationStore {
  public readonly kind = 'file';
  private storage: storage.LocalStorage;

  constructor(private readonly dir: string) {
    this.storage = storage.create({
      dir,
      ttl: false,
    });
  }

  public async open(): Promise<void> {
    try {
      await this.storage.init();
    } catch (error) {
      throw wrapError(error, PersistenceFailure);
    }
  }

  public async close(): Promise<void> {
    // node-persist writes through on every setItem; nothing to flush.
  }

  public async loadSession(sessionId: string): Promise<Session | null> {
    let raw: unknown;
    try {
      raw = await this.storage.getItem(sessionId);
    } catch (error) {
      throw wrapError(error, PersistenceFailure);
    }
    if (raw === undefined || raw === null) return null;

    const parsed = sessionSchema.safeParse(raw);
    if (!parsed.success) {
      throw new PersistenceFailure(`Stored session ${sessionId} is malformed`, { dir: this.dir, issues: parsed.error.issues });
    }
    return parsed.data;
  }

  public async saveSession(session: Session): Promise<void> {
    try {
      await this.storage.setItem(session.sessionId, session);
    } catch (error) {
      throw wrapError(error, PersistenceFailure);
    }
  }

  public async deleteSession(sessionId: string): Promise<void> {
    try {
      await this.storage.removeItem(sessionId);
    } catch (error) {
      throw wrapError(error, PersistenceFailure);
    }
  }
}
