// src/services/session/RedisConversationStore.ts

import Redis from 'ioredis';
import { Session, sessionSchema } from '../../models/session.model';
import { PersistenceFailure, wrapError } from '../../errors';
import { ConversationStore } from './types';

/**
 * Session documents as JSON strings under `conversation:<sessionId>`.
 */
export class RedisConversationStore implements ConversationStore {
  public readonly kind = 'redis';
  private readonly KEY_PREFIX = 'conversation:';

  constructor(private redis: Redis) {}

  public static fromUrl(url: string): RedisConversationStore {
    return new RedisConversationStore(new Redis(url, { lazyConnect: true, maxRetriesPerRequest: 2 }));
  }

  public async open(): Promise<void> {
    if (this.redis.status === 'ready' || this.redis.status === 'connecting') return;
    try {
      await this.redis.connect();
    } catch (error) {
      throw wrapError(error, PersistenceFailure);
    }
  }

  public async close(): Promise<void> {
    await this.redis.quit();
  }

  public async loadSession(sessionId: string): Promise<Session | null> {
    let raw: string | null;
    try {
      raw = await this.redis.get(this.key(sessionId));
    } catch (error) {
      throw wrapError(error, PersistenceFailure);
    }
    if (raw === null) return null;

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      throw new PersistenceFailure(`Stored session ${sessionId} is not valid JSON`);
    }
    const parsed = sessionSchema.safeParse(json);
    if (!parsed.success) {
      throw new PersistenceFailure(`Stored session ${sessionId} is malformed`, { issues: parsed.error.issues });
    }
    return parsed.data;
  }

  public async saveSession(session: Session): Promise<void> {
    try {
      await this.redis.set(this.key(session.sessionId), JSON.stringify(session));
    } catch (error) {
      throw wrapError(error, PersistenceFailure);
    }
  }

  public async deleteSession(sessionId: string): Promise<void> {
    try {
      await this.redis.del(this.key(sessionId));
    } catch (error) {
      throw wrapError(error, PersistenceFailure);
    }
  }

  private key(sessionId: string): string {
    return `${this.KEY_PREFIX}${sessionId}`;
  }
}
