// src/services/session/ConversationService.ts

import { v4 as uuidv4 } from 'uuid';
import { BaseService } from '../base/BaseService';
import { ServiceConfig } from '../base/types';
import { QueryTurn, Session, TurnRole } from '../../models/session.model';
import { PersistenceFailure, errorMessage, wrapError } from '../../errors';
import { estimateTokens } from '../retrieval/token-budget';
import { ConversationSummarizer } from './ConversationSummarizer';
import { SessionLock } from './SessionLock';
import { ConversationStore } from './types';

export interface NewTurn {
    /** Supplied by the caller to make retries idempotent; minted otherwise. */
    id?: string;
    role: TurnRole;
    content: string;
    agentId?: string;
}

export interface AppendResult {
    turn: QueryTurn;
    /** False when the turn only lives in memory because the store failed. */
    durable: boolean;
}

export interface ConversationServiceOptions extends ServiceConfig {
    store: ConversationStore;
    summarizer: ConversationSummarizer;
    historyTokenBudget: number;
    keepRecentTurns: number;
    now?: () => Date;
}

interface PendingSession {
    /**
     * Document the pending turns belong after, as last read from the store;
     * null when the store could not be read and its document is unknown.
     */
    base: Session | null;
    /** Turns the store has not accepted yet, in order. */
    turns: QueryTurn[];
}

interface LoadedSession {
    /** Stored turns followed by pending ones; null for an unknown session. */
    session: Session | null;
    /** False when the stored document could not be read. */
    known: boolean;
}

/**
 * Per-session turn log on top of a ConversationStore. Only sessions with
 * turns the store has not accepted are held in memory; those turns are
 * written onto the stored document as soon as the store can be read again.
 * A document that could not be read is never overwritten.
 */
export class ConversationService extends BaseService {
    private readonly lock = new SessionLock();
    private readonly pending = new Map<string, PendingSession>();
    private readonly now: () => Date;

    constructor(private readonly options: ConversationServiceOptions) {
        super(options);
        this.now = options.now ?? (() => new Date());
    }

    public async open(): Promise<void> {
        await this.options.store.open();
        this.logger.info('Conversation store opened', { backend: this.options.store.kind });
    }

    public async close(): Promise<void> {
        await this.options.store.close();
        this.logger.info('Conversation store closed', { backend: this.options.store.kind, pendingSessions: this.pending.size });
    }

    /** Serializes `task` with every other task for the same session. */
    public withSession<T>(sessionId: string, task: () => Promise<T>): Promise<T> {
        return this.lock.run(sessionId, task);
    }

    public async create(): Promise<string> {
        const sessionId = uuidv4();
        const session = this.emptySession(sessionId);
        try {
            await this.options.store.saveSession(session);
        } catch (error) {
            this.pending.set(sessionId, { base: session, turns: [] });
            this.logger.error('Failed to persist new session', { sessionId, error: errorMessage(error) });
        }
        this.logger.info('Session created', { sessionId });
        return sessionId;
    }

    public async exists(sessionId: string): Promise<boolean> {
        return (await this.load(sessionId)).session !== null;
    }

    public async getHistory(sessionId: string): Promise<QueryTurn[]> {
        const { session } = await this.load(sessionId);
        return session ? [...session.turns] : [];
    }

    /**
     * Appends a turn, creating the session when it does not exist yet.
     * Re-appending a turn id returns the stored turn unchanged.
     */
    public async append(sessionId: string, input: NewTurn): Promise<AppendResult> {
        const { session, known } = await this.load(sessionId);
        const current = session ?? this.emptySession(sessionId);

        if (input.id) {
            const existing = current.turns.find((turn) => turn.id === input.id);
            if (existing) {
                return { turn: existing, durable: !this.isPending(sessionId, existing.id) };
            }
        }

        const turn: QueryTurn = {
            id: input.id ?? uuidv4(),
            role: input.role,
            content: input.content,
            timestamp: this.nextTimestamp(current.turns),
        };
        if (input.agentId) turn.agentId = input.agentId;

        if (!known) {
            const pendingTurns = [...(this.pending.get(sessionId)?.turns ?? []), turn];
            this.pending.set(sessionId, { base: null, turns: pendingTurns });
            this.logger.warn('Session store unreadable, keeping turn in memory', { sessionId, pendingTurns: pendingTurns.length });
            return { turn, durable: false };
        }

        const base = this.pending.get(sessionId)?.base ?? current;
        const next: Session = { ...current, turns: [...current.turns, turn], lastActiveAt: turn.timestamp };
        const durable = await this.persist(next, base);
        return { turn, durable };
    }

    /**
     * Replaces the first `count` turns with one summary turn. The summary
     * takes the timestamp of the last turn it replaces. Only a fully durable
     * history is rewritten; returns false when nothing was replaced.
     */
    public async replacePrefix(sessionId: string, count: number, content: string): Promise<boolean> {
        const { session, known } = await this.load(sessionId);
        if (!session || !known || this.pending.has(sessionId)) return false;
        if (count <= 0 || count > session.turns.length) return false;

        const replaced = session.turns.slice(0, count);
        const summaryTurn: QueryTurn = {
            id: uuidv4(),
            role: 'agent',
            content,
            timestamp: replaced[replaced.length - 1].timestamp,
            summary: true,
        };
        try {
            await this.options.store.saveSession({ ...session, turns: [summaryTurn, ...session.turns.slice(count)] });
        } catch (error) {
            this.logger.error('Failed to persist summarized history', { sessionId, error: errorMessage(error) });
            return false;
        }
        return true;
    }

    /**
     * Collapses all but the most recent turns into a summary when the history
     * is over its token budget. Returns true when it summarized.
     */
    public async summarizeIfNeeded(sessionId: string, signal?: AbortSignal): Promise<boolean> {
        const turns = await this.getHistory(sessionId);
        const { historyTokenBudget, keepRecentTurns } = this.options;

        const total = turns.reduce((sum, turn) => sum + estimateTokens(turn.content), 0);
        const prefixLength = turns.length - keepRecentTurns;
        if (total <= historyTokenBudget || prefixLength < 1) return false;
        if (prefixLength === 1 && turns[0].summary) return false;

        const summary = await this.options.summarizer.summarize(turns.slice(0, prefixLength), signal);
        if (!(await this.replacePrefix(sessionId, prefixLength, summary))) return false;
        this.logger.info('History summarized', { sessionId, collapsedTurns: prefixLength, tokensBefore: total });
        return true;
    }

    public async clear(sessionId: string): Promise<void> {
        this.pending.delete(sessionId);
        try {
            await this.options.store.deleteSession(sessionId);
        } catch (error) {
            throw wrapError(error, PersistenceFailure);
        }
        this.logger.info('Session cleared', { sessionId });
    }

    /** Turns of `sessionId` that have not reached the store yet. */
    public pendingTurns(sessionId: string): QueryTurn[] {
        return [...(this.pending.get(sessionId)?.turns ?? [])];
    }

    /** Sessions held in memory because the store has not accepted all of their turns. */
    public pendingSessionCount(): number {
        return this.pending.size;
    }

    private async load(sessionId: string): Promise<LoadedSession> {
        const pending = this.pending.get(sessionId);
        let stored: Session | null;
        try {
            stored = await this.options.store.loadSession(sessionId);
        } catch (error) {
            this.logger.error('Failed to load session', { sessionId, pendingTurns: pending?.turns.length ?? 0, error: errorMessage(error) });
            if (!pending) return { session: null, known: false };
            if (!pending.base) return { session: this.detachedSession(sessionId, pending.turns), known: false };
            return { session: { ...pending.base, turns: [...pending.base.turns, ...pending.turns] }, known: true };
        }

        if (!pending) return { session: stored, known: true };

        // The store is readable again: write the turns it missed onto what it holds.
        const base = stored ?? pending.base ?? this.emptySession(sessionId);
        const merged = this.appendPending(base, pending.turns);
        await this.persist(merged, base);
        return { session: merged, known: true };
    }

    /**
     * Saves `next`, whose turns extend those of `base`. When the store refuses
     * it, the extra turns stay pending on top of `base`.
     */
    private async persist(next: Session, base: Session): Promise<boolean> {
        const { sessionId } = next;
        try {
            await this.options.store.saveSession(next);
        } catch (error) {
            const failure = wrapError(error, PersistenceFailure);
            const turns = next.turns.slice(base.turns.length);
            this.pending.set(sessionId, { base, turns });
            this.logger.error('Failed to persist session, keeping turns in memory', {
                sessionId,
                pendingTurns: turns.length,
                error: failure.message,
            });
            return false;
        }

        const flushed = this.pending.get(sessionId)?.turns.length ?? 0;
        if (this.pending.delete(sessionId) && flushed > 0) {
            this.logger.info('Flushed in-memory turns to store', { sessionId, flushed });
        }
        return true;
    }

    /** Appends turns missing from `base`, keeping timestamps non-decreasing. */
    private appendPending(base: Session, turns: QueryTurn[]): Session {
        const known = new Set(base.turns.map((turn) => turn.id));
        const merged = [...base.turns];
        for (const turn of turns) {
            if (known.has(turn.id)) continue;
            merged.push({ ...turn, timestamp: this.notBefore(merged, Date.parse(turn.timestamp)) });
        }
        const last = merged[merged.length - 1];
        return { ...base, turns: merged, lastActiveAt: last ? last.timestamp : base.lastActiveAt };
    }

    private isPending(sessionId: string, turnId: string): boolean {
        return (this.pending.get(sessionId)?.turns ?? []).some((turn) => turn.id === turnId);
    }

    /** Now, or one millisecond after the last turn when the clock has not moved past it. */
    private nextTimestamp(turns: QueryTurn[]): string {
        return this.notBefore(turns, this.now().getTime());
    }

    private notBefore(turns: QueryTurn[], time: number): string {
        if (turns.length === 0) return new Date(time).toISOString();
        const last = Date.parse(turns[turns.length - 1].timestamp);
        return new Date(time > last ? time : last + 1).toISOString();
    }

    private detachedSession(sessionId: string, turns: QueryTurn[]): Session {
        const createdAt = turns.length > 0 ? turns[0].timestamp : this.now().toISOString();
        const lastActiveAt = turns.length > 0 ? turns[turns.length - 1].timestamp : createdAt;
        return { sessionId, turns: [...turns], createdAt, lastActiveAt };
    }

    private emptySession(sessionId: string): Session {
        const timestamp = this.now().toISOString();
        return { sessionId, turns: [], createdAt: timestamp, lastActiveAt: timestamp };
    }
}
