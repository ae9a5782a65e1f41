// src/models/session.model.ts

import { z } from 'zod';

export type TurnRole = 'user' | 'agent';

export interface QueryTurn {
    id: string;
    role: TurnRole;
    content: string;
    /** ISO-8601, non-decreasing within a session. */
    timestamp: string;
    agentId?: string;
    summary?: boolean;
}

export interface Session {
    sessionId: string;
    turns: QueryTurn[];
    createdAt: string;
    lastActiveAt: string;
}

export const queryTurnSchema = z.object({
    id: z.string(),
    role: z.enum(['user', 'agent']),
    content: z.string(),
    timestamp: z.string(),
    agentId: z.string().optional(),
    summary: z.boolean().optional(),
});

export const sessionSchema = z.object({
    sessionId: z.string(),
    turns: z.array(queryTurnSchema),
    createdAt: z.string(),
    lastActiveAt: z.string(),
});
