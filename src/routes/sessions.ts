// src/routes/sessions.ts

import express, { Request, Response } from 'express';
import { ConversationService } from '../services/session/ConversationService';
import { toErrorContent, toWireTurn } from '../services/stream/wire';

export function createSessionsRouter(conversations: ConversationService): express.Router {
    const router = express.Router();

    router.post('/', async (_req: Request, res: Response) => {
        try {
            const sessionId = await conversations.create();
            res.status(201).json({ session_id: sessionId });
        } catch (error) {
            res.status(500).json({ error: toErrorContent(error) });
        }
    });

    router.get('/:sessionId/history', async (req: Request, res: Response) => {
        try {
            const { sessionId } = req.params;
            if (!(await conversations.exists(sessionId))) {
                res.status(404).json({ error: { code: 'SESSION_NOT_FOUND', message: 'Session not found' } });
                return;
            }
            const turns = await conversations.getHistory(sessionId);
            res.json({ session_id: sessionId, turns: turns.map(toWireTurn) });
        } catch (error) {
            res.status(500).json({ error: toErrorContent(error) });
        }
    });

    router.delete('/:sessionId', async (req: Request, res: Response) => {
        try {
            const { sessionId } = req.params;
            await conversations.withSession(sessionId, () => conversations.clear(sessionId));
            res.json({ session_id: sessionId, cleared: true });
        } catch (error) {
            res.status(500).json({ error: toErrorContent(error) });
        }
    });

    return router;
}
