// src/app.ts

import express from 'express';
import cors from 'cors';
import { createSessionsRouter } from './routes/sessions';
import { ConversationService } from './services/session/ConversationService';

export function createApp(conversations: ConversationService): express.Express {
    const app = express();

    app.use(cors());
    app.use(express.json({ limit: '1mb' }));

    app.use('/api/sessions', createSessionsRouter(conversations));

    app.get('/health', (_req, res) => {
        res.json({ status: 'ok', timestamp: new Date().toISOString() });
    });

    return app;
}
