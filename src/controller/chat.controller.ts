// src/controller/chat.controller.ts

import { IncomingMessage } from 'http';
import { RawData, WebSocket, WebSocketServer } from 'ws';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { REQUESTED_AGENTS } from '../models/agent.model';
import { WorkflowAborted } from '../errors';
import { ServiceConfig } from '../services/base/types';
import { BaseService } from '../services/base/BaseService';
import { ConversationService } from '../services/session/ConversationService';
import { StreamManager } from '../services/stream/StreamManager';
import { toErrorContent, toWireTurn } from '../services/stream/wire';
import { Orchestrator, toAgentResponse } from '../services/workflow/Orchestrator';

export const CHAT_SOCKET_PATH = '/ws/chat';

const sessionIdSchema = z.string().trim().min(1).max(128);

export const queryMessageSchema = z.object({
    type: z.literal('query').optional(),
    query: z.string().trim().min(1, 'query must not be empty').max(8000),
    session_id: sessionIdSchema.nullable().optional().default(null),
    model: z.string().optional().default(''),
    agent: z.enum(REQUESTED_AGENTS).optional().default('auto'),
});

export const historyMessageSchema = z.object({
    type: z.literal('history'),
    session_id: sessionIdSchema,
});

export const clearMessageSchema = z.object({
    type: z.literal('clear'),
    session_id: sessionIdSchema,
});

const messageTypeSchema = z.object({ type: z.string().optional() });

/**
 * Validates a client message against the schema its `type` selects. Messages
 * without a type are queries.
 */
export function parseClientMessage(json: unknown) {
    const kind = messageTypeSchema.safeParse(json);
    const type = kind.success ? kind.data.type : undefined;
    if (type === 'history') return historyMessageSchema.safeParse(json);
    if (type === 'clear') return clearMessageSchema.safeParse(json);
    return queryMessageSchema.safeParse(json);
}

export interface ChatControllerDeps extends ServiceConfig {
    orchestrator: Orchestrator;
    conversations: ConversationService;
    streamManager: StreamManager;
}

/**
 * Realtime channel. One connection may carry many sessions; every in-flight
 * workflow of a connection is aborted when it closes.
 */
export class ChatController extends BaseService {
    private readonly inFlight = new Map<string, Set<AbortController>>();

    constructor(private readonly deps: ChatControllerDeps) {
        super(deps);
    }

    public attach(wss: WebSocketServer): void {
        wss.on('connection', (ws: WebSocket, req: IncomingMessage) => this.onConnection(ws, req));
    }

    public onConnection(ws: WebSocket, req?: IncomingMessage): string {
        const connectionId = uuidv4();
        this.deps.streamManager.addConnection(connectionId, ws);
        this.inFlight.set(connectionId, new Set());
        this.logger.info('Client connected', { connectionId, remoteAddress: req?.socket.remoteAddress });

        this.deps.streamManager.sendChunk(connectionId, {
            type: 'connection_ack',
            content: { connection_id: connectionId, message: 'Connected to the cybersecurity advisory service' },
        });

        ws.on('message', (data: RawData) => {
            this.handleMessage(connectionId, data.toString()).catch((error: unknown) => {
                this.logger.error('Unhandled error in message handler', { connectionId, error: toErrorContent(error).message });
            });
        });

        ws.on('close', () => this.disconnect(connectionId));
        return connectionId;
    }

    public disconnect(connectionId: string): void {
        const controllers = this.inFlight.get(connectionId);
        if (controllers && controllers.size > 0) {
            this.logger.info('Aborting in-flight workflows for closed connection', { connectionId, count: controllers.size });
            controllers.forEach((controller) => controller.abort(new WorkflowAborted('Client disconnected')));
        }
        this.inFlight.delete(connectionId);
        this.deps.streamManager.removeConnection(connectionId);
    }

    public async handleMessage(connectionId: string, raw: string): Promise<void> {
        let json: unknown;
        try {
            json = JSON.parse(raw);
        } catch {
            this.sendError(connectionId, 'INVALID_MESSAGE', 'Message is not valid JSON');
            return;
        }

        const parsed = parseClientMessage(json);
        if (!parsed.success) {
            const detail = parsed.error.issues.map((issue) => `${issue.path.join('.') || 'message'}: ${issue.message}`).join('; ');
            this.sendError(connectionId, 'INVALID_MESSAGE', detail);
            return;
        }

        const message = parsed.data;
        try {
            if (message.type === 'history') {
                const turns = await this.deps.conversations.getHistory(message.session_id);
                this.deps.streamManager.sendChunk(connectionId, {
                    type: 'history',
                    content: { session_id: message.session_id, turns: turns.map(toWireTurn) },
                    isFinal: true,
                });
                return;
            }

            if (message.type === 'clear') {
                await this.deps.conversations.withSession(message.session_id, () => this.deps.conversations.clear(message.session_id));
                this.deps.streamManager.sendChunk(connectionId, {
                    type: 'session_cleared',
                    content: { session_id: message.session_id },
                    isFinal: true,
                });
                return;
            }

            await this.runQuery(connectionId, message);
        } catch (error) {
            if (error instanceof WorkflowAborted) {
                this.logger.info('Workflow aborted', { connectionId });
                return;
            }
            this.logger.error('Failed to handle message', { connectionId, error: toErrorContent(error).message });
            this.deps.streamManager.sendChunk(connectionId, { type: 'error', content: toErrorContent(error), isFinal: true });
        }
    }

    private async runQuery(connectionId: string, message: z.infer<typeof queryMessageSchema>): Promise<void> {
        const controller = new AbortController();
        const controllers = this.inFlight.get(connectionId);
        controllers?.add(controller);
        const messageId = uuidv4();

        try {
            const result = await this.deps.orchestrator.handleQuery({
                query: message.query,
                sessionId: message.session_id,
                model: message.model,
                agent: message.agent,
                signal: controller.signal,
                onStage: (sessionId, stage, text) => {
                    this.deps.streamManager.sendChunk(connectionId, {
                        type: 'workflow_status',
                        messageId,
                        content: { session_id: sessionId, stage, message: text },
                    });
                },
            });
            this.deps.streamManager.sendChunk(connectionId, {
                type: 'agent_response',
                messageId,
                content: toAgentResponse(result),
                isFinal: true,
            });
        } finally {
            controllers?.delete(controller);
        }
    }

    private sendError(connectionId: string, code: string, text: string): void {
        this.deps.streamManager.sendChunk(connectionId, { type: 'error', content: { code, message: text }, isFinal: true });
    }
}
