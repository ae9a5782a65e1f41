#!/usr/bin/env node

import WebSocket from 'ws';
import readline from 'readline';
import { z } from 'zod';
import { CLI_HELP, parseCliInput } from './cli-commands';
import { RequestedAgent } from './models/agent.model';
import { ModelChoice } from './services/llm/models';

// --- Configuration ---
const defaultUrl = 'ws://localhost:8080/ws/chat';
const wsUrl = process.argv[2] || process.env.ADVISOR_WS_URL || defaultUrl;

if (!wsUrl.startsWith('ws://') && !wsUrl.startsWith('wss://')) {
    console.error(`Error: Invalid WebSocket URL provided: "${wsUrl}"`);
    console.error('Please provide the full URL including ws:// or wss:// as the first argument.');
    process.exit(1);
}

// --- Session state ---
let sessionId: string | null = null;
let agent: RequestedAgent = 'auto';
let model: ModelChoice = 'openai_mini';

const envelopeSchema = z.object({
    type: z.string(),
    content: z.unknown(),
});

const agentResponseSchema = z.object({
    session_id: z.string(),
    response: z.string(),
    agent_type: z.string(),
    confidence_score: z.number(),
    merged_confidence: z.number(),
    model_used: z.string(),
    was_collaboration: z.boolean(),
    collaboration_mode: z.string(),
    consulting_agents: z.array(z.string()),
    thought_process: z.array(z.string()),
    degraded: z.boolean(),
    durable: z.boolean(),
});

const historySchema = z.object({
    session_id: z.string(),
    turns: z.array(z.object({ role: z.string(), content: z.string(), timestamp: z.string(), agent_type: z.string().optional() })),
});

const statusSchema = z.object({ stage: z.string(), message: z.string() });
const errorSchema = z.object({ code: z.string(), message: z.string(), hint: z.string().optional() });

console.log(`Connecting to : ${wsUrl}`);
console.log('------------------------------------------');
console.log('Type your question and press Enter.');
console.log(CLI_HELP);
console.log('------------------------------------------');

const ws = new WebSocket(wsUrl);

const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: 'YOU> ',
});

function send(payload: Record<string, unknown>): void {
    if (ws.readyState !== WebSocket.OPEN) {
        console.log('[Info] WebSocket not open. Message not sent.');
        rl.prompt();
        return;
    }
    ws.send(JSON.stringify(payload));
}

function printResponse(content: unknown): void {
    const parsed = agentResponseSchema.safeParse(content);
    if (!parsed.success) {
        console.log(JSON.stringify(content, null, 2));
        return;
    }
    const answer = parsed.data;
    sessionId = answer.session_id;
    console.log(`\n--- ${answer.agent_type} (confidence ${answer.confidence_score.toFixed(2)}, model ${answer.model_used}) ---`);
    console.log(answer.response);
    if (answer.was_collaboration) {
        console.log(`\n[Collaboration: ${answer.collaboration_mode} with ${answer.consulting_agents.join(', ')}; merged confidence ${answer.merged_confidence.toFixed(2)}]`);
    }
    if (answer.degraded) console.log('[Degraded answer: the model did not respond]');
    if (!answer.durable) console.log('[Warning: this turn was not saved]');
    console.log('--------------------------');
}

ws.on('open', () => {
    console.log('\n[WebSocket opened]');
    rl.prompt();
});

ws.on('message', (data) => {
    let json: unknown;
    try {
        json = JSON.parse(data.toString());
    } catch {
        console.log(data.toString());
        rl.prompt();
        return;
    }

    const envelope = envelopeSchema.safeParse(json);
    if (!envelope.success) {
        console.log(data.toString());
        rl.prompt();
        return;
    }

    const { type, content } = envelope.data;
    switch (type) {
        case 'connection_ack':
            return;
        case 'workflow_status': {
            const status = statusSchema.safeParse(content);
            if (status.success) console.log(`  ... ${status.data.message}`);
            return;
        }
        case 'agent_response':
            printResponse(content);
            break;
        case 'history': {
            const history = historySchema.safeParse(content);
            if (history.success) {
                if (history.data.turns.length === 0) console.log('[No history for this session]');
                history.data.turns.forEach((turn) => {
                    const who = turn.role === 'user' ? 'YOU' : (turn.agent_type ?? 'ADVISOR').toUpperCase();
                    console.log(`[${turn.timestamp}] ${who}> ${turn.content}`);
                });
            }
            break;
        }
        case 'session_cleared':
            console.log('[Session cleared]');
            sessionId = null;
            break;
        case 'error': {
            const error = errorSchema.safeParse(content);
            console.error(error.success ? `[Error] ${error.data.message}${error.data.hint ? ` (${error.data.hint})` : ''}` : '[Error]');
            break;
        }
        default:
            console.log(JSON.stringify(json, null, 2));
    }
    rl.prompt();
});

ws.on('close', (code, reason) => {
    console.log(`\n[WebSocket closed] Code: ${code}, Reason: ${reason.toString() || 'N/A'}`);
    rl.close();
    process.exit(0);
});

ws.on('error', (error) => {
    console.error(`\n[WebSocket error] Message: ${error.message}`);
    rl.close();
    process.exit(1);
});

rl.on('line', (line) => {
    const command = parseCliInput(line);
    switch (command.kind) {
        case 'empty':
            rl.prompt();
            return;
        case 'exit':
            console.log('Exiting...');
            ws.close();
            rl.close();
            return;
        case 'new':
            sessionId = null;
            console.log('[New session will start with your next question]');
            rl.prompt();
            return;
        case 'agent':
            agent = command.agent;
            console.log(`[Agent set to ${agent}]`);
            rl.prompt();
            return;
        case 'model':
            model = command.model;
            console.log(`[Model set to ${model}]`);
            rl.prompt();
            return;
        case 'invalid':
            console.log(command.message);
            rl.prompt();
            return;
        case 'history':
        case 'clear':
            if (!sessionId) {
                console.log('[No active session yet]');
                rl.prompt();
                return;
            }
            send({ type: command.kind, session_id: sessionId });
            return;
        case 'query':
            send({ type: 'query', query: command.text, session_id: sessionId, model, agent });
            return;
    }
});

rl.on('close', () => {
    if (ws.readyState === WebSocket.OPEN || ws.readyState === WebSocket.CONNECTING) {
        ws.close();
    }
});
