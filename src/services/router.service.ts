// src/services/router.service.ts

import { z } from 'zod';
import { BaseService } from './base/BaseService';
import { ServiceConfig } from './base/types';
import {
    AgentCandidate,
    AgentId,
    CollaborationMode,
    RequestedAgent,
    SPECIALIST_AGENT_IDS,
    SpecialistAgentId,
} from '../models/agent.model';
import { QueryTurn } from '../models/session.model';
import { ClassificationFailure, WorkflowAborted, errorMessage, wrapError } from '../errors';
import { AGENT_PRIORITY, isAgentId } from './agents/agent-registry';
import { ModelChoice } from './llm/models';
import { ModelInvoker } from './llm/types';
import { matchesStem, matchesWord, wordCount } from '../utils/text';
import routingIndicators from './routing/routing-indicators.json';

export type RoutingMethod = 'override' | 'model' | 'keyword' | 'follow_up';

export interface RouteRequest {
    query: string;
    history: QueryTurn[];
    requestedAgent: RequestedAgent;
    signal?: AbortSignal;
}

export interface RoutingDecision {
    /** Never empty; ordered by descending routing confidence. */
    candidates: AgentCandidate[];
    method: RoutingMethod;
    followUp: boolean;
    /** Mode used if the coordinator decides to collaborate. */
    collaborationMode: Exclude<CollaborationMode, 'single_agent'>;
}

export interface RouterOptions extends ServiceConfig {
    models: ModelInvoker;
    routerModel: ModelChoice;
    /** Below this the generalist answers. */
    floor: number;
    /** Keyword score another agent needs to pull a follow-up away from the current agent. */
    shiftThreshold: number;
}

type AgentScores = Record<SpecialistAgentId, number>;

const FOLLOW_UP_PHRASES = ['what about', 'tell me more', 'how about', 'and', 'it', 'that', 'this'];
const FOLLOW_UP_MAX_WORDS = 7;

const INDICATORS: Readonly<Record<SpecialistAgentId, readonly string[]>> = Object.freeze({
    incident_response: Object.freeze([...routingIndicators.incident_response]),
    threat_intelligence: Object.freeze([...routingIndicators.threat_intelligence]),
    prevention: Object.freeze([...routingIndicators.prevention]),
});

const classificationSchema = z.object({
    scores: z.object({
        incident_response: z.number().min(0).max(1),
        threat_intelligence: z.number().min(0).max(1),
        prevention: z.number().min(0).max(1),
    }),
    follow_up: z.boolean().optional().default(false),
});

const ROUTER_SYSTEM_PROMPT = `You are a cybersecurity routing agent. Score how well each specialist fits the user's query:
- incident_response: active incidents, breaches, containment, eradication, recovery, forensics
- threat_intelligence: threat actors, campaigns, IOCs, TTPs, vulnerabilities, malware analysis
- prevention: frameworks, policies, controls, hardening, architecture, awareness

Also decide whether the query is a direct follow-up of the conversation so far.

Respond ONLY with JSON:
{"scores": {"incident_response": 0.0, "threat_intelligence": 0.0, "prevention": 0.0}, "follow_up": false}
Each score is between 0 and 1.`;

/**
 * Keyword classifier: the share of all indicator matches that belong to each agent.
 */
export function keywordScores(query: string): AgentScores {
    const matches: AgentScores = { incident_response: 0, threat_intelligence: 0, prevention: 0 };
    for (const agentId of SPECIALIST_AGENT_IDS) {
        matches[agentId] = INDICATORS[agentId].filter((indicator) => matchesStem(query, indicator)).length;
    }
    const total = matches.incident_response + matches.threat_intelligence + matches.prevention;
    if (total === 0) return matches;
    return {
        incident_response: matches.incident_response / total,
        threat_intelligence: matches.threat_intelligence / total,
        prevention: matches.prevention / total,
    };
}

/** Number of domains the query carries at least one indicator for. */
export function mentionedDomains(query: string): number {
    return SPECIALIST_AGENT_IDS.filter((agentId) => INDICATORS[agentId].some((indicator) => matchesStem(query, indicator))).length;
}

export function looksLikeFollowUp(query: string, history: QueryTurn[]): boolean {
    if (history.length === 0) return false;
    if (wordCount(query) >= FOLLOW_UP_MAX_WORDS) return false;
    return FOLLOW_UP_PHRASES.some((phrase) => matchesWord(query, phrase));
}

/**
 * Orders scored agents by descending confidence, breaking ties by priority.
 * Agents scoring zero are left out unless nothing scored.
 */
export function rankCandidates(scores: AgentScores): AgentCandidate[] {
    const ranked = AGENT_PRIORITY
        .map((agentId, priority) => ({ agentId, priority, routingConfidence: scores[agentId] }))
        .sort((a, b) => b.routingConfidence - a.routingConfidence || a.priority - b.priority)
        .map(({ agentId, routingConfidence }): AgentCandidate => ({ agentId, routingConfidence }));
    const positive = ranked.filter((candidate) => candidate.routingConfidence > 0);
    return positive.length > 0 ? positive : ranked.slice(0, 1);
}

function lastAgentOf(history: QueryTurn[]): AgentId | null {
    for (let i = history.length - 1; i >= 0; i--) {
        const turn = history[i];
        if (turn.role === 'agent' && turn.agentId && isAgentId(turn.agentId)) {
            return turn.agentId;
        }
    }
    return null;
}

export class RouterService extends BaseService {
    constructor(private readonly options: RouterOptions) {
        super(options);
    }

    public async route(request: RouteRequest): Promise<RoutingDecision> {
        const collaborationMode = mentionedDomains(request.query) > 1 ? 'multi_perspective' : 'consultation';

        if (request.requestedAgent !== 'auto') {
            this.logger.info('Agent requested explicitly', { agentId: request.requestedAgent });
            return {
                candidates: [{ agentId: request.requestedAgent, routingConfidence: 1.0 }],
                method: 'override',
                followUp: false,
                collaborationMode,
            };
        }

        const keyword = keywordScores(request.query);
        let scores = keyword;
        let method: RoutingMethod = 'keyword';
        let modelFlaggedFollowUp = false;

        try {
            const classified = await this.classify(request);
            scores = classified.scores;
            modelFlaggedFollowUp = classified.follow_up;
            method = 'model';
        } catch (error) {
            if (error instanceof WorkflowAborted) throw error;
            this.logger.warn('Model classification failed, using keyword classifier', { error: errorMessage(error) });
        }

        const followUp = request.history.length > 0
            && (looksLikeFollowUp(request.query, request.history) || modelFlaggedFollowUp);

        if (followUp) {
            const previous = lastAgentOf(request.history);
            const shift = SPECIALIST_AGENT_IDS.find((agentId) => agentId !== previous && keyword[agentId] >= this.options.shiftThreshold);
            if (previous && !shift) {
                this.logger.info('Follow-up inherits previous agent', { agentId: previous });
                return {
                    candidates: [{ agentId: previous, routingConfidence: 1.0 }],
                    method: 'follow_up',
                    followUp: true,
                    collaborationMode,
                };
            }
            if (shift) {
                this.logger.info('Follow-up shifts domain', { from: previous, to: shift });
            }
        }

        const candidates = rankCandidates(scores);
        const top = candidates[0];
        if (top.routingConfidence < this.options.floor) {
            this.logger.info('No specialist above routing floor, using generalist', { topConfidence: top.routingConfidence });
            return {
                candidates: [{ agentId: 'general', routingConfidence: top.routingConfidence }],
                method,
                followUp,
                collaborationMode,
            };
        }

        this.logger.info('Query routed', { method, candidates });
        return { candidates, method, followUp, collaborationMode };
    }

    private async classify(request: RouteRequest): Promise<z.infer<typeof classificationSchema>> {
        const recent = request.history
            .slice(-4)
            .map((turn) => `${turn.role}: ${turn.content}`)
            .join('\n');
        const userContent = recent
            ? `Conversation so far:\n${recent}\n\nNew query: ${request.query}`
            : `New query: ${request.query}`;

        let text: string;
        try {
            const completion = await this.options.models.complete(
                this.options.routerModel,
                [
                    { role: 'system', content: ROUTER_SYSTEM_PROMPT },
                    { role: 'user', content: userContent },
                ],
                { json: true, temperature: 0, maxTokens: 200, signal: request.signal },
            );
            text = completion.text;
        } catch (error) {
            if (error instanceof WorkflowAborted) throw error;
            throw wrapError(error, ClassificationFailure);
        }

        let raw: unknown;
        try {
            raw = JSON.parse(text);
        } catch {
            throw new ClassificationFailure('Router model returned invalid JSON', { text });
        }

        const parsed = classificationSchema.safeParse(raw);
        if (!parsed.success) {
            throw new ClassificationFailure('Router model returned an unexpected shape', { issues: parsed.error.issues });
        }
        return parsed.data;
    }
}
