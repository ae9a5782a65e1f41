// src/services/collaboration/CollaborationCoordinator.ts

import { BaseService } from '../base/BaseService';
import { ServiceConfig } from '../base/types';
import {
    AgentAnswer,
    AgentCandidate,
    AgentId,
    CollaborationMode,
    CollaborationRecord,
    SPECIALIST_AGENT_IDS,
} from '../../models/agent.model';
import { QueryTurn } from '../../models/session.model';
import { WorkflowAborted, errorMessage } from '../../errors';
import { TimeoutError, withTimeout } from '../../utils/async';
import { StateMachine, TransitionListener, TransitionTable } from '../../utils/state-machine';
import { getAgentProfile } from '../agents/agent-registry';
import { AgentRunInput } from '../agents/SpecialistAgent';
import { ModelChoice } from '../llm/models';
import { ModelInvoker } from '../llm/types';
import { RoutingDecision } from '../router.service';

export type CollaborationState = 'single_agent' | 'collaboration_pending' | 'collaboration_active' | 'merged';

export const COLLABORATION_TRANSITIONS: TransitionTable<CollaborationState> = Object.freeze({
    single_agent: ['collaboration_pending', 'merged'],
    collaboration_pending: ['collaboration_active', 'merged'],
    collaboration_active: ['merged'],
    merged: [],
});

/** Anything that can answer as an agent; SpecialistAgent in production. */
export interface AgentRunner {
    readonly agentId: AgentId;
    run(input: AgentRunInput): Promise<AgentAnswer>;
}

export interface CoordinatorOptions extends ServiceConfig {
    agents: ReadonlyMap<AgentId, AgentRunner>;
    /** Synthesizes multi-perspective answers; without it answers are merged as notes. */
    models: ModelInvoker | null;
    /** Collaboration triggers when the primary confidence is strictly below this. */
    threshold: number;
    /** Budget for the whole consultation round. */
    timeoutMs: number;
}

export interface CollaborationInput {
    query: string;
    history: QueryTurn[];
    modelChoice: ModelChoice;
    primary: AgentAnswer;
    routing: RoutingDecision;
    signal?: AbortSignal;
    onTransition?: TransitionListener<CollaborationState>;
}

export interface CollaborationOutcome {
    /** The answer returned to the user; confidence is the merged confidence. */
    answer: AgentAnswer;
    collaboration: CollaborationRecord;
    consulted: AgentAnswer[];
    timedOut: boolean;
    path: readonly CollaborationState[];
}

const NOTE_SEPARATOR = '\n\n---\n\n';

const SYNTHESIS_SYSTEM_PROMPT = `You combine answers from several cybersecurity specialists into one response to the user's question.
Keep the guidance of the first answer as the backbone and work in what the other answers add. Where they disagree, say so and recommend one course.
Do not mention that several specialists were consulted.`;

const formatNote = (answer: AgentAnswer): string =>
    `**Supporting note from ${getAgentProfile(answer.agentId).displayName}** (confidence ${answer.confidenceScore.toFixed(2)}):\n${answer.response}`;

/**
 * Picks the answer that leads the merge: the best consulting answer when it
 * is strictly more confident than the primary, otherwise the primary.
 * Degraded answers never support.
 */
export function orderForMerge(primary: AgentAnswer, consulted: AgentAnswer[]): { lead: AgentAnswer; supporting: AgentAnswer[] } {
    const usable = consulted.filter((answer) => !answer.degraded);
    if (usable.length === 0) {
        return { lead: primary, supporting: [] };
    }

    const best = usable.reduce((top, answer) => (answer.confidenceScore > top.confidenceScore ? answer : top));
    if (best.confidenceScore > primary.confidenceScore) {
        const supporting = [primary, ...usable.filter((answer) => answer !== best)].filter((answer) => !answer.degraded);
        return { lead: best, supporting };
    }
    return { lead: primary, supporting: usable };
}

function combineAnswers(lead: AgentAnswer, supporting: AgentAnswer[], response: string): AgentAnswer {
    return {
        ...lead,
        response,
        retrievedContext: [...lead.retrievedContext, ...supporting.flatMap((answer) => answer.retrievedContext)],
        usedWeb: lead.usedWeb || supporting.some((answer) => answer.usedWeb),
    };
}

/**
 * Merges the primary answer with consulting answers, appending the
 * supporting answers as notes under the lead.
 */
export function mergeAnswers(primary: AgentAnswer, consulted: AgentAnswer[]): { answer: AgentAnswer; promoted: AgentId | null } {
    const { lead, supporting } = orderForMerge(primary, consulted);
    if (supporting.length === 0) {
        return { answer: primary, promoted: null };
    }
    return {
        answer: combineAnswers(lead, supporting, [lead.response, ...supporting.map(formatNote)].join(NOTE_SEPARATOR)),
        promoted: lead === primary ? null : lead.agentId,
    };
}

/** First entry of the trace: how the query was classified. */
export function describeRouting(routing: RoutingDecision): string {
    const [top, ...others] = routing.candidates;
    let line = `Routed to ${top.agentId} (${routing.method}, ${top.routingConfidence.toFixed(2)})`;
    if (routing.method === 'follow_up') {
        line += ', inherited as a follow-up of the previous answer';
    } else if (others.length > 0) {
        line += `; other candidates ${others.map((candidate) => `${candidate.agentId} ${candidate.routingConfidence.toFixed(2)}`).join(', ')}`;
    }
    return `${line}.`;
}

export class CollaborationCoordinator extends BaseService {
    constructor(private readonly options: CoordinatorOptions) {
        super(options);
    }

    public get threshold(): number {
        return this.options.threshold;
    }

    public shouldCollaborate(primary: AgentAnswer): boolean {
        return primary.confidenceScore < this.options.threshold;
    }

    /**
     * Remaining router candidates, or every specialist except the primary
     * when the router named only one agent.
     */
    public consultingAgentsFor(primary: AgentId, candidates: AgentCandidate[]): AgentId[] {
        const fromRouter = candidates.map((candidate) => candidate.agentId).filter((agentId) => agentId !== primary);
        const pool = fromRouter.length > 0 ? fromRouter : SPECIALIST_AGENT_IDS.filter((agentId) => agentId !== primary);
        return pool.filter((agentId) => this.options.agents.has(agentId));
    }

    public async coordinate(input: CollaborationInput): Promise<CollaborationOutcome> {
        const { primary } = input;
        const fsm = new StateMachine(COLLABORATION_TRANSITIONS, 'single_agent', input.onTransition);
        const thoughtProcess: string[] = [
            describeRouting(input.routing),
            `Primary agent ${primary.agentId} answered with confidence ${primary.confidenceScore.toFixed(2)}.`,
        ];

        if (!this.shouldCollaborate(primary)) {
            thoughtProcess.push(`Confidence meets threshold ${this.options.threshold}; no collaboration needed.`);
            fsm.transition('merged');
            return this.outcome(primary, 'single_agent', [], thoughtProcess, [], false, fsm.path, primary.agentId);
        }

        fsm.transition('collaboration_pending');
        const mode = input.routing.collaborationMode;
        thoughtProcess.push(`Confidence below threshold ${this.options.threshold}; starting ${mode}.`);

        const consultingIds = this.consultingAgentsFor(primary.agentId, input.routing.candidates);
        if (consultingIds.length === 0) {
            thoughtProcess.push('No consulting agents available; keeping primary answer.');
            fsm.transition('merged');
            return this.outcome(primary, 'single_agent', [], thoughtProcess, [], false, fsm.path, primary.agentId);
        }

        fsm.transition('collaboration_active');
        thoughtProcess.push(`Consulting ${consultingIds.join(', ')}.`);
        this.logger.info('Collaboration started', { primary: primary.agentId, consulting: consultingIds, mode });

        let consulted: AgentAnswer[] = [];
        let timedOut = false;
        try {
            consulted = await withTimeout(
                (signal) => this.consult(consultingIds, input, signal, thoughtProcess),
                this.options.timeoutMs,
                'collaboration',
                input.signal,
            );
        } catch (error) {
            if (!(error instanceof TimeoutError)) throw error;
            timedOut = true;
            thoughtProcess.push(`Consultation exceeded ${this.options.timeoutMs}ms; keeping primary answer.`);
            this.logger.warn('Collaboration timed out', { primary: primary.agentId, timeoutMs: this.options.timeoutMs });
        }

        const { lead, supporting } = orderForMerge(primary, consulted);
        let { answer } = mergeAnswers(primary, consulted);
        if (supporting.length === 0) {
            if (consulted.length > 0) {
                thoughtProcess.push('No usable consulting answers; keeping primary answer.');
            }
        } else if (lead !== primary) {
            thoughtProcess.push(`${lead.agentId} answered with higher confidence and replaced the primary answer; primary kept as a supporting note.`);
        } else {
            thoughtProcess.push('Primary answer kept; consulting answers appended as supporting notes.');
        }

        if (mode === 'multi_perspective' && supporting.length > 0) {
            answer = (await this.synthesize(input, lead, supporting, thoughtProcess)) ?? answer;
        }

        fsm.transition('merged');
        return this.outcome(answer, mode, consultingIds, thoughtProcess, consulted, timedOut, fsm.path, primary.agentId);
    }

    /**
     * Rewrites the lead and supporting answers as one response. Returns null
     * when no model is configured or the call fails; the notes merge stands.
     */
    private async synthesize(
        input: CollaborationInput,
        lead: AgentAnswer,
        supporting: AgentAnswer[],
        thoughtProcess: string[],
    ): Promise<AgentAnswer | null> {
        const { models } = this.options;
        if (!models) return null;

        const perspectives = [lead, ...supporting]
            .map((answer) => `### ${getAgentProfile(answer.agentId).displayName} (confidence ${answer.confidenceScore.toFixed(2)})\n${answer.response}`)
            .join('\n\n');
        try {
            const completion = await models.complete(
                input.modelChoice,
                [
                    { role: 'system', content: SYNTHESIS_SYSTEM_PROMPT },
                    { role: 'user', content: `Question: ${input.query}\n\n${perspectives}` },
                ],
                { temperature: 0.3, maxTokens: 1500, signal: input.signal },
            );
            const text = completion.text.trim();
            if (!text) {
                thoughtProcess.push('Synthesis returned no text; answers merged as notes.');
                return null;
            }
            thoughtProcess.push(`Synthesized ${supporting.length + 1} perspectives into one answer led by ${lead.agentId}.`);
            return combineAnswers(lead, supporting, text);
        } catch (error) {
            if (error instanceof WorkflowAborted) throw error;
            thoughtProcess.push(`Synthesis failed (${errorMessage(error)}); answers merged as notes.`);
            this.logger.warn('Multi-perspective synthesis failed', { lead: lead.agentId, error: errorMessage(error) });
            return null;
        }
    }

    private async consult(
        agentIds: AgentId[],
        input: CollaborationInput,
        signal: AbortSignal,
        thoughtProcess: string[],
    ): Promise<AgentAnswer[]> {
        const settled = await Promise.allSettled(agentIds.map((agentId) => {
            const agent = this.options.agents.get(agentId);
            if (!agent) {
                return Promise.reject(new Error(`Agent ${agentId} is not registered`));
            }
            return agent.run({ query: input.query, history: input.history, modelChoice: input.modelChoice, signal });
        }));

        const answers: AgentAnswer[] = [];
        settled.forEach((result, index) => {
            if (result.status === 'fulfilled') {
                answers.push(result.value);
                thoughtProcess.push(`${agentIds[index]} answered with confidence ${result.value.confidenceScore.toFixed(2)}.`);
                return;
            }
            if (result.reason instanceof WorkflowAborted) return;
            thoughtProcess.push(`${agentIds[index]} failed: ${errorMessage(result.reason)}.`);
            this.logger.error('Consulting agent failed', { agentId: agentIds[index], error: errorMessage(result.reason) });
        });

        if (signal.aborted) {
            throw signal.reason instanceof Error ? signal.reason : new WorkflowAborted();
        }
        return answers;
    }

    private outcome(
        answer: AgentAnswer,
        mode: CollaborationMode,
        consultingAgents: AgentId[],
        thoughtProcess: string[],
        consulted: AgentAnswer[],
        timedOut: boolean,
        path: readonly CollaborationState[],
        primaryAgent: AgentId,
    ): CollaborationOutcome {
        return {
            answer,
            collaboration: { mode, primaryAgent, consultingAgents, thoughtProcess },
            consulted,
            timedOut,
            path,
        };
    }
}
