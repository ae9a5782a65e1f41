// src/services/workflow/Orchestrator.ts

import { v4 as uuidv4 } from 'uuid';
import { BaseService } from '../base/BaseService';
import { ServiceConfig } from '../base/types';
import { AgentAnswer, AgentId, AgentState, RequestedAgent } from '../../models/agent.model';
import { errorMessage } from '../../errors';
import { throwIfAborted } from '../../utils/async';
import { StateMachine } from '../../utils/state-machine';
import { AgentRunner, CollaborationCoordinator } from '../collaboration/CollaborationCoordinator';
import { ModelChoice } from '../llm/models';
import { RouterService, RoutingDecision } from '../router.service';
import { ConversationService } from '../session/ConversationService';
import { AgentResponseContent } from '../stream/types';
import { STAGE_MESSAGES, WORKFLOW_TRANSITIONS, WorkflowStage } from './stages';

export type StageListener = (sessionId: string, stage: WorkflowStage, message: string) => void;

export interface QueryRequest {
    query: string;
    /** Null starts a new session. */
    sessionId: string | null;
    model: string;
    agent: RequestedAgent;
    signal?: AbortSignal;
    onStage?: StageListener;
}

export interface WorkflowResult {
    sessionId: string;
    state: AgentState;
    primary: AgentAnswer;
    answer: AgentAnswer;
    routing: RoutingDecision;
    durable: boolean;
    path: readonly WorkflowStage[];
}

export interface OrchestratorOptions extends ServiceConfig {
    router: RouterService;
    agents: ReadonlyMap<AgentId, AgentRunner>;
    coordinator: CollaborationCoordinator;
    conversations: ConversationService;
    defaultModel: ModelChoice;
    isModelChoice: (value: string) => value is ModelChoice;
}

/**
 * Runs one query through routing, the primary agent, optional collaboration
 * and persistence. Queries for the same session run strictly in arrival order.
 */
export class Orchestrator extends BaseService {
    constructor(private readonly options: OrchestratorOptions) {
        super(options);
    }

    public async handleQuery(request: QueryRequest): Promise<WorkflowResult> {
        const sessionId = request.sessionId ?? uuidv4();
        return this.options.conversations.withSession(sessionId, () => this.run(sessionId, request));
    }

    private async run(sessionId: string, request: QueryRequest): Promise<WorkflowResult> {
        const { signal } = request;
        const fsm = new StateMachine(WORKFLOW_TRANSITIONS, 'idle', (_from, to) => {
            request.onStage?.(sessionId, to, STAGE_MESSAGES[to]);
        });
        throwIfAborted(signal);

        const history = await this.options.conversations.getHistory(sessionId);
        const modelChoice = this.resolveModel(request.model);

        const routing = await this.options.router.route({
            query: request.query,
            history,
            requestedAgent: request.agent,
            signal,
        });
        fsm.transition('routed');

        const primaryId = routing.candidates[0].agentId;
        const primaryAgent = this.options.agents.get(primaryId);
        if (!primaryAgent) {
            throw new Error(`No agent registered for ${primaryId}`);
        }

        const primary = await primaryAgent.run({ query: request.query, history, modelChoice, signal });
        fsm.transition('primary_answered');

        const outcome = await this.options.coordinator.coordinate({
            query: request.query,
            history,
            modelChoice,
            primary,
            routing,
            signal,
            onTransition: (_from, to) => {
                if (to === 'collaboration_pending' || to === 'collaboration_active') {
                    fsm.transition(to);
                }
            },
        });
        fsm.transition('merged');

        // Nothing is written once the client has gone away.
        throwIfAborted(signal);

        const userTurn = await this.options.conversations.append(sessionId, { role: 'user', content: request.query });
        const agentTurn = await this.options.conversations.append(sessionId, {
            role: 'agent',
            content: outcome.answer.response,
            agentId: outcome.answer.agentId,
        });
        const durable = userTurn.durable && agentTurn.durable;

        try {
            await this.options.conversations.summarizeIfNeeded(sessionId);
        } catch (error) {
            this.logger.warn('History summarization failed', { sessionId, error: errorMessage(error) });
        }
        fsm.transition('persisted');

        const state: AgentState = {
            query: request.query,
            sessionId,
            history,
            modelChoice,
            candidateAgents: routing.candidates,
            retrievedContext: outcome.answer.retrievedContext,
            response: outcome.answer.response,
            confidenceScore: outcome.answer.confidenceScore,
            collaboration: outcome.collaboration,
        };

        this.logger.info('Workflow complete', {
            sessionId,
            primaryAgent: primary.agentId,
            answeredBy: outcome.answer.agentId,
            mode: outcome.collaboration.mode,
            confidence: primary.confidenceScore,
            mergedConfidence: outcome.answer.confidenceScore,
            durable,
        });

        return { sessionId, state, primary, answer: outcome.answer, routing, durable, path: fsm.path };
    }

    private resolveModel(requested: string): ModelChoice {
        if (this.options.isModelChoice(requested)) return requested;
        this.logger.warn('Unknown model requested, using default', { requested, defaultModel: this.options.defaultModel });
        return this.options.defaultModel;
    }
}

/**
 * Maps a workflow result to the `agent_response` wire content.
 */
export function toAgentResponse(result: WorkflowResult): AgentResponseContent {
    const { collaboration } = result.state;
    return {
        session_id: result.sessionId,
        response: result.answer.response,
        agent_type: result.answer.agentId,
        confidence_score: result.primary.confidenceScore,
        merged_confidence: result.answer.confidenceScore,
        model_used: result.state.modelChoice,
        was_collaboration: collaboration.mode !== 'single_agent',
        collaboration_mode: collaboration.mode,
        primary_agent: collaboration.primaryAgent,
        consulting_agents: collaboration.consultingAgents,
        thought_process: collaboration.thoughtProcess,
        degraded: result.answer.degraded,
        durable: result.durable,
    };
}
