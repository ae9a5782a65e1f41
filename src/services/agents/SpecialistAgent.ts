// src/services/agents/SpecialistAgent.ts

import { BaseService } from '../base/BaseService';
import { ServiceConfig } from '../base/types';
import { AgentAnswer, AgentId, AgentProfile, KnowledgePartition, RetrievalResult } from '../../models/agent.model';
import { QueryTurn } from '../../models/session.model';
import { ModelFailure, WorkflowAborted, errorMessage } from '../../errors';
import { ConfidenceScorer } from '../confidence/ConfidenceScorer';
import { SELF_RATING_INSTRUCTION, parseSelfRating } from '../confidence/self-rating';
import { ModelChoice } from '../llm/models';
import { ChatMessage, ModelInvoker } from '../llm/types';
import { Retriever } from '../retrieval/types';
import { matchesWord } from '../../utils/text';
import { recentHistory, toChatMessages } from './history-window';
import { NO_CONTEXT_PLACEHOLDER } from './prompts/specialistPrompts';

export const MODEL_FALLBACK_MESSAGE =
    'I was unable to generate a complete answer right now because the language model did not respond. ' +
    'Please try again in a moment.';

export interface SpecialistAgentDeps extends ServiceConfig {
    retriever: Retriever;
    models: ModelInvoker;
    scorer: ConfidenceScorer;
    /** Token budget for the conversation history included in the prompt. */
    historyTokenBudget: number;
}

export interface AgentRunInput {
    query: string;
    history: QueryTurn[];
    modelChoice: ModelChoice;
    signal?: AbortSignal;
}

function formatContext(results: RetrievalResult[]): string {
    if (results.length === 0) return NO_CONTEXT_PLACEHOLDER;
    return results
        .map((result, index) => `[${index + 1}] (${result.source}: ${result.provenance})\n${result.content}`)
        .join('\n\n');
}

/**
 * One executable agent, parameterized by an AgentProfile. The specialist
 * variants differ only in their profile.
 */
export class SpecialistAgent extends BaseService {
    constructor(
        public readonly profile: Readonly<AgentProfile>,
        private readonly deps: SpecialistAgentDeps,
    ) {
        super(deps);
    }

    public get agentId(): AgentId {
        return this.profile.agentId;
    }

    /** The agent's own partitions unioned with the shared partition. */
    public get partitions(): KnowledgePartition[] {
        return Array.from(new Set<KnowledgePartition>([...this.profile.knowledgeFilter.partitions, 'shared']));
    }

    public needsWebSearch(query: string): boolean {
        return this.profile.webSearchKeywords.some((keyword) => matchesWord(query, keyword));
    }

    public buildMessages(query: string, history: QueryTurn[], results: RetrievalResult[]): ChatMessage[] {
        const systemPrompt = this.profile.systemPromptTemplate.replace('{{RETRIEVED_CONTEXT}}', formatContext(results));
        return [
            { role: 'system', content: `${systemPrompt}\n\n${SELF_RATING_INSTRUCTION}` },
            ...toChatMessages(recentHistory(history, this.deps.historyTokenBudget)),
            { role: 'user', content: query },
        ];
    }

    public async run(input: AgentRunInput): Promise<AgentAnswer> {
        const wantsWeb = this.needsWebSearch(input.query);
        const outcome = await this.deps.retriever.retrieve({
            query: input.query,
            partitions: this.partitions,
            wantsWeb,
            webQuery: `${this.profile.webQueryPrefix} ${input.query}`,
            signal: input.signal,
        });

        if (outcome.results.length === 0) {
            this.logger.info('No retrieval results, answering model-only', { agentId: this.agentId });
        }

        const messages = this.buildMessages(input.query, input.history, outcome.results);

        try {
            const completion = await this.deps.models.complete(input.modelChoice, messages, { signal: input.signal });
            const { answer, rating } = parseSelfRating(completion.text);
            const confidenceScore = this.deps.scorer.score({
                relevanceScores: outcome.results.map((result) => result.relevanceScore),
                selfRating: rating,
            });

            this.logger.info('Agent answered', { agentId: this.agentId, confidenceScore, grounded: outcome.results.length });

            return {
                agentId: this.agentId,
                response: answer,
                confidenceScore,
                retrievedContext: outcome.results,
                selfRating: rating,
                modelUsed: input.modelChoice,
                usedWeb: outcome.usedWeb,
                degraded: false,
            };
        } catch (error) {
            if (error instanceof WorkflowAborted || !(error instanceof ModelFailure)) {
                throw error;
            }
            this.logger.error('Model failed, returning fallback answer', { agentId: this.agentId, error: errorMessage(error) });
            return {
                agentId: this.agentId,
                response: MODEL_FALLBACK_MESSAGE,
                confidenceScore: 0,
                retrievedContext: outcome.results,
                selfRating: null,
                modelUsed: input.modelChoice,
                usedWeb: outcome.usedWeb,
                degraded: true,
            };
        }
    }
}
