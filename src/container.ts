// src/container.ts

import OpenAI from 'openai';
import { AppConfig } from './config';
import { AgentId } from './models/agent.model';
import { createLogger } from './utils/logger';
import { ALL_AGENT_IDS, getAgentProfile } from './services/agents/agent-registry';
import { SpecialistAgent } from './services/agents/SpecialistAgent';
import { AgentRunner, CollaborationCoordinator } from './services/collaboration/CollaborationCoordinator';
import { ConfidenceScorer } from './services/confidence/ConfidenceScorer';
import { isModelChoice } from './services/llm/models';
import { ModelRegistry } from './services/llm/ModelRegistry';
import { ChromaKnowledgeBase } from './services/retrieval/ChromaKnowledgeBase';
import { OpenAIEmbedder } from './services/retrieval/OpenAIEmbedder';
import { RetrievalGateway } from './services/retrieval/RetrievalGateway';
import { TavilyWebSearch } from './services/retrieval/TavilyWebSearch';
import { RouterService } from './services/router.service';
import { ConversationService } from './services/session/ConversationService';
import { ConversationSummarizer } from './services/session/ConversationSummarizer';
import { PersistentConversationStore } from './services/session/PersistentConversationStore';
import { RedisConversationStore } from './services/session/RedisConversationStore';
import { ConversationStore } from './services/session/types';
import { StreamManager } from './services/stream/StreamManager';
import { Orchestrator } from './services/workflow/Orchestrator';

export interface Services {
    models: ModelRegistry;
    conversations: ConversationService;
    orchestrator: Orchestrator;
    streamManager: StreamManager;
}

function createStore(config: Readonly<AppConfig>): ConversationStore {
    return config.session.backend === 'redis'
        ? RedisConversationStore.fromUrl(config.session.redisUrl)
        : new PersistentConversationStore(config.session.dir);
}

/**
 * Wires every service from the configuration. Registries are frozen here
 * and shared read-only by all workflows.
 */
export function buildServices(config: Readonly<AppConfig>): Services {
    const models = ModelRegistry.fromCredentials({
        logger: createLogger('models'),
        groqApiKey: config.groqApiKey,
        openAiApiKey: config.openAiApiKey,
        defaultModel: config.defaultModel,
        timeoutMs: config.modelTimeoutMs,
    });

    const knowledgeBase = new ChromaKnowledgeBase({
        logger: createLogger('chroma'),
        url: config.chroma.url,
        collection: config.chroma.collection,
        embedder: new OpenAIEmbedder(new OpenAI({ apiKey: config.openAiApiKey }), config.chroma.embeddingModel),
    });

    const webSearch = config.tavilyApiKey
        ? new TavilyWebSearch({ logger: createLogger('tavily'), apiKey: config.tavilyApiKey })
        : null;

    const retriever = new RetrievalGateway({
        logger: createLogger('retrieval'),
        knowledgeBase,
        webSearch,
        tokenBudget: config.retrieval.tokenBudget,
        relevanceFloor: config.retrieval.relevanceFloor,
        trustedDomains: config.retrieval.trustedDomains,
        topK: config.chroma.topK,
        maxWebResults: config.retrieval.maxWebResults,
        timeoutMs: config.retrieval.timeoutMs,
    });

    const scorer = new ConfidenceScorer(config.confidence);
    const agentLogger = createLogger('agent');
    const agents: ReadonlyMap<AgentId, AgentRunner> = new Map(
        ALL_AGENT_IDS.map((agentId) => [
            agentId,
            new SpecialistAgent(getAgentProfile(agentId), {
                logger: agentLogger,
                retriever,
                models,
                scorer,
                historyTokenBudget: config.session.historyTokenBudget,
            }),
        ] as const),
    );

    const router = new RouterService({
        logger: createLogger('router'),
        models,
        routerModel: config.routerModel,
        floor: config.routing.floor,
        shiftThreshold: config.routing.shiftThreshold,
    });

    const coordinator = new CollaborationCoordinator({
        logger: createLogger('collaboration'),
        agents,
        models,
        threshold: config.collaboration.threshold,
        timeoutMs: config.collaboration.timeoutMs,
    });

    const conversations = new ConversationService({
        logger: createLogger('conversations'),
        store: createStore(config),
        summarizer: new ConversationSummarizer({
            logger: createLogger('summarizer'),
            models,
            summaryModel: config.summaryModel,
        }),
        historyTokenBudget: config.session.historyTokenBudget,
        keepRecentTurns: config.session.keepRecentTurns,
    });

    const orchestrator = new Orchestrator({
        logger: createLogger('orchestrator'),
        router,
        agents,
        coordinator,
        conversations,
        defaultModel: config.defaultModel,
        isModelChoice,
    });

    return {
        models,
        conversations,
        orchestrator,
        streamManager: new StreamManager({ logger: createLogger('stream') }),
    };
}
