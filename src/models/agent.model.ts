// src/models/agent.model.ts

import { QueryTurn } from './session.model';

export const SPECIALIST_AGENT_IDS = ['incident_response', 'threat_intelligence', 'prevention'] as const;

export type SpecialistAgentId = (typeof SPECIALIST_AGENT_IDS)[number];

/** `general` is the fallback when no specialist classifies confidently. */
export type AgentId = SpecialistAgentId | 'general';

export const REQUESTED_AGENTS = ['auto', ...SPECIALIST_AGENT_IDS] as const;

export type RequestedAgent = (typeof REQUESTED_AGENTS)[number];

export type KnowledgePartition = SpecialistAgentId | 'shared';

export interface AgentProfile {
  agentId: AgentId;
  displayName: string;
  knowledgeFilter: {
    partitions: readonly KnowledgePartition[];
  };
  systemPromptTemplate: string;
  webSearchKeywords: readonly string[];
  webQueryPrefix: string;
}

export interface AgentCandidate {
  agentId: AgentId;
  routingConfidence: number;
}

export type RetrievalSource = 'knowledge_base' | 'web';

export interface RetrievalResult {
  content: string;
  source: RetrievalSource;
  relevanceScore: number;
  provenance: string;
}

export type CollaborationMode = 'single_agent' | 'consultation' | 'multi_perspective';

export interface CollaborationRecord {
  mode: CollaborationMode;
  primaryAgent: AgentId;
  consultingAgents: AgentId[];
  thoughtProcess: string[];
}

export interface AgentAnswer {
  agentId: AgentId;
  response: string;
  confidenceScore: number;
  retrievedContext: RetrievalResult[];
  selfRating: number | null;
  modelUsed: string;
  usedWeb: boolean;
  /** True when the model failed and the fallback message was returned. */
  degraded: boolean;
}

/**
 * Transient per-invocation state threaded through one workflow execution.
 */
export interface AgentState {
  query: string;
  sessionId: string;
  history: QueryTurn[];
  modelChoice: string;
  candidateAgents: AgentCandidate[];
  retrievedContext: RetrievalResult[];
  response: string;
  confidenceScore: number;
  collaboration: CollaborationRecord;
}
