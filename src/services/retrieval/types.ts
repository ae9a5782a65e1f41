// src/services/retrieval/types.ts

import { KnowledgePartition, RetrievalResult } from '../../models/agent.model';

export interface KnowledgeHit {
  content: string;
  /** Normalized to [0,1], higher is more relevant. */
  score: number;
  partition: KnowledgePartition | string;
  documentId: string;
}

export interface WebHit {
  content: string;
  url: string;
  domain: string;
  score: number;
}

/** Text embedding provider for the knowledge-base query. */
export interface Embedder {
  embed(text: string, signal?: AbortSignal): Promise<number[]>;
}

/** Similarity search over the knowledge base, filtered by partition. */
export interface KnowledgeBaseSearch {
  search(query: string, partitions: readonly KnowledgePartition[], k: number, signal?: AbortSignal): Promise<KnowledgeHit[]>;
}

export interface WebSearchOptions {
  includeDomains: readonly string[];
  maxResults: number;
  signal?: AbortSignal;
}

/** Live web search restricted to a domain allow-list. */
export interface WebSearch {
  search(query: string, options: WebSearchOptions): Promise<WebHit[]>;
}

export interface RetrievalRequest {
  query: string;
  partitions: readonly KnowledgePartition[];
  /** Set by the calling agent when the query needs current information. */
  wantsWeb: boolean;
  /** Query sent to the web backend; defaults to `query`. */
  webQuery?: string;
  signal?: AbortSignal;
}

export interface RetrievalOutcome {
  results: RetrievalResult[];
  usedWeb: boolean;
  tokensUsed: number;
  droppedCount: number;
  /** Messages of backends that failed; the other source still contributes. */
  failures: string[];
}

/** The gateway as seen by agents. */
export interface Retriever {
  retrieve(request: RetrievalRequest): Promise<RetrievalOutcome>;
}
