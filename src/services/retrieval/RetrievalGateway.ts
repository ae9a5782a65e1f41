// src/services/retrieval/RetrievalGateway.ts

import { BaseService } from '../base/BaseService';
import { ServiceConfig } from '../base/types';
import { RetrievalResult } from '../../models/agent.model';
import { WorkflowAborted, errorMessage } from '../../errors';
import { withTimeout } from '../../utils/async';
import { fitToTokenBudget } from './token-budget';
import { isTrustedDomain } from './trusted-domains';
import { KnowledgeBaseSearch, RetrievalOutcome, RetrievalRequest, Retriever, WebSearch } from './types';

export interface RetrievalGatewayConfig extends ServiceConfig {
  knowledgeBase: KnowledgeBaseSearch;
  /** Null when no web search credentials are configured. */
  webSearch: WebSearch | null;
  tokenBudget: number;
  relevanceFloor: number;
  trustedDomains: readonly string[];
  topK: number;
  maxWebResults: number;
  timeoutMs: number;
}

/**
 * Orders results by relevance, knowledge-base results first on ties.
 */
export function compareResults(a: RetrievalResult, b: RetrievalResult): number {
  if (b.relevanceScore !== a.relevanceScore) {
    return b.relevanceScore - a.relevanceScore;
  }
  if (a.source === b.source) return 0;
  return a.source === 'knowledge_base' ? -1 : 1;
}

export class RetrievalGateway extends BaseService implements Retriever {
  constructor(private readonly config: RetrievalGatewayConfig) {
    super(config);
  }

  public async retrieve(request: RetrievalRequest): Promise<RetrievalOutcome> {
    const failures: string[] = [];
    const results: RetrievalResult[] = [];

    try {
      const hits = await withTimeout(
        (signal) => this.config.knowledgeBase.search(request.query, request.partitions, this.config.topK, signal),
        this.config.timeoutMs,
        'knowledge base search',
        request.signal,
      );
      for (const hit of hits) {
        results.push({
          content: hit.content,
          source: 'knowledge_base',
          relevanceScore: hit.score,
          provenance: hit.documentId,
        });
      }
    } catch (error) {
      if (error instanceof WorkflowAborted) throw error;
      failures.push(errorMessage(error));
      this.logger.warn('Knowledge base unavailable, continuing without it', { error: errorMessage(error) });
    }

    const bestVector = results.reduce((best, result) => Math.max(best, result.relevanceScore), 0);
    const needsWeb = request.wantsWeb || bestVector < this.config.relevanceFloor;
    let usedWeb = false;

    if (needsWeb && this.config.webSearch) {
      const webSearch = this.config.webSearch;
      try {
        const hits = await withTimeout(
          (signal) =>
            webSearch.search(request.webQuery ?? request.query, {
              includeDomains: this.config.trustedDomains,
              maxResults: this.config.maxWebResults,
              signal,
            }),
          this.config.timeoutMs,
          'web search',
          request.signal,
        );
        usedWeb = true;
        let untrusted = 0;
        for (const hit of hits) {
          if (!isTrustedDomain(hit.domain, this.config.trustedDomains)) {
            untrusted++;
            continue;
          }
          results.push({ content: hit.content, source: 'web', relevanceScore: hit.score, provenance: hit.url });
        }
        if (untrusted > 0) {
          this.logger.debug('Dropped web results outside the trusted domains', { untrusted });
        }
      } catch (error) {
        if (error instanceof WorkflowAborted) throw error;
        failures.push(errorMessage(error));
        this.logger.warn('Web search unavailable, continuing without it', { error: errorMessage(error) });
      }
    }

    const budgeted = fitToTokenBudget(results.sort(compareResults), this.config.tokenBudget);

    this.logger.info('Retrieval complete', {
      kept: budgeted.results.length,
      dropped: budgeted.droppedCount,
      tokensUsed: budgeted.tokensUsed,
      usedWeb,
      failures: failures.length,
    });

    return { ...budgeted, usedWeb, failures };
  }
}
