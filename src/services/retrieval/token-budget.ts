// src/services/retrieval/token-budget.ts

import { RetrievalResult } from '../../models/agent.model';

// Approximate token count (rough estimate: 4 chars ≈ 1 token)
export const CHARS_PER_TOKEN = 4;

export function estimateTokens(text: string): number {
  return Math.ceil(text.length / CHARS_PER_TOKEN);
}

export interface BudgetedResults {
  results: RetrievalResult[];
  tokensUsed: number;
  droppedCount: number;
}

/**
 * Cuts results already ordered by relevance to fit `budget` tokens. The least
 * relevant items are dropped first; if the best item alone is over budget its
 * content is truncated.
 */
export function fitToTokenBudget(ordered: RetrievalResult[], budget: number): BudgetedResults {
  const kept = [...ordered];
  let tokensUsed = kept.reduce((sum, result) => sum + estimateTokens(result.content), 0);
  let droppedCount = 0;

  while (tokensUsed > budget && kept.length > 1) {
    const dropped = kept.pop();
    if (dropped) {
      tokensUsed -= estimateTokens(dropped.content);
      droppedCount++;
    }
  }

  if (kept.length === 1 && tokensUsed > budget) {
    const [only] = kept;
    const maxChars = Math.max(0, budget) * CHARS_PER_TOKEN;
    if (maxChars === 0) {
      return { results: [], tokensUsed: 0, droppedCount: droppedCount + 1 };
    }
    kept[0] = { ...only, content: only.content.slice(0, maxChars) };
    tokensUsed = estimateTokens(kept[0].content);
  }

  return { results: kept, tokensUsed, droppedCount };
}
