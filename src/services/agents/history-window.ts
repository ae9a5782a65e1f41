// src/services/agents/history-window.ts

import { QueryTurn } from '../../models/session.model';
import { ChatMessage } from '../llm/types';
import { estimateTokens } from '../retrieval/token-budget';

/**
 * The most recent turns whose combined size fits `tokenBudget`.
 */
export function recentHistory(turns: QueryTurn[], tokenBudget: number): QueryTurn[] {
  const window: QueryTurn[] = [];
  let used = 0;
  for (let i = turns.length - 1; i >= 0; i--) {
    const cost = estimateTokens(turns[i].content);
    if (used + cost > tokenBudget) break;
    window.unshift(turns[i]);
    used += cost;
  }
  return window;
}

export function toChatMessages(turns: QueryTurn[]): ChatMessage[] {
  return turns.map((turn): ChatMessage => {
    if (turn.summary) {
      return { role: 'system', content: `Summary of the earlier conversation:\n${turn.content}` };
    }
    return { role: turn.role === 'user' ? 'user' : 'assistant', content: turn.content };
  });
}
