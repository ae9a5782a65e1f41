// src/services/stream/wire.ts

import { QueryTurn } from '../../models/session.model';
import { AdvisorError, errorMessage, isAdvisorError } from '../../errors';
import { ErrorContent, WireTurn } from './types';

export function toWireTurn(turn: QueryTurn): WireTurn {
  const wire: WireTurn = { role: turn.role, content: turn.content, timestamp: turn.timestamp };
  if (turn.agentId) wire.agent_type = turn.agentId;
  return wire;
}

export function toErrorContent(error: unknown): ErrorContent {
  if (isAdvisorError(error)) {
    return errorContentOf(error);
  }
  return { code: 'INTERNAL_ERROR', message: errorMessage(error) };
}

function errorContentOf(error: AdvisorError): ErrorContent {
  const content: ErrorContent = { code: error.code, message: error.message };
  if (error.hint) content.hint = error.hint;
  return content;
}
