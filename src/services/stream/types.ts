import { AgentId, CollaborationMode } from '../../models/agent.model';
import { TurnRole } from '../../models/session.model';
import { ServiceConfig } from '../base/types';
import { WorkflowStage } from '../workflow/stages';

export type StreamConfig = ServiceConfig;

export interface ConnectionAckContent {
  connection_id: string;
  message: string;
}

export interface WorkflowStatusContent {
  session_id: string;
  stage: WorkflowStage;
  message: string;
}

export interface AgentResponseContent {
  session_id: string;
  response: string;
  agent_type: AgentId;
  /** Confidence of the primary agent, the value the collaboration threshold applies to. */
  confidence_score: number;
  /** Confidence of the answer actually returned. */
  merged_confidence: number;
  model_used: string;
  was_collaboration: boolean;
  collaboration_mode: CollaborationMode;
  primary_agent: AgentId;
  consulting_agents: AgentId[];
  thought_process: string[];
  degraded: boolean;
  durable: boolean;
}

export interface WireTurn {
  role: TurnRole;
  content: string;
  timestamp: string;
  agent_type?: string;
}

export interface HistoryContent {
  session_id: string;
  turns: WireTurn[];
}

export interface SessionClearedContent {
  session_id: string;
}

export interface ErrorContent {
  code: string;
  message: string;
  hint?: string;
}

interface Envelope<T extends string, C> {
  type: T;
  content: C;
  messageId?: string;
  isFinal?: boolean;
}

// Defines the structure for a message sent over the WebSocket
export type StreamChunk =
  | Envelope<'connection_ack', ConnectionAckContent>
  | Envelope<'workflow_status', WorkflowStatusContent>
  | Envelope<'agent_response', AgentResponseContent>
  | Envelope<'history', HistoryContent>
  | Envelope<'session_cleared', SessionClearedContent>
  | Envelope<'error', ErrorContent>;

export type StreamChunkType = StreamChunk['type'];
