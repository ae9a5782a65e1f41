// src/services/workflow/stages.ts

import { TransitionTable } from '../../utils/state-machine';

export type WorkflowStage =
    | 'idle'
    | 'routed'
    | 'primary_answered'
    | 'collaboration_pending'
    | 'collaboration_active'
    | 'merged'
    | 'persisted';

export const WORKFLOW_TRANSITIONS: TransitionTable<WorkflowStage> = Object.freeze({
    idle: ['routed'],
    routed: ['primary_answered'],
    primary_answered: ['collaboration_pending', 'merged'],
    collaboration_pending: ['collaboration_active', 'merged'],
    collaboration_active: ['merged'],
    merged: ['persisted'],
    persisted: [],
});

export const STAGE_MESSAGES: Readonly<Record<WorkflowStage, string>> = Object.freeze({
    idle: 'Waiting',
    routed: 'Query routed to specialist',
    primary_answered: 'Primary agent answered',
    collaboration_pending: 'Confidence below threshold, preparing consultation',
    collaboration_active: 'Consulting additional specialists',
    merged: 'Answers merged',
    persisted: 'Conversation saved',
});
