// src/services/llm/types.ts

import { ModelChoice } from './models';

export interface ChatMessage {
    role: 'system' | 'user' | 'assistant';
    content: string;
}

export interface CompletionOptions {
    temperature?: number;
    maxTokens?: number;
    /** Ask the provider for a JSON object response. */
    json?: boolean;
    signal?: AbortSignal;
}

export interface CompletionResult {
    text: string;
    model: string;
}

/**
 * A chat model bound to one provider model id.
 */
export interface ModelClient {
    readonly choice: ModelChoice;
    complete(messages: ChatMessage[], options?: CompletionOptions): Promise<CompletionResult>;
}

/**
 * What agents, the router and the summarizer call. Implementations add the
 * timeout and retry policy on top of a ModelClient.
 */
export interface ModelInvoker {
    readonly defaultModel: ModelChoice;
    has(choice: string): choice is ModelChoice;
    complete(choice: ModelChoice, messages: ChatMessage[], options?: CompletionOptions): Promise<CompletionResult>;
}
