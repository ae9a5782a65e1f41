// src/services/llm/GroqModelClient.ts

import Groq from 'groq-sdk';
import type { ChatCompletionMessageParam } from 'groq-sdk/resources/chat/completions';
import { ChatMessage, CompletionOptions, CompletionResult, ModelClient } from './types';
import { ModelChoice } from './models';

function toGroqMessage(message: ChatMessage): ChatCompletionMessageParam {
    switch (message.role) {
        case 'system':
            return { role: 'system', content: message.content };
        case 'assistant':
            return { role: 'assistant', content: message.content };
        default:
            return { role: 'user', content: message.content };
    }
}

export class GroqModelClient implements ModelClient {
    constructor(
        public readonly choice: ModelChoice,
        private readonly model: string,
        private readonly client: Groq,
    ) {}

    public async complete(messages: ChatMessage[], options: CompletionOptions = {}): Promise<CompletionResult> {
        const response = await this.client.chat.completions.create(
            {
                model: this.model,
                messages: messages.map(toGroqMessage),
                temperature: options.temperature ?? 0.3,
                max_tokens: options.maxTokens ?? 1024,
                stream: false,
                ...(options.json ? { response_format: { type: 'json_object' as const } } : {}),
            },
            // Retries and timeouts are owned by the ModelRegistry.
            { signal: options.signal, maxRetries: 0 },
        );

        return {
            text: response.choices[0]?.message?.content ?? '',
            model: response.model ?? this.model,
        };
    }
}
