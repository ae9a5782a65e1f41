// src/services/llm/OpenAIModelClient.ts

import OpenAI from 'openai';
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import { ChatMessage, CompletionOptions, CompletionResult, ModelClient } from './types';
import { ModelChoice } from './models';

function toOpenAIMessage(message: ChatMessage): ChatCompletionMessageParam {
    switch (message.role) {
        case 'system':
            return { role: 'system', content: message.content };
        case 'assistant':
            return { role: 'assistant', content: message.content };
        default:
            return { role: 'user', content: message.content };
    }
}

export class OpenAIModelClient implements ModelClient {
    constructor(
        public readonly choice: ModelChoice,
        private readonly model: string,
        private readonly client: OpenAI,
    ) {}

    public async complete(messages: ChatMessage[], options: CompletionOptions = {}): Promise<CompletionResult> {
        const response = await this.client.chat.completions.create(
            {
                model: this.model,
                messages: messages.map(toOpenAIMessage),
                temperature: options.temperature ?? 0.3,
                max_tokens: options.maxTokens ?? 1024,
                stream: false,
                ...(options.json ? { response_format: { type: 'json_object' as const } } : {}),
            },
            { signal: options.signal, maxRetries: 0 },
        );

        return {
            text: response.choices[0]?.message?.content ?? '',
            model: response.model,
        };
    }
}
