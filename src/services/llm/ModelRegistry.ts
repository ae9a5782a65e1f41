// src/services/llm/ModelRegistry.ts

import Groq from 'groq-sdk';
import OpenAI from 'openai';
import { BaseService } from '../base/BaseService';
import { ServiceConfig } from '../base/types';
import { ModelFailure, WorkflowAborted, errorMessage } from '../../errors';
import { withTimeout } from '../../utils/async';
import { MODEL_CATALOG, MODEL_CHOICES, ModelChoice, isModelChoice } from './models';
import { GroqModelClient } from './GroqModelClient';
import { OpenAIModelClient } from './OpenAIModelClient';
import { ChatMessage, CompletionOptions, CompletionResult, ModelClient, ModelInvoker } from './types';

export interface ModelRegistryConfig extends ServiceConfig {
    clients: ModelClient[];
    defaultModel: ModelChoice;
    timeoutMs: number;
    /** Attempts per call; one bounded retry by default. */
    maxAttempts?: number;
}

/**
 * Read-only model-name → client map, built once at startup and shared by
 * every workflow. Each call gets a bounded timeout and one retry.
 */
export class ModelRegistry extends BaseService implements ModelInvoker {
    public readonly defaultModel: ModelChoice;
    private readonly clients: ReadonlyMap<ModelChoice, ModelClient>;
    private readonly timeoutMs: number;
    private readonly maxAttempts: number;

    constructor(config: ModelRegistryConfig) {
        super(config);
        this.clients = new Map(config.clients.map((client) => [client.choice, client] as const));
        if (!this.clients.has(config.defaultModel)) {
            throw new Error(`Default model '${config.defaultModel}' has no client`);
        }
        this.defaultModel = config.defaultModel;
        this.timeoutMs = config.timeoutMs;
        this.maxAttempts = config.maxAttempts ?? 2;
    }

    public static fromCredentials(
        config: ServiceConfig & { groqApiKey: string; openAiApiKey: string; defaultModel: ModelChoice; timeoutMs: number },
    ): ModelRegistry {
        const groq = new Groq({ apiKey: config.groqApiKey });
        const openai = new OpenAI({ apiKey: config.openAiApiKey });

        const clients = MODEL_CHOICES.map((choice): ModelClient => {
            const definition = MODEL_CATALOG[choice];
            return definition.provider === 'groq'
                ? new GroqModelClient(choice, definition.model, groq)
                : new OpenAIModelClient(choice, definition.model, openai);
        });

        return new ModelRegistry({ logger: config.logger, clients, defaultModel: config.defaultModel, timeoutMs: config.timeoutMs });
    }

    public has(choice: string): choice is ModelChoice {
        return isModelChoice(choice) && this.clients.has(choice);
    }

    public async complete(
        choice: ModelChoice,
        messages: ChatMessage[],
        options: CompletionOptions = {},
    ): Promise<CompletionResult> {
        const client = this.clients.get(choice) ?? this.clients.get(this.defaultModel);
        if (!client) {
            throw new ModelFailure(`No client registered for model '${choice}'`, { choice });
        }

        let lastError: unknown;
        for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
            try {
                return await withTimeout(
                    (signal) => client.complete(messages, { ...options, signal }),
                    this.timeoutMs,
                    `model ${client.choice}`,
                    options.signal,
                );
            } catch (error) {
                if (error instanceof WorkflowAborted) {
                    throw error;
                }
                lastError = error;
                this.logger.warn('Model call failed', { model: client.choice, attempt, error: errorMessage(error) });
            }
        }

        throw new ModelFailure(`Model '${client.choice}' failed after ${this.maxAttempts} attempts: ${errorMessage(lastError)}`, {
            model: client.choice,
        });
    }
}
