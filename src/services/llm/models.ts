// src/services/llm/models.ts

export const MODEL_CHOICES = ['openai_mini', 'openai', 'groq_llama', 'groq_oss'] as const;

export type ModelChoice = (typeof MODEL_CHOICES)[number];

export type ModelProvider = 'openai' | 'groq';

export interface ModelDefinition {
    provider: ModelProvider;
    model: string;
}

export const MODEL_CATALOG: Readonly<Record<ModelChoice, ModelDefinition>> = Object.freeze({
    openai_mini: { provider: 'openai', model: 'gpt-4o-mini' },
    openai: { provider: 'openai', model: 'gpt-4o' },
    groq_llama: { provider: 'groq', model: 'llama-3.3-70b-versatile' },
    groq_oss: { provider: 'groq', model: 'openai/gpt-oss-20b' },
});

export function isModelChoice(value: string): value is ModelChoice {
    return MODEL_CHOICES.some((choice) => choice === value);
}
