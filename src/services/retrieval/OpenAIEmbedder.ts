// src/services/retrieval/OpenAIEmbedder.ts

import OpenAI from 'openai';
import { Embedder } from './types';

export class OpenAIEmbedder implements Embedder {
  constructor(
    private readonly openai: OpenAI,
    private readonly model: string,
  ) {}

  public async embed(text: string, signal?: AbortSignal): Promise<number[]> {
    const response = await this.openai.embeddings.create({ model: this.model, input: text }, { signal });
    const embedding = response.data[0]?.embedding;
    if (!embedding) {
      throw new Error('Embedding provider returned no vector');
    }
    return embedding;
  }
}
