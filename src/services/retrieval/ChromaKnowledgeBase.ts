// src/services/retrieval/ChromaKnowledgeBase.ts

import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import { BaseService } from '../base/BaseService';
import { ServiceConfig } from '../base/types';
import { KnowledgePartition } from '../../models/agent.model';
import { RetrievalFailure, errorMessage } from '../../errors';
import { Embedder, KnowledgeBaseSearch, KnowledgeHit } from './types';

export interface ChromaConfig extends ServiceConfig {
  url: string;
  collection: string;
  embedder: Embedder;
  http?: AxiosInstance;
}

const collectionSchema = z.object({ id: z.string() });

const queryResponseSchema = z.object({
  ids: z.array(z.array(z.string())),
  documents: z.array(z.array(z.string().nullable())).nullable(),
  metadatas: z.array(z.array(z.record(z.unknown()).nullable())).nullable(),
  distances: z.array(z.array(z.number())).nullable(),
});

/**
 * Chroma stores cosine distances in [0, 2]; map them onto [0, 1] relevance.
 */
export function distanceToRelevance(distance: number): number {
  return Math.min(1, Math.max(0, 1 - distance / 2));
}

/**
 * Knowledge-base search over a Chroma collection through its REST API.
 * Documents carry an `agent_type` metadata field naming their partition.
 */
export class ChromaKnowledgeBase extends BaseService implements KnowledgeBaseSearch {
  private readonly http: AxiosInstance;
  private collectionId: Promise<string> | null = null;

  constructor(private readonly config: ChromaConfig) {
    super(config);
    this.http = config.http ?? axios.create({ baseURL: config.url.replace(/\/$/, '') });
  }

  public async search(
    query: string,
    partitions: readonly KnowledgePartition[],
    k: number,
    signal?: AbortSignal,
  ): Promise<KnowledgeHit[]> {
    try {
      const [collectionId, embedding] = await Promise.all([
        this.resolveCollectionId(signal),
        this.config.embedder.embed(query, signal),
      ]);

      const { data } = await this.http.post(
        `/api/v1/collections/${collectionId}/query`,
        {
          query_embeddings: [embedding],
          n_results: k,
          where: { agent_type: { $in: [...partitions] } },
          include: ['documents', 'metadatas', 'distances'],
        },
        { signal },
      );

      const parsed = queryResponseSchema.parse(data);
      const ids = parsed.ids[0] ?? [];
      const documents = parsed.documents?.[0] ?? [];
      const metadatas = parsed.metadatas?.[0] ?? [];
      const distances = parsed.distances?.[0] ?? [];

      const hits: KnowledgeHit[] = [];
      ids.forEach((id, index) => {
        const content = documents[index];
        if (!content) return;
        const partition = metadatas[index]?.agent_type;
        hits.push({
          content,
          documentId: id,
          partition: typeof partition === 'string' ? partition : 'shared',
          score: distanceToRelevance(distances[index] ?? 2),
        });
      });

      this.logger.debug('Knowledge base search complete', { partitions, hits: hits.length });
      return hits;
    } catch (error) {
      throw new RetrievalFailure(`Knowledge base search failed: ${errorMessage(error)}`, { backend: 'chroma' });
    }
  }

  private resolveCollectionId(signal?: AbortSignal): Promise<string> {
    if (!this.collectionId) {
      this.collectionId = this.http
        .get(`/api/v1/collections/${encodeURIComponent(this.config.collection)}`, { signal })
        .then(({ data }) => collectionSchema.parse(data).id)
        .catch((error: unknown) => {
          // Forget the failed lookup so the next search retries it.
          this.collectionId = null;
          throw error;
        });
    }
    return this.collectionId;
  }
}
