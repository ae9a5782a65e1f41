import axios, { InternalAxiosRequestConfig } from 'axios';
import { describe, expect, it } from 'vitest';
import { RetrievalFailure } from '../../errors';
import { silentLogger } from '../../testing/fakes';
import { ChromaKnowledgeBase, distanceToRelevance } from './ChromaKnowledgeBase';

describe('distanceToRelevance', () => {
  it('maps cosine distance onto [0, 1]', () => {
    expect(distanceToRelevance(0)).toBe(1);
    expect(distanceToRelevance(1)).toBe(0.5);
    expect(distanceToRelevance(2)).toBe(0);
  });

  it('clamps values outside the cosine range', () => {
    expect(distanceToRelevance(-0.5)).toBe(1);
    expect(distanceToRelevance(3)).toBe(0);
  });
});

describe('ChromaKnowledgeBase', () => {
  const embedder = { embed: async () => [0.1, 0.2] };

  function knowledgeBaseWith(collectionBodies: unknown[]) {
    const requests: InternalAxiosRequestConfig[] = [];
    let lookups = 0;
    const http = axios.create({
      adapter: async (config) => {
        requests.push(config);
        const data = config.method === 'get'
          ? collectionBodies[Math.min(lookups++, collectionBodies.length - 1)]
          : {
            ids: [['ir-1']],
            documents: [['Isolate the host.']],
            metadatas: [[{ agent_type: 'incident_response' }]],
            distances: [[0.4]],
          };
        return { data, status: 200, statusText: 'OK', headers: {}, config };
      },
    });
    const knowledgeBase = new ChromaKnowledgeBase({
      logger: silentLogger,
      url: 'http://chroma.test/',
      collection: 'advisory',
      embedder,
      http,
    });
    return { knowledgeBase, requests };
  }

  it('queries the collection filtered by partition', async () => {
    const { knowledgeBase, requests } = knowledgeBaseWith([{ id: 'col-1' }]);

    const hits = await knowledgeBase.search('contain ransomware', ['incident_response', 'shared'], 5);

    expect(hits).toEqual([{ content: 'Isolate the host.', documentId: 'ir-1', partition: 'incident_response', score: 0.8 }]);
    expect(requests[1].url).toBe('/api/v1/collections/col-1/query');
    expect(JSON.parse(String(requests[1].data))).toMatchObject({
      n_results: 5,
      where: { agent_type: { $in: ['incident_response', 'shared'] } },
    });
  });

  it('looks the collection up again after a malformed lookup response', async () => {
    const { knowledgeBase, requests } = knowledgeBaseWith([{ unexpected: true }, { id: 'col-1' }]);

    await expect(knowledgeBase.search('contain ransomware', ['shared'], 3)).rejects.toBeInstanceOf(RetrievalFailure);
    const hits = await knowledgeBase.search('contain ransomware', ['shared'], 3);

    expect(hits).toHaveLength(1);
    expect(requests.filter((request) => request.method === 'get')).toHaveLength(2);
  });

  it('reuses the collection id once resolved', async () => {
    const { knowledgeBase, requests } = knowledgeBaseWith([{ id: 'col-1' }]);

    await knowledgeBase.search('a', ['shared'], 3);
    await knowledgeBase.search('b', ['shared'], 3);

    expect(requests.filter((request) => request.method === 'get')).toHaveLength(1);
  });
});
