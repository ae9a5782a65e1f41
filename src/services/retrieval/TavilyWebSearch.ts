// src/services/retrieval/TavilyWebSearch.ts

import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import { BaseService } from '../base/BaseService';
import { ServiceConfig } from '../base/types';
import { RetrievalFailure, errorMessage } from '../../errors';
import { WebHit, WebSearch, WebSearchOptions } from './types';
import { hostnameOf } from './trusted-domains';

export interface TavilyConfig extends ServiceConfig {
  apiKey: string;
  baseUrl?: string;
  http?: AxiosInstance;
}

const searchResponseSchema = z.object({
  results: z.array(
    z.object({
      url: z.string(),
      content: z.string(),
      title: z.string().optional(),
      score: z.number().optional(),
    }),
  ),
});

export class TavilyWebSearch extends BaseService implements WebSearch {
  private readonly http: AxiosInstance;

  constructor(private readonly config: TavilyConfig) {
    super(config);
    this.http = config.http ?? axios.create({ baseURL: config.baseUrl ?? 'https://api.tavily.com' });
  }

  public async search(query: string, options: WebSearchOptions): Promise<WebHit[]> {
    try {
      const { data } = await this.http.post(
        '/search',
        {
          query,
          search_depth: 'basic',
          max_results: options.maxResults,
          include_domains: [...options.includeDomains],
        },
        {
          headers: { Authorization: `Bearer ${this.config.apiKey}` },
          signal: options.signal,
        },
      );

      const parsed = searchResponseSchema.parse(data);
      const hits: WebHit[] = [];
      for (const result of parsed.results) {
        const domain = hostnameOf(result.url);
        if (!domain) continue;
        hits.push({
          content: result.title ? `${result.title}\n${result.content}` : result.content,
          url: result.url,
          domain,
          score: Math.min(1, Math.max(0, result.score ?? 0.5)),
        });
      }

      this.logger.debug('Web search complete', { hits: hits.length });
      return hits;
    } catch (error) {
      throw new RetrievalFailure(`Web search failed: ${errorMessage(error)}`, { backend: 'tavily' });
    }
  }
}
