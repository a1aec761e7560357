import { z } from 'zod';
import { requestJson } from '../http.js';
import { ProviderError } from '../../utils/errors.js';
import { parseProviderResponse } from './types.js';

export interface ResourceItem {
  title: string;
  url: string;
}

const ItemSchema = z
  .object({
    title: z
      .string()
      .nullish()
      .transform((v) => v ?? '未知标题'),
    url: z
      .string()
      .nullish()
      .transform((v) => v ?? ''),
  })
  .passthrough();

const SearchResponseSchema = z.object({
  code: z.number(),
  message: z.string().optional(),
  data: z
    .union([z.array(ItemSchema), z.object({ items: z.array(ItemSchema) }).passthrough()])
    .nullable()
    .optional(),
});

export interface ResourceSearchOptions {
  apiUrl: string;
  timeoutMs: number;
}

/**
 * Client for the resource search API: a fast indexed search and a slower
 * whole-web search.
 */
export class ResourceSearchClient {
  readonly name = 'resource-search';

  private options: ResourceSearchOptions;

  constructor(options: ResourceSearchOptions) {
    this.options = options;
  }

  /**
   * Indexed search
   */
  async search(keyword: string): Promise<ResourceItem[]> {
    const body = await requestJson({
      provider: this.name,
      url: `${this.options.apiUrl}/api/search`,
      method: 'GET',
      timeoutMs: this.options.timeoutMs,
      query: { title: keyword },
      headers: { page_no: '1', page_size: '90' },
    });
    return this.items(body);
  }

  /**
   * Whole-web search; slow, typically tens of seconds
   */
  async searchAll(keyword: string): Promise<ResourceItem[]> {
    const body = await requestJson({
      provider: this.name,
      url: `${this.options.apiUrl}/api/other/all_search`,
      method: 'POST',
      timeoutMs: this.options.timeoutMs,
      body: { title: keyword },
    });
    return this.items(body);
  }

  private items(body: unknown): ResourceItem[] {
    const parsed = parseProviderResponse(this.name, SearchResponseSchema, body);
    if (parsed.code !== 200) {
      throw new ProviderError(this.name, parsed.message ?? `API code ${String(parsed.code)}`);
    }

    const data = parsed.data;
    const items = !data ? [] : Array.isArray(data) ? data : data.items;

    return items
      .filter((item) => item.url.length > 0)
      .map((item) => ({ title: item.title, url: item.url }));
  }
}
