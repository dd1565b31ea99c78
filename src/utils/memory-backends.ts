/**
 * Semantic memory backends
 *
 * Every call carries the partition key; a backend never answers across
 * partitions.
 */

import { z } from 'zod';

import { MemoryServiceError } from './errors.js';

export interface MemoryHit {
  textBody: string;
  metadata: Record<string, string>;
  /** Partition the service reports for the hit, when it reports one */
  partitionKey: string | null;
  score: number | null;
}

export interface MemoryBackend {
  add(partitionKey: string, textBody: string, metadata: Record<string, string>): Promise<void>;
  /** Most relevant first, at most `limit` hits */
  search(partitionKey: string, query: string, limit: number): Promise<MemoryHit[]>;
}

// ============================================================================
// In-process backend
// ============================================================================

interface StoredEntry {
  textBody: string;
  metadata: Record<string, string>;
  terms: Set<string>;
  sequence: number;
}

function terms(text: string): string[] {
  return text.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? [];
}

/**
 * Keeps partitions in process memory and ranks by query-term overlap,
 * newest first on ties. Used for local runs and tests.
 */
export class InMemoryMemoryBackend implements MemoryBackend {
  private readonly partitions = new Map<string, StoredEntry[]>();
  private sequence = 0;

  add(partitionKey: string, textBody: string, metadata: Record<string, string>): Promise<void> {
    const entries = this.partitions.get(partitionKey) ?? [];
    entries.push({
      textBody,
      metadata: { ...metadata },
      terms: new Set(terms(textBody)),
      sequence: this.sequence++,
    });
    this.partitions.set(partitionKey, entries);
    return Promise.resolve();
  }

  search(partitionKey: string, query: string, limit: number): Promise<MemoryHit[]> {
    const queryTerms = [...new Set(terms(query))];
    const entries = this.partitions.get(partitionKey) ?? [];

    const ranked = entries
      .map((entry) => ({
        entry,
        score: queryTerms.filter((term) => entry.terms.has(term)).length,
      }))
      .sort((a, b) => b.score - a.score || b.entry.sequence - a.entry.sequence)
      .slice(0, limit);

    return Promise.resolve(
      ranked.map(({ entry, score }) => ({
        textBody: entry.textBody,
        metadata: { ...entry.metadata },
        partitionKey,
        score,
      })),
    );
  }

  /** All entries of a partition in insertion order */
  entries(partitionKey: string): Array<{ textBody: string; metadata: Record<string, string> }> {
    return (this.partitions.get(partitionKey) ?? []).map(({ textBody, metadata }) => ({
      textBody,
      metadata: { ...metadata },
    }));
  }
}

// ============================================================================
// HTTP backend (mem0-compatible API)
// ============================================================================

const HitSchema = z.object({
  memory: z.string(),
  user_id: z.string().nullish(),
  metadata: z.record(z.unknown()).nullish(),
  score: z.number().nullish(),
});

const SearchResponseSchema = z.union([
  z.array(HitSchema),
  z.object({ results: z.array(HitSchema) }).transform(({ results }) => results),
]);

function stringifyMetadata(metadata: Record<string, unknown> | null | undefined): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(metadata ?? {})) {
    result[key] = typeof value === 'string' ? value : JSON.stringify(value);
  }
  return result;
}

export interface HttpMemoryBackendOptions {
  baseUrl: string;
  apiKey?: string;
  fetch?: typeof fetch;
}

export class HttpMemoryBackend implements MemoryBackend {
  private readonly baseUrl: string;
  private readonly apiKey: string | undefined;
  private readonly fetchImpl: typeof fetch;

  constructor(options: HttpMemoryBackendOptions) {
    this.baseUrl = options.baseUrl.replace(/\/$/, '');
    this.apiKey = options.apiKey;
    this.fetchImpl = options.fetch ?? fetch;
  }

  async add(partitionKey: string, textBody: string, metadata: Record<string, string>): Promise<void> {
    await this.post('/v1/memories/', {
      messages: [{ role: 'user', content: textBody }],
      user_id: partitionKey,
      metadata,
      infer: false,
    });
  }

  async search(partitionKey: string, query: string, limit: number): Promise<MemoryHit[]> {
    const body = await this.post('/v1/memories/search/', { query, user_id: partitionKey, limit });
    const parsed = SearchResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new MemoryServiceError(`Unexpected search response: ${parsed.error.message}`);
    }

    return parsed.data.slice(0, limit).map((hit) => ({
      textBody: hit.memory,
      metadata: stringifyMetadata(hit.metadata),
      partitionKey: hit.user_id ?? null,
      score: hit.score ?? null,
    }));
  }

  private async post(path: string, payload: Record<string, unknown>): Promise<unknown> {
    let response: Response;
    try {
      response = await this.fetchImpl(`${this.baseUrl}${path}`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          ...(this.apiKey === undefined ? {} : { Authorization: `Token ${this.apiKey}` }),
        },
        body: JSON.stringify(payload),
      });
    } catch (error) {
      throw new MemoryServiceError(
        `Memory service request failed: ${error instanceof Error ? error.message : String(error)}`,
      );
    }

    if (!response.ok) {
      throw new MemoryServiceError(`Memory service HTTP ${response.status}: ${response.statusText}`, response.status);
    }

    try {
      return await response.json();
    } catch {
      throw new MemoryServiceError(`Memory service returned a non-JSON response for ${path}`, response.status);
    }
  }
}
