import { beforeEach, describe, expect, it, vi } from 'vitest';

import { MemoryServiceError } from '../errors.js';
import { HttpMemoryBackend, InMemoryMemoryBackend } from '../memory-backends.js';

describe('InMemoryMemoryBackend', () => {
  it('scores by distinct query terms and prefers newer entries on ties', async () => {
    const backend = new InMemoryMemoryBackend();
    await backend.add('p', 'Pizza night with Bob', {});
    await backend.add('p', 'Taxi to the airport', {});
    await backend.add('p', 'Pizza again', {});

    const hits = await backend.search('p', 'pizza with bob?', 10);

    expect(hits.map((hit) => [hit.textBody, hit.score])).toEqual([
      ['Pizza night with Bob', 3],
      ['Pizza again', 1],
      ['Taxi to the airport', 0],
    ]);
    expect(hits[0]?.partitionKey).toBe('p');
  });

  it('returns nothing for an empty partition', async () => {
    const backend = new InMemoryMemoryBackend();
    await backend.add('p', 'Pizza', {});

    expect(await backend.search('q', 'pizza', 5)).toEqual([]);
  });
});

describe('HttpMemoryBackend', () => {
  const fetchMock = vi.fn<typeof fetch>();
  let backend: HttpMemoryBackend;

  beforeEach(() => {
    fetchMock.mockReset();
    backend = new HttpMemoryBackend({ baseUrl: 'https://memory.test/', apiKey: 'test-key', fetch: fetchMock });
  });

  it('adds a memory under the partition user id', async () => {
    fetchMock.mockResolvedValueOnce(new Response(JSON.stringify([{ id: 'm1' }]), { status: 200 }));

    await backend.add('inbox-x', 'pizza with Bob', { content_type: 'chat' });

    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(String(url)).toBe('https://memory.test/v1/memories/');
    expect(init?.headers).toEqual({ 'Content-Type': 'application/json', Authorization: 'Token test-key' });
    expect(JSON.parse(String(init?.body))).toEqual({
      messages: [{ role: 'user', content: 'pizza with Bob' }],
      user_id: 'inbox-x',
      metadata: { content_type: 'chat' },
      infer: false,
    });
  });

  it('reads search results in either response shape', async () => {
    const hit = { memory: 'pizza with Bob', user_id: 'inbox-x', metadata: { total: 60000, owner: 'inbox-x' }, score: 0.8 };
    fetchMock
      .mockResolvedValueOnce(new Response(JSON.stringify({ results: [hit] }), { status: 200 }))
      .mockResolvedValueOnce(new Response(JSON.stringify([hit]), { status: 200 }));

    const expected = [
      {
        textBody: 'pizza with Bob',
        metadata: { total: '60000', owner: 'inbox-x' },
        partitionKey: 'inbox-x',
        score: 0.8,
      },
    ];
    expect(await backend.search('inbox-x', 'pizza', 5)).toEqual(expected);
    expect(await backend.search('inbox-x', 'pizza', 5)).toEqual(expected);

    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(String(url)).toBe('https://memory.test/v1/memories/search/');
    expect(JSON.parse(String(init?.body))).toEqual({ query: 'pizza', user_id: 'inbox-x', limit: 5 });
  });

  it('raises MemoryServiceError for failed requests', async () => {
    fetchMock.mockResolvedValueOnce(new Response('down', { status: 503, statusText: 'Service Unavailable' }));
    await expect(backend.search('inbox-x', 'pizza', 5)).rejects.toThrow(
      'Memory service HTTP 503: Service Unavailable',
    );

    fetchMock.mockRejectedValueOnce(new Error('socket hang up'));
    await expect(backend.add('inbox-x', 'hi', {})).rejects.toBeInstanceOf(MemoryServiceError);
  });
});
