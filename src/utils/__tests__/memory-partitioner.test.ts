import { beforeEach, describe, expect, it, vi } from 'vitest';

import { MemorySearchUnavailable, MemoryStoreUnavailable, ValidationError } from '../errors.js';
import { InMemoryMemoryBackend } from '../memory-backends.js';
import {
  MemoryPartitioner,
  createDeletionRecord,
  createExpenseRecord,
  createMemoryRecord,
} from '../memory-partitioner.js';

import type { MemoryBackend, MemoryHit } from '../memory-backends.js';
import type { ReconciledSplit } from '../../types.js';

const AT = new Date('2024-05-01T12:00:00.000Z');

class FailingBackend implements MemoryBackend {
  add(): Promise<void> {
    return Promise.reject(new Error('connection refused'));
  }

  search(): Promise<MemoryHit[]> {
    return Promise.reject(new Error('connection refused'));
  }
}

describe('memory records', () => {
  it('stamps the owner as partition and the time as metadata', () => {
    expect(createMemoryRecord('inbox-x', 'chat', 'hello', { route: 'memory' }, AT)).toEqual({
      ownerUserRef: 'inbox-x',
      contentType: 'chat',
      textBody: 'hello',
      metadata: { route: 'memory', timestamp: '2024-05-01T12:00:00.000Z' },
      partitionKey: 'inbox-x',
    });
  });

  it('describes a created expense with the ledger split', () => {
    const split: ReconciledSplit = {
      expenseId: '555',
      payerRef: 1,
      perParticipantAmount: new Map([
        [1, 30000],
        [4, 30000],
      ]),
      totalAmount: 60000,
      currency: 'INR',
      description: 'Pizza',
      adjustments: [],
    };
    const names = new Map([
      [1, 'Asha'],
      [4, 'Bob'],
    ]);

    const record = createExpenseRecord('inbox-x', split, names, AT);

    expect(record.contentType).toBe('expense');
    expect(record.textBody).toBe('Expense #555: Pizza, ₹600.00 paid by Asha. Split: Asha ₹300.00, Bob ₹300.00');
    expect(record.metadata).toEqual({
      event: 'create',
      expense_id: '555',
      description: 'Pizza',
      total: '60000',
      currency: 'INR',
      payer: '1',
      split: '{"1":30000,"4":30000}',
      timestamp: '2024-05-01T12:00:00.000Z',
    });
  });

  it('describes a deleted expense', () => {
    const record = createDeletionRecord('inbox-x', { id: '555', description: 'Pizza' }, AT);

    expect(record.textBody).toBe('Deleted expense #555: Pizza');
    expect(record.metadata).toEqual({ event: 'delete', expense_id: '555', timestamp: '2024-05-01T12:00:00.000Z' });
  });
});

describe('MemoryPartitioner', () => {
  let backend: InMemoryMemoryBackend;
  let memory: MemoryPartitioner;

  beforeEach(() => {
    backend = new InMemoryMemoryBackend();
    memory = new MemoryPartitioner(backend, { searchLimit: 5 });
  });

  it('ranks the matching record above the others', async () => {
    await memory.store(createMemoryRecord('inbox-x', 'chat', 'pizza with Bob', {}, AT));
    await memory.store(createMemoryRecord('inbox-x', 'chat', 'taxi', {}, AT));

    const results = await memory.search('inbox-x', 'pizza');

    expect(results.map((record) => record.textBody)).toEqual(['pizza with Bob', 'taxi']);
    expect(results[0]).toEqual({
      ownerUserRef: 'inbox-x',
      contentType: 'chat',
      textBody: 'pizza with Bob',
      metadata: { timestamp: '2024-05-01T12:00:00.000Z' },
      partitionKey: 'inbox-x',
    });
  });

  it('never returns records of another partition', async () => {
    await memory.store(createMemoryRecord('inbox-x', 'chat', 'pizza with Bob'));
    await memory.store(createMemoryRecord('inbox-y', 'expense', 'pizza for the team'));

    const forX = await memory.search('inbox-x', 'pizza');
    const forY = await memory.search('inbox-y', 'pizza');

    expect(forX.map((record) => record.textBody)).toEqual(['pizza with Bob']);
    expect(forY.map((record) => record.textBody)).toEqual(['pizza for the team']);
    expect(forY[0]?.contentType).toBe('expense');
  });

  it('drops hits a backend reports for a different owner', async () => {
    const leaky: MemoryBackend = {
      add: () => Promise.resolve(),
      search: () =>
        Promise.resolve<MemoryHit[]>([
          { textBody: 'mine', metadata: { owner: 'inbox-x' }, partitionKey: 'inbox-x', score: 0.9 },
          { textBody: 'theirs', metadata: { owner: 'inbox-y' }, partitionKey: null, score: 0.8 },
          { textBody: 'elsewhere', metadata: {}, partitionKey: 'inbox-z', score: 0.7 },
        ]),
    };

    const results = await new MemoryPartitioner(leaky).search('inbox-x', 'anything');

    expect(results.map((record) => record.textBody)).toEqual(['mine']);
  });

  it('tags stored entries with owner and content type', async () => {
    await memory.store(createMemoryRecord('inbox-x', 'expense', 'Expense #1', { event: 'create' }, AT));

    expect(backend.entries('inbox-x')).toEqual([
      {
        textBody: 'Expense #1',
        metadata: {
          event: 'create',
          timestamp: '2024-05-01T12:00:00.000Z',
          owner: 'inbox-x',
          content_type: 'expense',
        },
      },
    ]);
  });

  it('refuses unscoped access', async () => {
    await expect(memory.search('  ', 'pizza')).rejects.toBeInstanceOf(ValidationError);
    await expect(
      memory.store({ ...createMemoryRecord('inbox-x', 'chat', 'hi'), partitionKey: 'inbox-y' }),
    ).rejects.toThrow('Memory record partition must match its owner');
  });

  it('limits search results', async () => {
    const limited = new MemoryPartitioner(backend, { searchLimit: 2 });
    for (const text of ['one pizza', 'two pizza', 'three pizza']) {
      await limited.store(createMemoryRecord('inbox-x', 'chat', text));
    }

    const results = await limited.search('inbox-x', 'pizza');

    expect(results.map((record) => record.textBody)).toEqual(['three pizza', 'two pizza']);
  });

  describe('when the backend is down', () => {
    const failing = new MemoryPartitioner(new FailingBackend());

    it('raises MemoryStoreUnavailable from store', async () => {
      await expect(failing.store(createMemoryRecord('inbox-x', 'chat', 'hi'))).rejects.toBeInstanceOf(
        MemoryStoreUnavailable,
      );
    });

    it('logs and reports false from append', async () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

      await expect(failing.append(createMemoryRecord('inbox-x', 'chat', 'hi'))).resolves.toBe(false);
      expect(warn).toHaveBeenCalledWith('⚠️  Could not store memory: connection refused (owner inbox-x, chat)');

      warn.mockRestore();
    });

    it('raises MemorySearchUnavailable from search', async () => {
      await expect(failing.search('inbox-x', 'pizza')).rejects.toThrow(
        'Memory search failed: connection refused',
      );
      await expect(failing.search('inbox-x', 'pizza')).rejects.toBeInstanceOf(MemorySearchUnavailable);
    });
  });
});
