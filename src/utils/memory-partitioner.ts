/**
 * Per-user memory partitions
 *
 * Every chat message and every expense lifecycle event is written to the
 * sender's partition. Reads and writes are always scoped by the owner.
 */

import {
  MemorySearchUnavailable,
  MemoryStoreUnavailable,
  ValidationError,
  errorMessage,
} from './errors.js';
import { formatMoney } from './money.js';

import type { MemoryBackend, MemoryHit } from './memory-backends.js';
import type { ChatUserId, LedgerUserId, MemoryContentType, MemoryRecord, ReconciledSplit } from '../types.js';

const OWNER_KEY = 'owner';
const CONTENT_TYPE_KEY = 'content_type';

export function createMemoryRecord(
  owner: ChatUserId,
  contentType: MemoryContentType,
  textBody: string,
  metadata: Record<string, string> = {},
  at: Date = new Date(),
): MemoryRecord {
  return {
    ownerUserRef: owner,
    contentType,
    textBody,
    metadata: { ...metadata, timestamp: at.toISOString() },
    partitionKey: owner,
  };
}

/** Serializes a split as a JSON object keyed by ledger user id */
export function serializeSplit(amounts: Map<LedgerUserId, number>): string {
  const entries: Record<string, number> = {};
  amounts.forEach((amount, participant) => {
    entries[String(participant)] = amount;
  });
  return JSON.stringify(entries);
}

/**
 * Memory record for a created expense, carrying the ledger's split
 */
export function createExpenseRecord(
  owner: ChatUserId,
  split: ReconciledSplit,
  names: Map<LedgerUserId, string>,
  at?: Date,
): MemoryRecord {
  const nameOf = (id: LedgerUserId): string => names.get(id) ?? `user ${id}`;
  const shares = [...split.perParticipantAmount.entries()]
    .map(([id, amount]) => `${nameOf(id)} ${formatMoney(amount, split.currency)}`)
    .join(', ');

  const textBody =
    `Expense #${split.expenseId}: ${split.description}, ` +
    `${formatMoney(split.totalAmount, split.currency)} paid by ${nameOf(split.payerRef)}. Split: ${shares}`;

  return createMemoryRecord(
    owner,
    'expense',
    textBody,
    {
      event: 'create',
      expense_id: split.expenseId,
      description: split.description,
      total: String(split.totalAmount),
      currency: split.currency,
      payer: String(split.payerRef),
      split: serializeSplit(split.perParticipantAmount),
    },
    at,
  );
}

/**
 * Memory record for a deleted expense
 */
export function createDeletionRecord(
  owner: ChatUserId,
  expense: { id: string; description: string | null },
  at?: Date,
): MemoryRecord {
  const label = expense.description === null || expense.description === '' ? '' : `: ${expense.description}`;
  return createMemoryRecord(
    owner,
    'expense',
    `Deleted expense #${expense.id}${label}`,
    { event: 'delete', expense_id: expense.id },
    at,
  );
}

function assertScoped(owner: ChatUserId): void {
  if (owner.trim() === '') {
    throw new ValidationError('Memory access requires an owner partition');
  }
}

export interface MemoryPartitionerOptions {
  searchLimit?: number;
}

export class MemoryPartitioner {
  private readonly searchLimit: number;

  constructor(
    private readonly backend: MemoryBackend,
    options: MemoryPartitionerOptions = {},
  ) {
    this.searchLimit = options.searchLimit ?? 5;
  }

  /**
   * Writes a record to its owner's partition.
   * Throws MemoryStoreUnavailable when the backend fails.
   */
  async store(record: MemoryRecord): Promise<void> {
    assertScoped(record.ownerUserRef);
    if (record.partitionKey !== record.ownerUserRef) {
      throw new ValidationError('Memory record partition must match its owner');
    }

    try {
      await this.backend.add(record.partitionKey, record.textBody, {
        ...record.metadata,
        [OWNER_KEY]: record.ownerUserRef,
        [CONTENT_TYPE_KEY]: record.contentType,
      });
    } catch (error) {
      throw new MemoryStoreUnavailable(`Could not store memory: ${errorMessage(error)}`);
    }
  }

  /**
   * Like store, but a backend failure is logged and reported as false
   */
  async append(record: MemoryRecord): Promise<boolean> {
    try {
      await this.store(record);
      return true;
    } catch (error) {
      if (error instanceof MemoryStoreUnavailable) {
        console.warn(`⚠️  ${error.message} (owner ${record.ownerUserRef}, ${record.contentType})`);
        return false;
      }
      throw error;
    }
  }

  /**
   * Records of one partition, most relevant first.
   * Throws MemorySearchUnavailable when the backend fails.
   */
  async search(ownerUserRef: ChatUserId, queryText: string): Promise<MemoryRecord[]> {
    assertScoped(ownerUserRef);

    let hits: MemoryHit[];
    try {
      hits = await this.backend.search(ownerUserRef, queryText, this.searchLimit);
    } catch (error) {
      throw new MemorySearchUnavailable(`Memory search failed: ${errorMessage(error)}`);
    }

    return hits
      .filter((hit) => (hit.partitionKey ?? ownerUserRef) === ownerUserRef)
      .filter((hit) => (hit.metadata[OWNER_KEY] ?? ownerUserRef) === ownerUserRef)
      .slice(0, this.searchLimit)
      .map((hit): MemoryRecord => {
        const { [OWNER_KEY]: _owner, [CONTENT_TYPE_KEY]: contentType, ...metadata } = hit.metadata;
        return {
          ownerUserRef,
          contentType: contentType === 'expense' ? 'expense' : 'chat',
          textBody: hit.textBody,
          metadata,
          partitionKey: ownerUserRef,
        };
      });
  }
}
