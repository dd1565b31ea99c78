/**
 * Submits a draft expense to the ledger and reads back its authoritative split
 */

import { ExpenseCreationFailed } from './errors.js';
import { splitAmount } from './money-splitter.js';

import type { CreatedExpense, LedgerClient } from './ledger-client.js';
import type { DraftExpense, LedgerUserId, LinkedUser, ReconciledSplit, SplitAdjustment } from '../types.js';

/**
 * Local proposal of who owes what, sent to the ledger as owed shares.
 * Never shown to the user or persisted.
 */
export function proposeSplit(draft: DraftExpense): Map<LedgerUserId, number> {
  const weights = draft.participantRefs.map((participant) => ({
    participant,
    weight: draft.nominalShares.get(participant) ?? 0,
  }));
  return splitAmount(draft.totalAmount, weights, draft.payerRef);
}

function sumValues(amounts: Map<LedgerUserId, number>): number {
  let sum = 0;
  amounts.forEach((amount) => {
    sum += amount;
  });
  return sum;
}

export class SplitReconciler {
  constructor(private readonly ledger: LedgerClient) {}

  /**
   * Creates the expense on the ledger. Resolves only when the ledger
   * reports a created expense whose split adds up to its cost.
   */
  async reconcile(user: LinkedUser, draft: DraftExpense): Promise<ReconciledSplit> {
    const proposed = proposeSplit(draft);

    let created: CreatedExpense;
    try {
      created = await this.ledger.createExpense(user, {
        payer: draft.payerRef,
        participantWeights: proposed,
        total: draft.totalAmount,
        currency: draft.currency,
        description: draft.description,
      });
    } catch (error) {
      throw new ExpenseCreationFailed(
        `Ledger call failed: ${error instanceof Error ? error.message : String(error)}`,
        undefined,
        { cause: error },
      );
    }

    if (created.expenseId === null || created.expenseId === '') {
      const reason = created.errors.length > 0 ? created.errors.join('; ') : 'no expense id returned';
      throw new ExpenseCreationFailed(`Ledger did not create the expense: ${reason}`);
    }

    const authoritative = new Map<LedgerUserId, number>();
    for (const participant of draft.participantRefs) {
      authoritative.set(participant, created.perParticipantAmount.get(participant) ?? 0);
    }
    created.perParticipantAmount.forEach((amount, participant) => {
      if (amount !== 0 && !authoritative.has(participant)) {
        authoritative.set(participant, amount);
      }
    });

    const authoritativeSum = sumValues(authoritative);
    if (authoritativeSum !== created.totalAmount) {
      throw new ExpenseCreationFailed(
        `Ledger split for expense ${created.expenseId} sums to ${authoritativeSum}, expected ${created.totalAmount}`,
        created.expenseId,
      );
    }

    const adjustments: SplitAdjustment[] = [];
    authoritative.forEach((amount, participant) => {
      const proposedAmount = proposed.get(participant) ?? 0;
      if (proposedAmount !== amount) {
        adjustments.push({ participantRef: participant, proposed: proposedAmount, authoritative: amount });
      }
    });

    return {
      expenseId: created.expenseId,
      payerRef: draft.payerRef,
      perParticipantAmount: authoritative,
      totalAmount: created.totalAmount,
      currency: created.currency,
      description: draft.description,
      adjustments,
    };
  }
}
