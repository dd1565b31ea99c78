/**
 * Message formatting utilities for chat replies
 */

import {
  ExpenseCreationFailed,
  ExpenseParseError,
  InvalidSplitError,
  LedgerRequestError,
  MemorySearchUnavailable,
  MissingParticipantsError,
  MissingTotalError,
  UnresolvedParticipantError,
} from './errors.js';
import { formatMoney } from './money.js';

import type { LedgerExpense, LedgerFriend } from './ledger-client.js';
import type { LedgerUserId, MemoryRecord, ReconciledSplit } from '../types.js';

/**
 * Creates a help message explaining how to use the agent
 */
export function createHelpMessage(): string {
  return `👋 **splitchat**

I add your shared expenses to the ledger and remember what we talked about.

**Available commands:**
• help - Show this message
• /start - Link your ledger account
• balances - Show who owes whom
• how much do I owe <friend> - Balance with one friend
• history - Recent expenses ("show me food expenses" filters by category)
• delete last expense - Remove your latest expense
• delete expense <id> - Remove one expense

**Adding an expense:**
Just describe it, e.g. "I paid 900 for dinner with John and Alice".

Anything else is searched in your history, e.g. "when did we have pizza?" 🔍`;
}

/**
 * Reply to /start
 */
export function createAuthorizationMessage(alreadyLinked: boolean, authStartUrl?: string): string {
  if (alreadyLinked) {
    return '✅ Your ledger account is already linked. You can add expenses right away.';
  }
  if (authStartUrl === undefined || authStartUrl === '') {
    return '🔑 Your ledger account is not linked yet. Ask the operator of this agent for an authorization link.';
  }
  return `🔑 Authorize here: ${authStartUrl}`;
}

export function createNotLinkedMessage(): string {
  return '❌ Your chat account is not linked to the ledger yet. Send /start to authorize.';
}

/**
 * Confirmation for an expense the ledger created, using the ledger's split
 */
export function createExpenseConfirmation(split: ReconciledSplit, names: Map<LedgerUserId, string>): string {
  const nameOf = (id: LedgerUserId): string => names.get(id) ?? `user ${id}`;
  const lines = [
    `✅ Expense added: ${split.description} - ${formatMoney(split.totalAmount, split.currency)}`,
    `👤 Paid by ${nameOf(split.payerRef)}`,
  ];

  split.perParticipantAmount.forEach((amount, id) => {
    lines.push(`• ${nameOf(id)}: ${formatMoney(amount, split.currency)}`);
  });

  if (split.adjustments.length > 0) {
    const changes = split.adjustments
      .map(
        (adjustment) =>
          `${nameOf(adjustment.participantRef)} ${formatMoney(adjustment.proposed, split.currency)} → ${formatMoney(adjustment.authoritative, split.currency)}`,
      )
      .join(', ');
    lines.push(`ℹ️ The ledger adjusted the split: ${changes}`);
  }

  lines.push(`🧾 Ledger expense #${split.expenseId}`);
  return lines.join('\n');
}

export function createClarificationMessage(question: string): string {
  return `❓ ${question}`;
}

function describeBalance(friendName: string, amount: number, currency: string): string {
  if (amount > 0) {
    return `${friendName} owes you ${formatMoney(amount, currency)}`;
  }
  return `You owe ${friendName} ${formatMoney(-amount, currency)}`;
}

function friendName(friend: LedgerFriend): string {
  return friend.lastName === null || friend.lastName === '' ? friend.firstName : `${friend.firstName} ${friend.lastName}`;
}

/**
 * Lists every open balance
 */
export function createBalancesMessage(friends: LedgerFriend[]): string {
  const lines: string[] = [];
  for (const friend of friends) {
    for (const balance of friend.balances) {
      if (balance.amount !== 0) {
        lines.push(`• ${describeBalance(friendName(friend), balance.amount, balance.currency)}`);
      }
    }
  }

  if (lines.length === 0) {
    return '✅ No open balances, you are all settled up!';
  }
  return `📊 **Your balances**\n\n${lines.join('\n')}`;
}

/**
 * Balance with a single friend
 */
export function createFriendBalanceMessage(friend: LedgerFriend): string {
  const open = friend.balances.filter((balance) => balance.amount !== 0);
  if (open.length === 0) {
    return `✅ You and ${friendName(friend)} are settled up.`;
  }
  return open.map((balance) => `📊 ${describeBalance(friendName(friend), balance.amount, balance.currency)}`).join('\n');
}

/**
 * Recent expenses, optionally for one category
 */
export function createHistoryMessage(expenses: LedgerExpense[], category: string | null): string {
  const scope = category === null ? '' : ` ${category}`;
  if (expenses.length === 0) {
    return `🧾 No${scope} expenses found.`;
  }

  const lines = expenses.map((expense) => {
    const date = expense.date === null ? '' : `${expense.date.slice(0, 10)} `;
    return `• ${date}${expense.description}: ${formatMoney(expense.cost, expense.currency)} (#${expense.id})`;
  });
  return `🧾 **Recent${scope} expenses**\n\n${lines.join('\n')}`;
}

export function createCategoryNotFoundMessage(category: string): string {
  return `❌ Category "${category}" not found.`;
}

export function createDeletedMessage(expense: { id: string; description: string | null }): string {
  const label = expense.description === null || expense.description === '' ? '' : `: ${expense.description}`;
  return `🗑️ Deleted expense #${expense.id}${label}`;
}

export function createNothingToDeleteMessage(): string {
  return '🤷 There is no expense to delete.';
}

/**
 * Memory search results, most relevant first
 */
export function createSearchResultsMessage(query: string, records: MemoryRecord[]): string {
  if (records.length === 0) {
    return `🔍 Nothing in your history matches "${query}".`;
  }

  const lines = records.map((record) => {
    const date = record.metadata.timestamp === undefined ? '' : ` (${record.metadata.timestamp.slice(0, 10)})`;
    return `• ${record.textBody}${date}`;
  });
  return `🔍 Here's what I found:\n\n${lines.join('\n')}`;
}

/**
 * Turns an error into the reply the user sees
 */
export function createErrorMessage(error: unknown): string {
  if (error instanceof UnresolvedParticipantError) {
    return error.ambiguous
      ? `❓ "${error.participantName}" matches more than one of your friends. Please reply with the full name.`
      : `❓ I couldn't find "${error.participantName}" among your friends. Please reply with the correct friend's name.`;
  }
  if (error instanceof MissingTotalError) {
    return '❌ No amount found. Try something like "I paid 500 for lunch with John".';
  }
  if (error instanceof MissingParticipantsError) {
    return '❌ I couldn\'t tell who shared this expense. Please name the participants.';
  }
  if (error instanceof InvalidSplitError) {
    return `❌ ${error.message}. Please check the shares.`;
  }
  if (error instanceof ExpenseParseError) {
    return '❌ Sorry, I couldn\'t understand that expense. Please rephrase it.';
  }
  if (error instanceof ExpenseCreationFailed) {
    return '❌ The ledger did not accept this expense, so nothing was added. Please try again later.';
  }
  if (error instanceof MemorySearchUnavailable) {
    return '🔍 Search is unavailable right now. Please try again later.';
  }
  if (error instanceof LedgerRequestError) {
    return '❌ I couldn\'t reach the ledger right now. Please try again later.';
  }
  return '❌ Internal error';
}
