/**
 * Routes each inbound chat message to exactly one handler and produces
 * exactly one reply
 *
 * Classification walks an ordered route list: ledger commands, then expense
 * statements, then memory search (which matches everything).
 */

import { AppError, errorMessage } from './errors.js';
import { displayName, normalizeDraftExpense, resolveParticipant, toKnownUser } from './expense-normalizer.js';
import { createDeletionRecord, createExpenseRecord, createMemoryRecord } from './memory-partitioner.js';
import {
  createAuthorizationMessage,
  createBalancesMessage,
  createCategoryNotFoundMessage,
  createClarificationMessage,
  createDeletedMessage,
  createErrorMessage,
  createExpenseConfirmation,
  createFriendBalanceMessage,
  createHelpMessage,
  createHistoryMessage,
  createNotLinkedMessage,
  createNothingToDeleteMessage,
  createSearchResultsMessage,
} from './message-formatter.js';
import { SplitReconciler } from './split-reconciler.js';

import type { ExpenseParser } from './expense-parser.js';
import type { IdentityDirectory } from './identity-directory.js';
import type { LedgerCategory, LedgerClient } from './ledger-client.js';
import type { MemoryPartitioner } from './memory-partitioner.js';
import type {
  InboundMessage,
  LedgerUserId,
  LinkedUser,
  OutcomeStatus,
  RouteName,
  RouterResponse,
} from '../types.js';

// ============================================================================
// Classification
// ============================================================================

export type LedgerCommand =
  | { kind: 'help' }
  | { kind: 'start' }
  | { kind: 'balances' }
  | { kind: 'friend-balance'; friendName: string }
  | { kind: 'delete'; expenseId: string | null }
  | { kind: 'history'; category: string | null };

const COMMAND_PATTERNS: Array<{ pattern: RegExp; build: (match: RegExpExecArray) => LedgerCommand }> = [
  { pattern: /^\/?(?:help|\?)$/i, build: () => ({ kind: 'help' }) },
  { pattern: /^\/start\b/i, build: () => ({ kind: 'start' }) },
  { pattern: /^\/?(?:show\s+(?:my\s+)?)?balances?$/i, build: () => ({ kind: 'balances' }) },
  {
    pattern: /^how much do (?:i|we) owe\s+(.+?)\??$/i,
    build: (match) => ({ kind: 'friend-balance', friendName: match[1] }),
  },
  {
    pattern: /^how much does\s+(.+?)\s+owe (?:me|us)\??$/i,
    build: (match) => ({ kind: 'friend-balance', friendName: match[1] }),
  },
  {
    pattern: /^\/?balances?\s+(?:with\s+)?(.+)$/i,
    build: (match) => ({ kind: 'friend-balance', friendName: match[1] }),
  },
  {
    pattern: /^\/?(?:(?:delete|remove)\s+(?:the\s+|my\s+)?last\s+expense|undo)$/i,
    build: () => ({ kind: 'delete', expenseId: null }),
  },
  {
    pattern: /^\/?(?:delete|remove)\s+expense\s+#?(\d+)$/i,
    build: (match) => ({ kind: 'delete', expenseId: match[1] }),
  },
  {
    pattern: /^\/?(?:history|expenses|(?:show|list)\s+(?:me\s+)?(?:my\s+)?(?:recent\s+)?expenses)$/i,
    build: () => ({ kind: 'history', category: null }),
  },
  {
    pattern: /^(?:show|list)\s+(?:me\s+)?(?:my\s+)?(.+?)\s+expenses$/i,
    build: (match) => ({ kind: 'history', category: match[1] }),
  },
];

/**
 * Recognizes an imperative ledger command, or returns null
 */
export function parseLedgerCommand(text: string): LedgerCommand | null {
  const normalized = text.trim().replace(/\s+/g, ' ').replace(/[.!]+$/, '');
  for (const { pattern, build } of COMMAND_PATTERNS) {
    const match = pattern.exec(normalized);
    if (match !== null) {
      return build(match);
    }
  }
  return null;
}

const AMOUNT_PATTERN = /\d+(?:[.,]\d+)?/;
const EXPENSE_VERBS =
  /\b(?:paid|pay|pays|spent|spend|split|splits|owe|owes|owed|bought|buy|cost|costs|covered|treated)\b/i;

/**
 * True when the text reads like an expense statement: an amount plus an expense verb
 */
export function isExpenseStatement(text: string): boolean {
  return AMOUNT_PATTERN.test(text) && EXPENSE_VERBS.test(text);
}

const ROUTES: ReadonlyArray<{ name: RouteName; matches: (text: string) => boolean }> = [
  { name: 'command', matches: (text) => parseLedgerCommand(text) !== null },
  { name: 'expense', matches: isExpenseStatement },
  { name: 'memory', matches: () => true },
];

/**
 * Picks the route for a message. Total: every text lands in exactly one route.
 */
export function classifyMessage(text: string): RouteName {
  return ROUTES.find((route) => route.matches(text))?.name ?? 'memory';
}

/**
 * Removes the trigger word from a group message, or returns null when the
 * message is not addressed to the agent. A bare trigger asks for help.
 */
export function stripTrigger(content: string, trigger: string): string | null {
  const trimmed = content.trim();
  if (!trimmed.toLowerCase().startsWith(trigger.toLowerCase())) {
    return null;
  }
  const rest = trimmed.substring(trigger.length).trim();
  return rest.length === 0 ? 'help' : rest;
}

/**
 * Ids of every category (and subcategory) whose name contains the query
 */
export function matchCategoryIds(categories: LedgerCategory[], query: string): number[] {
  const needle = query.trim().toLowerCase();
  const ids = new Set<number>();

  for (const category of categories) {
    if (category.name.toLowerCase().includes(needle)) {
      ids.add(category.id);
      category.subcategories.forEach((sub) => ids.add(sub.id));
    }
    for (const sub of category.subcategories) {
      if (sub.name.toLowerCase().includes(needle)) {
        ids.add(sub.id);
      }
    }
  }

  return [...ids];
}

// ============================================================================
// Router
// ============================================================================

export interface RouterDependencies {
  identities: IdentityDirectory;
  ledger: LedgerClient;
  parser: ExpenseParser;
  memory: MemoryPartitioner;
  defaultCurrency: string;
  clarityCheck: boolean;
  authStartUrl?: string;
  reconciler?: SplitReconciler;
}

interface RouteContext {
  message: InboundMessage;
  text: string;
  user: LinkedUser | undefined;
}

interface RouteOutcome {
  reply: string;
  status: OutcomeStatus;
  detail?: Record<string, string>;
}

type RouteHandler = (context: RouteContext) => Promise<RouteOutcome>;

const HISTORY_LIMIT = 10;
const CATEGORY_SCAN_LIMIT = 100;

function ok(reply: string, detail?: Record<string, string>): RouteOutcome {
  return { reply, status: 'ok', detail };
}

/**
 * Corrective outcome for an error thrown by a handler
 */
function toCorrectiveOutcome(error: unknown): RouteOutcome {
  const reply = createErrorMessage(error);

  if (error instanceof AppError) {
    return {
      reply,
      status: error.statusCode < 500 ? 'rejected' : 'failed',
      detail: { error_code: error.code, error: error.message },
    };
  }

  console.error('❌ Unexpected error while handling message:', error);
  return { reply, status: 'failed', detail: { error_code: 'INTERNAL_ERROR', error: errorMessage(error) } };
}

export class CommandRouter {
  private readonly reconciler: SplitReconciler;
  private readonly handlers: Record<RouteName, RouteHandler>;

  constructor(private readonly deps: RouterDependencies) {
    this.reconciler = deps.reconciler ?? new SplitReconciler(deps.ledger);
    this.handlers = {
      command: (context) => this.handleCommand(context),
      expense: (context) => this.handleExpense(context),
      memory: (context) => this.handleMemorySearch(context),
    };
  }

  /**
   * Handles one inbound message. Never throws for handler failures: the
   * reply describes them instead. The message and its outcome are written
   * to the sender's memory partition before returning.
   */
  async handleMessage(message: InboundMessage): Promise<RouterResponse> {
    const text = message.text.trim();
    const route = classifyMessage(text);

    console.log(`📨 ${route} message from ${message.senderId}: "${text}"`);

    let outcome: RouteOutcome;
    try {
      const user = await this.deps.identities.lookup(message.senderId);
      outcome = await this.handlers[route]({ message, text, user });
    } catch (error) {
      outcome = toCorrectiveOutcome(error);
    }

    await this.recordChat(message, text, route, outcome);

    return { text: outcome.reply, route, status: outcome.status };
  }

  private async recordChat(
    message: InboundMessage,
    text: string,
    route: RouteName,
    outcome: RouteOutcome,
  ): Promise<void> {
    const record = createMemoryRecord(
      message.senderId,
      'chat',
      text,
      { ...outcome.detail, route, status: outcome.status, reply: outcome.reply },
      message.receivedAt,
    );

    try {
      await this.deps.memory.append(record);
    } catch (error) {
      console.error(`❌ Could not record message from "${message.senderId}":`, error);
    }
  }

  private async handleCommand({ text, user }: RouteContext): Promise<RouteOutcome> {
    const command: LedgerCommand = parseLedgerCommand(text) ?? { kind: 'help' };

    if (command.kind === 'help') {
      return ok(createHelpMessage());
    }
    if (command.kind === 'start') {
      return ok(createAuthorizationMessage(user !== undefined, this.deps.authStartUrl));
    }
    if (user === undefined) {
      return { reply: createNotLinkedMessage(), status: 'rejected' };
    }

    switch (command.kind) {
      case 'balances': {
        const friends = await this.deps.ledger.getBalances(user);
        return ok(createBalancesMessage(friends));
      }

      case 'friend-balance': {
        const friends = await this.deps.ledger.getFriends(user);
        const match = resolveParticipant(command.friendName, {
          requester: toKnownUser(user),
          knownUsers: friends,
          defaultCurrency: this.deps.defaultCurrency,
        });
        const friend = friends.find((candidate) => candidate.id === match.id);
        if (friend === undefined) {
          return { reply: '🤔 That is you. Ask for a friend\'s balance instead.', status: 'rejected' };
        }
        return ok(createFriendBalanceMessage(friend));
      }

      case 'history': {
        if (command.category === null) {
          const expenses = await this.deps.ledger.listExpenses(user, { limit: HISTORY_LIMIT });
          return ok(createHistoryMessage(expenses, null));
        }

        const categories = await this.deps.ledger.getCategories(user);
        const categoryIds = matchCategoryIds(categories, command.category);
        if (categoryIds.length === 0) {
          return { reply: createCategoryNotFoundMessage(command.category), status: 'rejected' };
        }

        const expenses = await this.deps.ledger.listExpenses(user, { limit: CATEGORY_SCAN_LIMIT, categoryIds });
        return ok(createHistoryMessage(expenses.slice(0, HISTORY_LIMIT), command.category));
      }

      case 'delete':
        return this.deleteExpense(user, command.expenseId);
    }
  }

  private async deleteExpense(user: LinkedUser, expenseId: string | null): Promise<RouteOutcome> {
    let target: { id: string; description: string | null };

    if (expenseId === null) {
      const [latest] = await this.deps.ledger.listExpenses(user, { limit: 1 });
      if (latest === undefined) {
        return { reply: createNothingToDeleteMessage(), status: 'rejected' };
      }
      target = { id: latest.id, description: latest.description };
    } else {
      target = { id: expenseId, description: null };
    }

    await this.deps.ledger.deleteExpense(user, target.id);
    console.log(`🗑️  Deleted expense ${target.id} for ${user.chatUserId}`);

    await this.deps.memory.append(createDeletionRecord(user.chatUserId, target));
    return ok(createDeletedMessage(target), { expense_id: target.id });
  }

  private async handleExpense({ text, user }: RouteContext): Promise<RouteOutcome> {
    if (user === undefined) {
      return { reply: createNotLinkedMessage(), status: 'rejected' };
    }

    const friends = await this.deps.ledger.getFriends(user);
    const requester = toKnownUser(user);

    const raw = await this.deps.parser.parse(text, { requester, friends });
    const draft = normalizeDraftExpense(raw, {
      requester,
      knownUsers: friends,
      defaultCurrency: this.deps.defaultCurrency,
    });

    if (this.deps.clarityCheck) {
      const question = await this.deps.parser.checkClarity(text, raw);
      if (question !== null) {
        return { reply: createClarificationMessage(question), status: 'clarification' };
      }
    }

    const split = await this.reconciler.reconcile(user, draft);
    console.log(`✅ Expense ${split.expenseId} created for ${user.chatUserId}`);

    const names = new Map<LedgerUserId, string>(friends.map((friend) => [friend.id, displayName(friend)]));
    names.set(requester.id, requester.firstName);
    draft.names.forEach((name, id) => names.set(id, name));

    await this.deps.memory.append(createExpenseRecord(user.chatUserId, split, names));
    return ok(createExpenseConfirmation(split, names), { expense_id: split.expenseId });
  }

  private async handleMemorySearch({ message, text }: RouteContext): Promise<RouteOutcome> {
    const records = await this.deps.memory.search(message.senderId, text);
    return ok(createSearchResultsMessage(text, records));
  }
}
