/**
 * Ledger service client
 *
 * The ledger (a Splitwise v3.0 compatible API) is the system of record for
 * expenses, splits and balances. Amounts cross this boundary as decimal
 * strings and are converted to minor units here.
 */

import { z } from 'zod';

import { LedgerRequestError } from './errors.js';
import { formatMinorUnits, parseMinorUnits } from './money.js';

import type { KnownUser, LedgerUserId, LinkedUser } from '../types.js';

export interface LedgerBalance {
  currency: string;
  /** Minor units; positive when the friend owes the user */
  amount: number;
}

export interface LedgerFriend extends KnownUser {
  balances: LedgerBalance[];
}

export interface CreateExpenseRequest {
  payer: LedgerUserId;
  /** Proposed owed amount per participant, in minor units */
  participantWeights: Map<LedgerUserId, number>;
  total: number;
  currency: string;
  description: string;
}

export interface CreatedExpense {
  /** Null when the ledger answered without creating anything */
  expenseId: string | null;
  totalAmount: number;
  currency: string;
  perParticipantAmount: Map<LedgerUserId, number>;
  errors: string[];
}

export interface LedgerExpense {
  id: string;
  description: string;
  cost: number;
  currency: string;
  date: string | null;
  categoryId: number | null;
  categoryName: string | null;
}

export interface LedgerCategory {
  id: number;
  name: string;
  subcategories: Array<{ id: number; name: string }>;
}

export interface ExpenseFilter {
  limit?: number;
  categoryIds?: number[];
}

/**
 * Operations the agent needs from the ledger
 */
export interface LedgerClient {
  getFriends(user: LinkedUser): Promise<LedgerFriend[]>;
  createExpense(user: LinkedUser, request: CreateExpenseRequest): Promise<CreatedExpense>;
  listExpenses(user: LinkedUser, filter?: ExpenseFilter): Promise<LedgerExpense[]>;
  deleteExpense(user: LinkedUser, expenseId: string): Promise<void>;
  getBalances(user: LinkedUser): Promise<LedgerFriend[]>;
  getCategories(user: LinkedUser): Promise<LedgerCategory[]>;
}

/** Upper bound on get_expenses pages read for one listing */
const MAX_EXPENSE_PAGES = 5;

// ============================================================================
// Response schemas
// ============================================================================

const IdSchema = z.union([z.number(), z.string()]).transform((id) => String(id));

const FriendSchema = z.object({
  id: z.number(),
  first_name: z.string().nullish(),
  last_name: z.string().nullish(),
  balance: z
    .array(z.object({ currency_code: z.string(), amount: z.string() }))
    .nullish(),
});

const FriendsResponseSchema = z.object({ friends: z.array(FriendSchema) });

const ExpenseUserSchema = z.object({
  user_id: z.number(),
  paid_share: z.string().nullish(),
  owed_share: z.string().nullish(),
});

const ExpenseSchema = z.object({
  id: IdSchema,
  description: z.string().nullish(),
  cost: z.string(),
  currency_code: z.string(),
  date: z.string().nullish(),
  deleted_at: z.string().nullish(),
  category: z.object({ id: z.number(), name: z.string() }).nullish(),
  users: z.array(ExpenseUserSchema).nullish(),
});

const ErrorsSchema = z
  .union([z.record(z.union([z.array(z.string()), z.string()])), z.array(z.string())])
  .nullish();

const CreateExpenseResponseSchema = z.object({
  expenses: z.array(ExpenseSchema).nullish(),
  errors: ErrorsSchema,
});

const ExpensesResponseSchema = z.object({ expenses: z.array(ExpenseSchema) });

const DeleteResponseSchema = z.object({
  success: z.boolean(),
  errors: ErrorsSchema,
});

const CategorySchema = z.object({
  id: z.number(),
  name: z.string(),
  subcategories: z.array(z.object({ id: z.number(), name: z.string() })).nullish(),
});

const CategoriesResponseSchema = z.object({ categories: z.array(CategorySchema) });

type ErrorsPayload = z.infer<typeof ErrorsSchema>;

function flattenErrors(errors: ErrorsPayload): string[] {
  if (errors === null || errors === undefined) {
    return [];
  }
  if (Array.isArray(errors)) {
    return errors;
  }
  return Object.values(errors).flatMap((value) => (Array.isArray(value) ? value : [value]));
}

function toAmount(value: string | null | undefined, currency: string): number {
  const amount = value === null || value === undefined ? 0 : parseMinorUnits(value, currency);
  if (amount === null) {
    throw new LedgerRequestError(`Ledger returned an unreadable amount: ${String(value)}`);
  }
  return amount;
}

// ============================================================================
// Splitwise client
// ============================================================================

export const DEFAULT_LEDGER_API_URL = 'https://secure.splitwise.com/api/v3.0';

export interface SplitwiseClientOptions {
  baseUrl?: string;
  fetch?: typeof fetch;
}

export class SplitwiseLedgerClient implements LedgerClient {
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;

  constructor(options: SplitwiseClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_LEDGER_API_URL).replace(/\/$/, '');
    this.fetchImpl = options.fetch ?? fetch;
  }

  async getFriends(user: LinkedUser): Promise<LedgerFriend[]> {
    const body = await this.request(user, 'GET', '/get_friends');
    const { friends } = this.parse(FriendsResponseSchema, body, 'get_friends');

    return friends.map((friend) => ({
      id: friend.id,
      firstName: friend.first_name ?? '',
      lastName: friend.last_name ?? null,
      balances: (friend.balance ?? []).map((entry) => ({
        currency: entry.currency_code,
        amount: toAmount(entry.amount, entry.currency_code),
      })),
    }));
  }

  async createExpense(user: LinkedUser, request: CreateExpenseRequest): Promise<CreatedExpense> {
    const { payer, participantWeights, total, currency, description } = request;
    const payload: Record<string, string | number> = {
      cost: formatMinorUnits(total, currency),
      description,
      currency_code: currency,
    };

    const entries = [...participantWeights.entries()];
    if (!participantWeights.has(payer)) {
      entries.push([payer, 0]);
    }

    entries.forEach(([userId, owed], index) => {
      payload[`users__${index}__user_id`] = userId;
      payload[`users__${index}__paid_share`] = formatMinorUnits(userId === payer ? total : 0, currency);
      payload[`users__${index}__owed_share`] = formatMinorUnits(owed, currency);
    });

    const body = await this.request(user, 'POST', '/create_expense', payload);
    const parsed = this.parse(CreateExpenseResponseSchema, body, 'create_expense');
    const created = parsed.expenses?.[0];

    if (created === undefined) {
      return {
        expenseId: null,
        totalAmount: 0,
        currency,
        perParticipantAmount: new Map(),
        errors: flattenErrors(parsed.errors),
      };
    }

    const perParticipantAmount = new Map<LedgerUserId, number>();
    for (const entry of created.users ?? []) {
      perParticipantAmount.set(entry.user_id, toAmount(entry.owed_share, created.currency_code));
    }

    return {
      expenseId: created.id,
      totalAmount: toAmount(created.cost, created.currency_code),
      currency: created.currency_code,
      perParticipantAmount,
      errors: flattenErrors(parsed.errors),
    };
  }

  /**
   * Pages through get_expenses until `limit` live expenses matching the
   * filter are found. The ledger applies its limit before deleted rows are
   * dropped, so a single page can come back short.
   */
  async listExpenses(user: LinkedUser, filter: ExpenseFilter = {}): Promise<LedgerExpense[]> {
    const limit = filter.limit ?? 20;
    const categoryIds = filter.categoryIds === undefined ? null : new Set(filter.categoryIds);
    const found: LedgerExpense[] = [];

    for (let page = 0, offset = 0; page < MAX_EXPENSE_PAGES && found.length < limit; page++) {
      const body = await this.request(user, 'GET', `/get_expenses?limit=${limit}&offset=${offset}`);
      const { expenses } = this.parse(ExpensesResponseSchema, body, 'get_expenses');

      for (const expense of expenses) {
        if (expense.deleted_at !== null && expense.deleted_at !== undefined) continue;
        if (categoryIds !== null && (expense.category == null || !categoryIds.has(expense.category.id))) continue;
        found.push({
          id: expense.id,
          description: expense.description ?? '',
          cost: toAmount(expense.cost, expense.currency_code),
          currency: expense.currency_code,
          date: expense.date ?? null,
          categoryId: expense.category?.id ?? null,
          categoryName: expense.category?.name ?? null,
        });
      }

      if (expenses.length < limit) break;
      offset += expenses.length;
    }

    return found.slice(0, limit);
  }

  async deleteExpense(user: LinkedUser, expenseId: string): Promise<void> {
    const body = await this.request(user, 'POST', `/delete_expense/${encodeURIComponent(expenseId)}`);
    const { success, errors } = this.parse(DeleteResponseSchema, body, 'delete_expense');

    if (!success) {
      const details = flattenErrors(errors);
      throw new LedgerRequestError(
        `Ledger refused to delete expense ${expenseId}${details.length > 0 ? `: ${details.join('; ')}` : ''}`,
      );
    }
  }

  async getBalances(user: LinkedUser): Promise<LedgerFriend[]> {
    const friends = await this.getFriends(user);
    return friends.filter((friend) => friend.balances.some((balance) => balance.amount !== 0));
  }

  async getCategories(user: LinkedUser): Promise<LedgerCategory[]> {
    const body = await this.request(user, 'GET', '/get_categories');
    const { categories } = this.parse(CategoriesResponseSchema, body, 'get_categories');

    return categories.map((category) => ({
      id: category.id,
      name: category.name,
      subcategories: category.subcategories ?? [],
    }));
  }

  private async request(
    user: LinkedUser,
    method: 'GET' | 'POST',
    path: string,
    payload?: Record<string, unknown>,
  ): Promise<unknown> {
    let response: Response;
    try {
      response = await this.fetchImpl(`${this.baseUrl}${path}`, {
        method,
        headers: {
          Authorization: `Bearer ${user.accessToken}`,
          ...(payload === undefined ? {} : { 'Content-Type': 'application/json' }),
        },
        body: payload === undefined ? undefined : JSON.stringify(payload),
      });
    } catch (error) {
      throw new LedgerRequestError(
        `Ledger request failed: ${error instanceof Error ? error.message : String(error)}`,
      );
    }

    if (!response.ok) {
      throw new LedgerRequestError(`Ledger HTTP ${response.status}: ${response.statusText}`, response.status);
    }

    try {
      return await response.json();
    } catch {
      throw new LedgerRequestError(`Ledger returned a non-JSON response for ${path}`, response.status);
    }
  }

  private parse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown, operation: string): T {
    const result = schema.safeParse(body);
    if (!result.success) {
      throw new LedgerRequestError(`Unexpected ${operation} response: ${result.error.message}`);
    }
    return result.data;
  }
}
