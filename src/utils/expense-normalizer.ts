/**
 * Turns the language model's loosely typed parse into a DraftExpense
 *
 * This is the only place the raw parse is read. Everything downstream works
 * with validated ledger ids and minor-unit amounts.
 */

import { z } from 'zod';

import {
  InvalidSplitError,
  MissingParticipantsError,
  MissingTotalError,
  UnresolvedParticipantError,
} from './errors.js';
import { toMinorUnits } from './money.js';

import type { DraftExpense, KnownUser, LedgerUserId, LinkedUser } from '../types.js';

export interface NormalizeContext {
  requester: KnownUser;
  knownUsers: KnownUser[];
  defaultCurrency: string;
}

const AmountLikeSchema = z.union([z.number(), z.string()]);

const RawExpenseSchema = z.object({
  amount: AmountLikeSchema.nullish().catch(null),
  currency: z.string().nullish().catch(null),
  payer: z.string().nullish().catch(null),
  participants: z.array(z.unknown()).nullish().catch(null),
  description: z.string().nullish().catch(null),
});

const RawParticipantSchema = z.union([
  z.string().transform((name) => ({ name, share: null })),
  z.object({
    name: z.string(),
    share: AmountLikeSchema.nullish().catch(null),
  }),
]);

const SELF_ALIASES = new Set(['me', 'mine', 'self', 'i', 'myself']);

const CURRENCY_CODE = /^[A-Za-z]{3}$/;

/** The requester as a known user, named by their ledger display name */
export function toKnownUser(user: LinkedUser): KnownUser {
  return { id: user.ledgerUserId, firstName: user.displayName, lastName: null };
}

export function displayName(user: KnownUser): string {
  return user.lastName === null || user.lastName === '' ? user.firstName : `${user.firstName} ${user.lastName}`;
}

/**
 * Resolves a name to a known user: self-reference, then exact, then
 * case-insensitive, then substring match. More than one candidate in a
 * tier is ambiguous.
 */
export function resolveParticipant(name: string, context: NormalizeContext): KnownUser {
  const trimmed = name.trim();
  const lower = trimmed.toLowerCase();

  if (trimmed === '') {
    throw new UnresolvedParticipantError(name);
  }
  if (SELF_ALIASES.has(lower)) {
    return context.requester;
  }

  const pool = [
    context.requester,
    ...context.knownUsers.filter((user) => user.id !== context.requester.id),
  ];

  const tiers: Array<(user: KnownUser) => boolean> = [
    (user) => displayName(user) === trimmed || user.firstName === trimmed,
    (user) =>
      displayName(user).toLowerCase() === lower ||
      user.firstName.toLowerCase() === lower ||
      user.lastName?.toLowerCase() === lower,
    (user) =>
      user.firstName.toLowerCase().includes(lower) || (user.lastName?.toLowerCase().includes(lower) ?? false),
  ];

  for (const matches of tiers) {
    const candidates = pool.filter(matches);
    if (candidates.length === 1) {
      return candidates[0];
    }
    if (candidates.length > 1) {
      throw new UnresolvedParticipantError(trimmed, true);
    }
  }

  throw new UnresolvedParticipantError(trimmed);
}

function describeEntry(entry: unknown): string {
  return typeof entry === 'string' ? entry : JSON.stringify(entry) ?? String(entry);
}

/**
 * Explicit shares become weights the splitter reproduces exactly; the
 * participants without one split whatever is left evenly.
 */
function buildWeights(
  shares: Map<LedgerUserId, number | null>,
  total: number,
): Map<LedgerUserId, number> {
  const weights = new Map<LedgerUserId, number>();
  const explicit = [...shares.values()].filter((share): share is number => share !== null);
  const unspecified = shares.size - explicit.length;
  const explicitSum = explicit.reduce((sum, share) => sum + share, 0);

  if (explicitSum > total) {
    throw new InvalidSplitError('The listed shares add up to more than the total');
  }

  if (explicit.length === 0) {
    shares.forEach((_, id) => weights.set(id, 1));
    return weights;
  }

  if (unspecified === 0) {
    if (explicitSum < total) {
      throw new InvalidSplitError('The listed shares add up to less than the total');
    }
    shares.forEach((share, id) => weights.set(id, share ?? 0));
    return weights;
  }

  const remainder = total - explicitSum;
  shares.forEach((share, id) => weights.set(id, share === null ? remainder : share * unspecified));
  return weights;
}

/**
 * Validates a raw parse into a DraftExpense
 */
export function normalizeDraftExpense(raw: unknown, context: NormalizeContext): DraftExpense {
  const parsed = RawExpenseSchema.safeParse(raw);
  if (!parsed.success) {
    throw new MissingTotalError('Could not read an expense from the message');
  }

  const fields = parsed.data;
  const currency =
    typeof fields.currency === 'string' && CURRENCY_CODE.test(fields.currency.trim())
      ? fields.currency.trim().toUpperCase()
      : context.defaultCurrency;

  const total = toMinorUnits(fields.amount, currency);
  if (total === null || total <= 0) {
    throw new MissingTotalError();
  }

  const names = new Map<LedgerUserId, string>();

  const payerName = fields.payer?.trim() ?? '';
  const payer = payerName === '' ? context.requester : resolveParticipant(payerName, context);
  names.set(payer.id, displayName(payer));

  const shares = new Map<LedgerUserId, number | null>();
  for (const entry of fields.participants ?? []) {
    const participant = RawParticipantSchema.safeParse(entry);
    if (!participant.success) {
      throw new UnresolvedParticipantError(describeEntry(entry));
    }

    const user = resolveParticipant(participant.data.name, context);
    names.set(user.id, displayName(user));

    let share: number | null = null;
    if (participant.data.share !== null && participant.data.share !== undefined) {
      share = toMinorUnits(participant.data.share, currency);
      if (share === null || share < 0) {
        throw new InvalidSplitError(`Share for ${participant.data.name} is not a valid amount`);
      }
    }

    const previous = shares.get(user.id);
    if (previous === undefined || previous === null) {
      shares.set(user.id, share ?? previous ?? null);
    } else {
      shares.set(user.id, previous + (share ?? 0));
    }
  }

  if (shares.size === 0) {
    throw new MissingParticipantsError();
  }

  const description = fields.description?.trim();

  return {
    payerRef: payer.id,
    participantRefs: [...shares.keys()],
    totalAmount: total,
    currency,
    description: description === undefined || description === '' ? 'Expense' : description,
    nominalShares: buildWeights(shares, total),
    names,
  };
}
