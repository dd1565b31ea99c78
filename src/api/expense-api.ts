import express from 'express';
import { z } from 'zod';

import { AppError } from '../utils/errors.js';
import { displayName, normalizeDraftExpense, toKnownUser } from '../utils/expense-normalizer.js';
import { createExpenseRecord } from '../utils/memory-partitioner.js';
import { formatMinorUnits } from '../utils/money.js';
import { proposeSplit, SplitReconciler } from '../utils/split-reconciler.js';

import type { CommandRouter } from '../utils/command-router.js';
import type { ExpenseParser } from '../utils/expense-parser.js';
import type { IdentityDirectory } from '../utils/identity-directory.js';
import type { LedgerClient, LedgerFriend } from '../utils/ledger-client.js';
import type { MemoryPartitioner } from '../utils/memory-partitioner.js';
import type { DraftExpense, KnownUser, LedgerUserId, ReconciledSplit } from '../types.js';

export interface ExpenseApiDependencies {
  router: CommandRouter;
  identities: IdentityDirectory;
  ledger: LedgerClient;
  parser: ExpenseParser;
  memory: MemoryPartitioner;
  defaultCurrency: string;
  reconciler?: SplitReconciler;
}

const MessageRequestSchema = z.object({
  chatUserId: z.string({ required_error: 'chatUserId is required' }).trim().min(1, 'chatUserId is required'),
  text: z.string({ required_error: 'text is required' }).trim().min(1, 'text is required'),
});

const AmountSchema = z.union([z.number(), z.string()]);

const ExpenseRequestSchema = z
  .object({
    chatUserId: z.string({ required_error: 'chatUserId is required' }).trim().min(1, 'chatUserId is required'),
    cost: z.union([z.number(), z.string().trim().min(1)]),
    description: z.string().trim().optional(),
    currency: z.string().trim().optional(),
    payer: z.string().trim().optional(),
    participants: z
      .array(z.string().trim().min(1, 'participant names must not be empty'), {
        required_error: 'participants is required',
      })
      .min(1, 'participants must not be empty'),
    shares: z.record(z.string(), AmountSchema).optional(),
  })
  .refine(
    (body) => Object.keys(body.shares ?? {}).every((name) => body.participants.includes(name)),
    'shares must only name listed participants',
  );

function participantNames(
  requester: KnownUser,
  friends: LedgerFriend[],
  draft: DraftExpense,
): Map<LedgerUserId, string> {
  const names = new Map<LedgerUserId, string>(friends.map((friend) => [friend.id, displayName(friend)]));
  names.set(requester.id, requester.firstName);
  draft.names.forEach((name, id) => names.set(id, name));
  return names;
}

function serializeSplit(split: ReconciledSplit, names: Map<LedgerUserId, string>): Record<string, unknown> {
  return {
    expenseId: split.expenseId,
    payer: split.payerRef,
    description: split.description,
    currency: split.currency,
    total: formatMinorUnits(split.totalAmount, split.currency),
    participants: [...split.perParticipantAmount.entries()].map(([id, amount]) => ({
      id,
      name: names.get(id) ?? null,
      share: formatMinorUnits(amount, split.currency),
    })),
    adjusted: split.adjustments.map((adjustment) => adjustment.participantRef),
  };
}

function serializeDraft(draft: DraftExpense): Record<string, unknown> {
  const proposed = proposeSplit(draft);
  return {
    payer: draft.payerRef,
    description: draft.description,
    currency: draft.currency,
    total: formatMinorUnits(draft.totalAmount, draft.currency),
    participants: draft.participantRefs.map((id) => ({
      id,
      name: draft.names.get(id) ?? null,
      weight: draft.nominalShares.get(id) ?? 0,
      share: formatMinorUnits(proposed.get(id) ?? 0, draft.currency),
    })),
  };
}

function sendError(res: express.Response, route: string, error: unknown): void {
  if (error instanceof AppError) {
    res.status(error.statusCode).json({ error: error.message, code: error.code });
    return;
  }
  console.error(`Error in ${route}:`, error);
  res.status(500).json({ error: 'Internal error', code: 'INTERNAL_ERROR' });
}

/**
 * HTTP surface of the agent: health checks, a dry-run expense parse, direct
 * expense creation and a chat endpoint that goes through the same router as
 * chat messages
 */
export function createExpenseApi(deps: ExpenseApiDependencies): express.Router {
  const router = express.Router();
  const reconciler = deps.reconciler ?? new SplitReconciler(deps.ledger);

  router.get('/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  router.get('/', (_req, res) => {
    res.json({ status: 'running' });
  });

  /**
   * POST /api/parse
   * Parses an expense statement without creating anything in the ledger
   */
  router.post('/api/parse', async (req, res) => {
    const body = MessageRequestSchema.safeParse(req.body);
    if (!body.success) {
      res.status(400).json({ error: body.error.issues[0]?.message ?? 'Invalid request' });
      return;
    }

    try {
      const { chatUserId, text } = body.data;
      const user = await deps.identities.lookup(chatUserId);
      if (user === undefined) {
        res.status(401).json({ error: 'Chat user is not linked to the ledger' });
        return;
      }

      const friends = await deps.ledger.getFriends(user);
      const requester = toKnownUser(user);
      const raw = await deps.parser.parse(text, { requester, friends });
      const draft = normalizeDraftExpense(raw, {
        requester,
        knownUsers: friends,
        defaultCurrency: deps.defaultCurrency,
      });

      res.json({ parsed: serializeDraft(draft) });
    } catch (error) {
      sendError(res, '/api/parse', error);
    }
  });

  /**
   * POST /api/expense
   * Creates an expense from structured input, participants named as in chat
   */
  router.post('/api/expense', async (req, res) => {
    const body = ExpenseRequestSchema.safeParse(req.body);
    if (!body.success) {
      res.status(400).json({ error: body.error.issues[0]?.message ?? 'Invalid request' });
      return;
    }

    try {
      const { chatUserId, cost, description, currency, payer, participants, shares } = body.data;
      const user = await deps.identities.lookup(chatUserId);
      if (user === undefined) {
        res.status(401).json({ error: 'Chat user is not linked to the ledger' });
        return;
      }

      const friends = await deps.ledger.getFriends(user);
      const requester = toKnownUser(user);
      const draft = normalizeDraftExpense(
        {
          amount: cost,
          currency,
          payer,
          description,
          participants: participants.map((name) => ({ name, share: shares?.[name] ?? null })),
        },
        { requester, knownUsers: friends, defaultCurrency: deps.defaultCurrency },
      );

      const split = await reconciler.reconcile(user, draft);
      console.log(`✅ Expense ${split.expenseId} created over HTTP for ${user.chatUserId}`);

      const names = participantNames(requester, friends, draft);
      await deps.memory.append(createExpenseRecord(user.chatUserId, split, names));

      res.status(201).json({ expense: serializeSplit(split, names) });
    } catch (error) {
      sendError(res, '/api/expense', error);
    }
  });

  /**
   * POST /api/messages
   * Handles a message exactly as if it arrived over chat
   */
  router.post('/api/messages', async (req, res) => {
    const body = MessageRequestSchema.safeParse(req.body);
    if (!body.success) {
      res.status(400).json({ error: body.error.issues[0]?.message ?? 'Invalid request' });
      return;
    }

    try {
      const response = await deps.router.handleMessage({
        senderId: body.data.chatUserId,
        text: body.data.text,
        receivedAt: new Date(),
      });
      res.json({ reply: response.text, route: response.route, status: response.status });
    } catch (error) {
      sendError(res, '/api/messages', error);
    }
  });

  return router;
}

export function createApiServer(deps: ExpenseApiDependencies): express.Express {
  const app = express();
  app.use(express.json());
  app.use(createExpenseApi(deps));
  return app;
}
