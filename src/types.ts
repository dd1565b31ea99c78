/**
 * Types and interfaces for the chat-to-ledger expense agent
 */

/** Stable per-chat sender identifier; also the memory partition key */
export type ChatUserId = string;

/** Ledger account identifier */
export type LedgerUserId = number;

/**
 * A chat user linked to a ledger account.
 * Linking happens outside this agent; the record is read-only here.
 */
export interface LinkedUser {
  chatUserId: ChatUserId;
  ledgerUserId: LedgerUserId;
  accessToken: string;
  displayName: string;
}

/**
 * A ledger identity the requester can name in a message
 */
export interface KnownUser {
  id: LedgerUserId;
  firstName: string;
  lastName: string | null;
}

/**
 * Locally parsed expense proposal, not yet submitted to the ledger.
 * Amounts are integers in minor currency units.
 */
export interface DraftExpense {
  payerRef: LedgerUserId;
  participantRefs: LedgerUserId[];
  totalAmount: number;
  currency: string;
  description: string;
  nominalShares: Map<LedgerUserId, number>;
  names: Map<LedgerUserId, string>;
}

/**
 * A participant whose ledger-computed amount differs from the proposed one
 */
export interface SplitAdjustment {
  participantRef: LedgerUserId;
  proposed: number;
  authoritative: number;
}

/**
 * Split as computed and stored by the ledger.
 * The amounts sum exactly to totalAmount.
 */
export interface ReconciledSplit {
  expenseId: string;
  payerRef: LedgerUserId;
  perParticipantAmount: Map<LedgerUserId, number>;
  totalAmount: number;
  currency: string;
  description: string;
  adjustments: SplitAdjustment[];
}

export type MemoryContentType = 'chat' | 'expense';

/**
 * Entry in a user's memory partition
 */
export interface MemoryRecord {
  ownerUserRef: ChatUserId;
  contentType: MemoryContentType;
  textBody: string;
  metadata: Record<string, string>;
  partitionKey: ChatUserId;
}

/**
 * One inbound chat message
 */
export interface InboundMessage {
  senderId: ChatUserId;
  text: string;
  receivedAt?: Date;
}

export type RouteName = 'command' | 'expense' | 'memory';

export type OutcomeStatus = 'ok' | 'clarification' | 'rejected' | 'failed';

/**
 * The single reply produced for an inbound message
 */
export interface RouterResponse {
  text: string;
  route: RouteName;
  status: OutcomeStatus;
}
