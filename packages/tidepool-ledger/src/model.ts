import type { Value, ValueObject } from "@tidepool/crdt";
import { InvalidValueError, expectArray, expectClock, expectNumber, expectRecord, expectString } from "@tidepool/crdt";

export const REPUTATION_TIERS = ["New", "Trusted", "Verified", "Premium"] as const;
export type ReputationTier = (typeof REPUTATION_TIERS)[number];

export const REPUTATION_MULTIPLIERS: Readonly<Record<ReputationTier, number>> = {
  New: 0.25,
  Trusted: 1.0,
  Verified: 1.5,
  Premium: 2.0,
};

export const TRANSACTION_STATUSES = ["Pending", "Confirmed", "Rejected"] as const;
export type TransactionStatus = (typeof TRANSACTION_STATUSES)[number];

export type RejectionReason = "over-escrow";

export type TxRef = {
  id: string;
  direction: "in" | "out";
  amount: number;
};

export type TrustConnection = {
  peer_id: string;
  trust_limit: number;
  total_exchanged: number;
  reputation: number;
};

export type AccountView = {
  owner: string;
  confirmed_balance: number;
  local_escrow: number;
  escrow_allocated: number;
  escrow_period: number;
  pending_credits: number;
  transaction_history: TxRef[];
  trust_connections: TrustConnection[];
  reputation_tier: ReputationTier;
};

export type TransactionView = {
  id: string;
  from: string;
  to: string;
  amount: number;
  created_at: number;
  status: TransactionStatus;
  confirmed_at: number | null;
  rejection_reason: string | null;
};

export function isReputationTier(value: unknown): value is ReputationTier {
  return REPUTATION_TIERS.some((tier) => tier === value);
}

function isTransactionStatus(value: unknown): value is TransactionStatus {
  return TRANSACTION_STATUSES.some((status) => status === value);
}

/** Escrow a balance earns at a tier, never more than the balance itself. */
export function escrowFor(balance: number, tier: ReputationTier): number {
  return Math.min(balance, Math.floor((balance / 2) * REPUTATION_MULTIPLIERS[tier]));
}

export function assertAmount(amount: number): void {
  if (!Number.isSafeInteger(amount) || amount <= 0) throw new Error(`invalid amount: ${amount}`);
}

function parseTxRef(raw: unknown, what: string): TxRef {
  const rec = expectRecord(raw, what);
  const direction = rec.direction === "in" ? "in" : rec.direction === "out" ? "out" : null;
  if (!direction) throw new InvalidValueError(`${what}.direction must be in or out`);
  return { id: expectString(rec.id, `${what}.id`), direction, amount: expectClock(rec.amount, `${what}.amount`) };
}

function parseTrustConnection(raw: unknown, what: string): TrustConnection {
  const rec = expectRecord(raw, what);
  return {
    peer_id: expectString(rec.peer_id, `${what}.peer_id`),
    trust_limit: expectNumber(rec.trust_limit, `${what}.trust_limit`),
    total_exchanged: expectNumber(rec.total_exchanged, `${what}.total_exchanged`),
    reputation: expectNumber(rec.reputation, `${what}.reputation`),
  };
}

// Unset lww integers read as null until the first reconciliation writes them.
function intOrZero(value: Value | undefined, what: string): number {
  return value === null || value === undefined ? 0 : expectNumber(value, what);
}

export function readAccount(view: ValueObject): AccountView {
  const tier = view.reputation_tier ?? "New";
  if (!isReputationTier(tier)) throw new InvalidValueError(`account.reputation_tier is not a tier: ${String(tier)}`);
  return {
    owner: expectString(view.owner, "account.owner"),
    confirmed_balance: intOrZero(view.confirmed_balance, "account.confirmed_balance"),
    local_escrow: intOrZero(view.local_escrow, "account.local_escrow"),
    escrow_allocated: intOrZero(view.escrow_allocated, "account.escrow_allocated"),
    escrow_period: intOrZero(view.escrow_period, "account.escrow_period"),
    pending_credits: intOrZero(view.pending_credits, "account.pending_credits"),
    transaction_history: expectArray(view.transaction_history ?? [], "account.transaction_history").map((ref, i) =>
      parseTxRef(ref, `account.transaction_history[${i}]`),
    ),
    trust_connections: expectArray(view.trust_connections ?? [], "account.trust_connections").map((conn, i) =>
      parseTrustConnection(conn, `account.trust_connections[${i}]`),
    ),
    reputation_tier: tier,
  };
}

export function readTransaction(view: ValueObject): TransactionView {
  const status = view.status;
  if (!isTransactionStatus(status)) throw new InvalidValueError(`transaction.status is not a status: ${String(status)}`);
  const confirmedAt = view.confirmed_at ?? null;
  const reason = view.rejection_reason ?? null;
  return {
    id: expectString(view.id, "transaction.id"),
    from: expectString(view.from, "transaction.from"),
    to: expectString(view.to, "transaction.to"),
    amount: expectClock(view.amount, "transaction.amount"),
    created_at: expectClock(view.created_at, "transaction.created_at"),
    status,
    confirmed_at: confirmedAt === null ? null : expectClock(confirmedAt, "transaction.confirmed_at"),
    rejection_reason: reason === null ? null : expectString(reason, "transaction.rejection_reason"),
  };
}

/** Pending order: oldest first, ties broken by id. */
export function compareTransactions(a: TransactionView, b: TransactionView): number {
  if (a.created_at !== b.created_at) return a.created_at - b.created_at;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}
