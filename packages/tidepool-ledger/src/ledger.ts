import { randomUUID } from "node:crypto";

import type { DocumentRef, DocumentStore, Logger } from "@tidepool/store";
import { DocumentNotFoundError, componentLogger, docKey } from "@tidepool/store";

import { InsufficientEscrowError } from "./errors.js";
import type { AccountView, ReputationTier, TransactionView, TrustConnection, TxRef } from "./model.js";
import { assertAmount, compareTransactions, isReputationTier, readAccount, readTransaction } from "./model.js";
import { ACCOUNT_NAMESPACE, ACCOUNT_SCHEMA, TRANSACTION_NAMESPACE, TRANSACTION_SCHEMA } from "./schemas.js";

export type LedgerOptions = {
  store: DocumentStore;
  /** Wall clock for `created_at`, in milliseconds. */
  now?: () => number;
  newTransactionId?: () => string;
  logger?: Logger;
};

export type OpenAccountOptions = {
  initialBalance?: number;
  tier?: ReputationTier;
};

export function accountRef(owner: string): DocumentRef {
  return { namespace: ACCOUNT_NAMESPACE, id: owner };
}

export function transactionRef(id: string): DocumentRef {
  return { namespace: TRANSACTION_NAMESPACE, id };
}

/** Registers the ledger namespaces unless the store already knows them. */
export function registerLedgerSchemas(store: DocumentStore): void {
  if (!store.schemas.get(ACCOUNT_NAMESPACE)) store.registerSchema(ACCOUNT_SCHEMA);
  if (!store.schemas.get(TRANSACTION_NAMESPACE)) store.registerSchema(TRANSACTION_SCHEMA);
}

/** Every `Pending` transaction the store holds, optionally for one sender, oldest first. */
export function pendingTransactions(store: DocumentStore, from?: string): TransactionView[] {
  const out: TransactionView[] = [];
  for (const ref of store.refs(TRANSACTION_NAMESPACE)) {
    const tx = readTransaction(store.read(ref));
    if (tx.status !== "Pending") continue;
    if (from !== undefined && tx.from !== from) continue;
    out.push(tx);
  }
  return out.sort(compareTransactions);
}

function appendHistory(account: AccountView, ref: TxRef): TxRef[] {
  return [...account.transaction_history, ref];
}

function validateConnection(conn: TrustConnection): void {
  if (conn.peer_id.length === 0) throw new Error("trust connection needs a peer_id");
  for (const key of ["trust_limit", "total_exchanged", "reputation"] as const) {
    if (!Number.isFinite(conn[key]) || conn[key] < 0) throw new Error(`invalid trust connection ${key}: ${conn[key]}`);
  }
}

/**
 * Mutual-credit accounts on top of the document store. Spending only checks
 * the local escrow; confirmation and escrow top-ups come from reconciliation.
 */
export class Ledger {
  readonly store: DocumentStore;
  private readonly now: () => number;
  private readonly newTransactionId: () => string;
  private readonly log: Logger;

  constructor(opts: LedgerOptions) {
    this.store = opts.store;
    this.now = opts.now ?? Date.now;
    this.newTransactionId = opts.newTransactionId ?? (() => `tx_${randomUUID()}`);
    this.log = componentLogger(opts.logger, "ledger");
    registerLedgerSchemas(this.store);
  }

  openAccount(owner: string, opts: OpenAccountOptions = {}): AccountView {
    if (owner.length === 0) throw new Error("account owner must not be empty");
    const initialBalance = opts.initialBalance ?? 0;
    if (!Number.isSafeInteger(initialBalance) || initialBalance < 0) {
      throw new Error(`invalid initialBalance: ${initialBalance}`);
    }
    const tier = opts.tier ?? "New";
    if (!isReputationTier(tier)) throw new Error(`unknown reputation tier: ${String(tier)}`);
    if (this.store.has(accountRef(owner))) throw new Error(`account ${owner} already exists`);

    this.store.create(ACCOUNT_NAMESPACE, owner, {
      owner,
      confirmed_balance: initialBalance,
      local_escrow: 0,
      escrow_allocated: 0,
      escrow_period: 0,
      pending_credits: 0,
      transaction_history: [],
      trust_connections: [],
      reputation_tier: tier,
    });
    this.log.info({ owner, initialBalance, tier }, "account opened");
    return this.account(owner);
  }

  account(owner: string): AccountView {
    return readAccount(this.store.read(accountRef(owner)));
  }

  /**
   * Spends against the local escrow. Works offline; the transaction stays
   * `Pending` until a reconciliation round confirms or rejects it.
   */
  spend(from: string, to: string, amount: number): TransactionView {
    assertAmount(amount);
    if (from === to) throw new Error("cannot spend to the same account");
    const sender = this.account(from);
    const recipientRef = accountRef(to);
    if (!this.store.has(recipientRef)) throw new DocumentNotFoundError(docKey(recipientRef));
    if (amount > sender.local_escrow) throw new InsufficientEscrowError(from, amount, sender.local_escrow);

    const tx: TransactionView = {
      id: this.newTransactionId(),
      from,
      to,
      amount,
      created_at: this.now(),
      status: "Pending",
      confirmed_at: null,
      rejection_reason: null,
    };
    this.store.transaction((t) => {
      t.mutate(accountRef(from), (view) => {
        const account = readAccount(view);
        return {
          ...view,
          local_escrow: account.local_escrow - amount,
          transaction_history: appendHistory(account, { id: tx.id, direction: "out", amount }),
        };
      });
      t.create(TRANSACTION_NAMESPACE, tx.id, tx);
      t.mutate(recipientRef, (view) => {
        const account = readAccount(view);
        return {
          ...view,
          pending_credits: account.pending_credits + amount,
          transaction_history: appendHistory(account, { id: tx.id, direction: "in", amount }),
        };
      });
    });
    this.log.debug({ tx: tx.id, from, to, amount }, "spend recorded");
    return tx;
  }

  transaction(id: string): TransactionView {
    return readTransaction(this.store.read(transactionRef(id)));
  }

  pendingTransactions(from?: string): TransactionView[] {
    return pendingTransactions(this.store, from);
  }

  /** Adds or replaces the connection to `conn.peer_id`. */
  addTrustConnection(owner: string, conn: TrustConnection): void {
    validateConnection(conn);
    this.store.mutate(accountRef(owner), (view) => {
      const kept = readAccount(view).trust_connections.filter((c) => c.peer_id !== conn.peer_id);
      return { ...view, trust_connections: [...kept, { ...conn }] };
    });
  }

  /** Returns false when there was no connection to `peerId`. */
  removeTrustConnection(owner: string, peerId: string): boolean {
    const delta = this.store.mutate(accountRef(owner), (view) => ({
      ...view,
      trust_connections: readAccount(view).trust_connections.filter((c) => c.peer_id !== peerId),
    }));
    return delta !== null;
  }

  trustConnections(owner: string): TrustConnection[] {
    return this.account(owner).trust_connections;
  }

  setReputationTier(owner: string, tier: ReputationTier): void {
    if (!isReputationTier(tier)) throw new Error(`unknown reputation tier: ${String(tier)}`);
    this.store.mutate(accountRef(owner), (view) => ({ ...view, reputation_tier: tier }));
  }
}
