import { blake3 } from "@noble/hashes/blake3";
import { encodeCanonical } from "@tidepool/crdt";
import type { DocumentStore } from "@tidepool/store";

import { accountRef, pendingTransactions } from "./ledger.js";
import type { TransactionView } from "./model.js";
import { readAccount } from "./model.js";

/** What a committee agrees on for one account in one round. */
export type Proposal = {
  round: number;
  account: string;
  admitted: string[];
  rejected: string[];
  /** Left pending for a later round. */
  deferred: string[];
};

export type AdmissionPlan = {
  account: string;
  allocation: number;
  admitted: TransactionView[];
  rejected: TransactionView[];
  deferred: TransactionView[];
  /** Total amount of the transactions that did not fit the allocation. */
  overdraft: number;
};

/** What happens to a pending transaction that does not fit the allocation. */
export type OverdraftResolution = "reject" | "approve" | "defer";

export type Overdraft = {
  tx: TransactionView;
  allocation: number;
  /** Sender's confirmed balance. */
  balance: number;
  /** How far past the allocation the account would be with `tx` admitted. */
  deficit: number;
};

/**
 * Must be deterministic: every committee member runs it on its own view and
 * signs what it decides.
 */
export type OverdraftPolicy = (overdraft: Overdraft) => OverdraftResolution;

export const rejectOverdrafts: OverdraftPolicy = () => "reject";

/** Approves a deficit up to `ratio` of the sender's confirmed balance and rejects anything larger. */
export function toleranceOverdraftPolicy(ratio: number): OverdraftPolicy {
  if (!Number.isFinite(ratio) || ratio < 0) throw new Error(`invalid overdraft tolerance: ${ratio}`);
  return ({ deficit, balance }) => (deficit <= Math.floor(balance * ratio) ? "approve" : "reject");
}

export type AdmitOptions = {
  /** Approved overdrafts never take the admitted total past this. Defaults to `allocation`. */
  balance?: number;
  policy?: OverdraftPolicy;
};

/**
 * Admits `pending` (already in created_at, id order) while the total stays
 * within `allocation`. The policy decides the first transaction that does
 * not fit; an approval admits it as long as the total stays within
 * `balance`. A rejection or deferral applies to that transaction and
 * everything after it.
 */
export function admit(
  account: string,
  allocation: number,
  pending: TransactionView[],
  opts: AdmitOptions = {},
): AdmissionPlan {
  const policy = opts.policy ?? rejectOverdrafts;
  const balance = opts.balance ?? allocation;
  const plan: AdmissionPlan = { account, allocation, admitted: [], rejected: [], deferred: [], overdraft: 0 };
  let total = 0;
  let tail: "reject" | "defer" | null = null;
  for (const tx of pending) {
    if (tail === null && total + tx.amount <= allocation) {
      plan.admitted.push(tx);
      total += tx.amount;
      continue;
    }
    plan.overdraft += tx.amount;
    let resolution: OverdraftResolution =
      tail ?? policy({ tx, allocation, balance, deficit: total + tx.amount - allocation });
    if (resolution === "approve" && total + tx.amount > balance) resolution = "reject";
    switch (resolution) {
      case "approve":
        plan.admitted.push(tx);
        total += tx.amount;
        break;
      case "reject":
        plan.rejected.push(tx);
        tail = "reject";
        break;
      case "defer":
        plan.deferred.push(tx);
        tail = "defer";
        break;
      default: {
        const _exhaustive: never = resolution;
        throw new Error(`unknown overdraft resolution: ${String(_exhaustive)}`);
      }
    }
  }
  return plan;
}

/** Admission for one account as this store sees it, or null when the account is unknown here. */
export function planAdmission(
  store: DocumentStore,
  account: string,
  policy: OverdraftPolicy = rejectOverdrafts,
): AdmissionPlan | null {
  const view = store.tryRead(accountRef(account));
  if (!view) return null;
  const current = readAccount(view);
  return admit(account, current.escrow_allocated, pendingTransactions(store, account), {
    balance: current.confirmed_balance,
    policy,
  });
}

export function toProposal(round: number, plan: AdmissionPlan): Proposal {
  return {
    round,
    account: plan.account,
    admitted: plan.admitted.map((tx) => tx.id),
    rejected: plan.rejected.map((tx) => tx.id),
    deferred: plan.deferred.map((tx) => tx.id),
  };
}

export function proposalDigest(proposal: Proposal): Uint8Array {
  return blake3(
    encodeCanonical({
      round: proposal.round,
      account: proposal.account,
      admitted: proposal.admitted,
      rejected: proposal.rejected,
      deferred: proposal.deferred,
    }),
  );
}
