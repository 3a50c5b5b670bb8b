import type { DocumentStore, Logger, Transaction } from "@tidepool/store";
import { componentLogger } from "@tidepool/store";

import type { AdmissionPlan, OverdraftPolicy } from "./admission.js";
import { planAdmission, proposalDigest, rejectOverdrafts, toProposal } from "./admission.js";
import type { Committee, CommitteeChannel } from "./committee.js";
import { QuorumNotReachedError } from "./errors.js";
import { accountRef, pendingTransactions, registerLedgerSchemas, transactionRef } from "./ledger.js";
import type { RejectionReason, TransactionView } from "./model.js";
import { escrowFor, readAccount, readTransaction } from "./model.js";
import { ACCOUNT_NAMESPACE } from "./schemas.js";

export type RejectedTransaction = {
  id: string;
  account: string;
  amount: number;
  reason: RejectionReason;
};

export type RoundReport = {
  round: number;
  /** Accounts whose admitted set reached quorum and was applied. */
  committed: string[];
  /** Accounts left untouched this round. */
  deferred: string[];
  confirmed: string[];
  rejected: RejectedTransaction[];
  /** Transactions the overdraft policy left pending for a later round. */
  carriedOver: string[];
  /** New escrow per committed account. */
  escrow: Record<string, number>;
  /** Per committed account, the amount of its transactions that did not fit the allocation. */
  overdrafts: Record<string, number>;
};

export type ReconciliationEngineOptions = {
  store: DocumentStore;
  committee: Committee;
  channel: CommitteeChannel;
  voteTimeoutMs?: number;
  /** Wall clock for `confirmed_at`, in milliseconds. */
  now?: () => number;
  /** Last completed round; defaults to the highest `escrow_period` in the store. */
  startRound?: number;
  /** Decides transactions beyond the allocation; rejects them by default. */
  overdraftPolicy?: OverdraftPolicy;
  logger?: Logger;
};

function assertPending(t: Transaction, id: string): TransactionView {
  const tx = readTransaction(t.read(transactionRef(id)));
  if (tx.status !== "Pending") throw new Error(`transaction ${id} is already ${tx.status}`);
  return tx;
}

/**
 * Turns pending ledger transactions into confirmed balances. Each account's
 * admitted set needs a quorum of matching committee signatures before
 * anything is written for it.
 */
export class ReconciliationEngine {
  private readonly store: DocumentStore;
  private readonly committee: Committee;
  private readonly channel: CommitteeChannel;
  private readonly voteTimeoutMs: number;
  private readonly now: () => number;
  private readonly overdraftPolicy: OverdraftPolicy;
  private readonly log: Logger;
  private lastRound: number | undefined;
  private inRound = false;

  constructor(opts: ReconciliationEngineOptions) {
    this.store = opts.store;
    this.committee = opts.committee;
    this.channel = opts.channel;
    this.voteTimeoutMs = opts.voteTimeoutMs ?? 1000;
    if (!Number.isFinite(this.voteTimeoutMs) || this.voteTimeoutMs <= 0) {
      throw new Error(`invalid voteTimeoutMs: ${this.voteTimeoutMs}`);
    }
    this.now = opts.now ?? Date.now;
    this.overdraftPolicy = opts.overdraftPolicy ?? rejectOverdrafts;
    this.lastRound = opts.startRound;
    this.log = componentLogger(opts.logger, "reconciliation");
    registerLedgerSchemas(this.store);
  }

  get round(): number {
    return this.lastRound ?? this.highestPeriod();
  }

  get running(): boolean {
    return this.inRound;
  }

  private highestPeriod(): number {
    let max = 0;
    for (const ref of this.store.refs(ACCOUNT_NAMESPACE)) {
      max = Math.max(max, readAccount(this.store.read(ref)).escrow_period);
    }
    return max;
  }

  async runRound(): Promise<RoundReport> {
    if (this.inRound) throw new Error("a reconciliation round is already running");
    this.inRound = true;
    try {
      const round = this.round + 1;
      this.lastRound = round;
      return await this.reconcile(round);
    } finally {
      this.inRound = false;
    }
  }

  private async reconcile(round: number): Promise<RoundReport> {
    const started = Date.now();
    const report: RoundReport = {
      round,
      committed: [],
      deferred: [],
      confirmed: [],
      rejected: [],
      carriedOver: [],
      escrow: {},
      overdrafts: {},
    };

    const accounts = new Set(this.store.refs(ACCOUNT_NAMESPACE).map((ref) => ref.id));
    for (const tx of pendingTransactions(this.store)) {
      if (!accounts.has(tx.from) && !report.deferred.includes(tx.from)) {
        this.log.warn({ round, account: tx.from }, "pending transactions from an account this node does not hold");
        report.deferred.push(tx.from);
      }
    }

    for (const account of accounts) {
      const plan = planAdmission(this.store, account, this.overdraftPolicy);
      if (!plan) continue;
      if (!(await this.agree(round, plan))) {
        report.deferred.push(account);
        continue;
      }
      try {
        this.commit(plan);
      } catch (err) {
        this.log.error({ round, account, err: err instanceof Error ? err.message : String(err) }, "commit failed; deferring");
        report.deferred.push(account);
        continue;
      }
      report.committed.push(account);
      report.confirmed.push(...plan.admitted.map((tx) => tx.id));
      for (const tx of plan.rejected) {
        report.rejected.push({ id: tx.id, account, amount: tx.amount, reason: "over-escrow" });
      }
      report.carriedOver.push(...plan.deferred.map((tx) => tx.id));
      if (plan.overdraft > 0) report.overdrafts[account] = plan.overdraft;
    }

    if (report.committed.length > 0) {
      this.store.transaction((t) => {
        for (const account of report.committed) {
          t.mutate(accountRef(account), (view) => {
            const current = readAccount(view);
            const escrow = escrowFor(current.confirmed_balance, current.reputation_tier);
            report.escrow[account] = escrow;
            return { ...view, local_escrow: escrow, escrow_allocated: escrow, escrow_period: round };
          });
        }
      });
    }

    report.deferred.sort();
    this.log.info(
      {
        round,
        committed: report.committed.length,
        deferred: report.deferred.length,
        confirmed: report.confirmed.length,
        rejected: report.rejected.length,
        ms: Date.now() - started,
      },
      "reconciliation round finished",
    );
    return report;
  }

  private async agree(round: number, plan: AdmissionPlan): Promise<boolean> {
    const proposal = toProposal(round, plan);
    const digest = proposalDigest(proposal);
    const votes = await this.channel.requestVotes(proposal, { timeoutMs: this.voteTimeoutMs });
    const matching = this.committee.countMatching(votes, digest);
    if (matching >= this.committee.quorum) return true;
    const err = new QuorumNotReachedError(plan.account, round, matching, this.committee.quorum);
    this.log.warn({ round, account: plan.account, votes: matching, quorum: this.committee.quorum }, err.message);
    return false;
  }

  /** One store transaction per account: either all of its outcomes land or none. */
  private commit(plan: AdmissionPlan): void {
    const confirmedAt = this.now();
    this.store.transaction((t) => {
      for (const { id } of plan.admitted) {
        const tx = assertPending(t, id);
        t.mutate(accountRef(tx.from), (view) => ({
          ...view,
          confirmed_balance: readAccount(view).confirmed_balance - tx.amount,
        }));
        t.mutate(accountRef(tx.to), (view) => {
          const recipient = readAccount(view);
          return {
            ...view,
            confirmed_balance: recipient.confirmed_balance + tx.amount,
            pending_credits: recipient.pending_credits - tx.amount,
          };
        });
        t.mutate(transactionRef(id), (view) => ({ ...view, status: "Confirmed", confirmed_at: confirmedAt }));
      }
      for (const { id } of plan.rejected) {
        const tx = assertPending(t, id);
        t.mutate(accountRef(tx.to), (view) => ({
          ...view,
          pending_credits: readAccount(view).pending_credits - tx.amount,
        }));
        t.mutate(transactionRef(id), (view) => ({ ...view, status: "Rejected", rejection_reason: "over-escrow" }));
      }
    });
  }
}
