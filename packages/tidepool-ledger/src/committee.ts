import { bytesToHex } from "@noble/hashes/utils";
import type { DocumentStore, Logger } from "@tidepool/store";
import { componentLogger } from "@tidepool/store";

import type { OverdraftPolicy, Proposal } from "./admission.js";
import { planAdmission, proposalDigest, rejectOverdrafts, toProposal } from "./admission.js";
import { getEd25519PublicKey, randomEd25519SecretKey, signEd25519, verifyEd25519 } from "./ed25519.js";
import { CommitteeConfigError } from "./errors.js";

export type CommitteeMemberInfo = {
  id: string;
  publicKey: Uint8Array;
};

/** A member's signature over the digest of the proposal it computed itself. */
export type Vote = {
  memberId: string;
  round: number;
  account: string;
  digest: Uint8Array;
  signature: Uint8Array;
};

export interface CommitteeVoter {
  readonly id: string;
  /** Resolves null to abstain. */
  vote(proposal: Proposal): Promise<Vote | null>;
}

export interface CommitteeChannel {
  /** Every vote that arrived within `timeoutMs`. */
  requestVotes(proposal: Proposal, opts: { timeoutMs: number }): Promise<Vote[]>;
}

function sameBytes(a: Uint8Array, b: Uint8Array): boolean {
  return a.length === b.length && a.every((byte, i) => byte === b[i]);
}

/** `n ≥ 3f + 1` members tolerating `f` faulty ones; `2f + 1` matching votes commit. */
export class Committee {
  readonly members: ReadonlyMap<string, CommitteeMemberInfo>;
  readonly faults: number;
  readonly quorum: number;

  constructor(members: CommitteeMemberInfo[]) {
    if (members.length < 4) {
      throw new CommitteeConfigError(`a committee needs at least 4 members, got ${members.length}`);
    }
    const byId = new Map<string, CommitteeMemberInfo>();
    const keys = new Set<string>();
    for (const member of members) {
      if (member.id.length === 0) throw new CommitteeConfigError("committee member id must not be empty");
      if (byId.has(member.id)) throw new CommitteeConfigError(`duplicate committee member ${member.id}`);
      if (member.publicKey.length !== 32) {
        throw new CommitteeConfigError(`committee member ${member.id} has a ${member.publicKey.length}-byte public key`);
      }
      const hex = bytesToHex(member.publicKey);
      if (keys.has(hex)) throw new CommitteeConfigError(`committee member ${member.id} reuses another member's key`);
      keys.add(hex);
      byId.set(member.id, { id: member.id, publicKey: member.publicKey.slice() });
    }
    this.members = byId;
    this.faults = Math.floor((members.length - 1) / 3);
    this.quorum = 2 * this.faults + 1;
  }

  get size(): number {
    return this.members.size;
  }

  /** True when `vote` is a valid signature by a member over `digest`. */
  verify(vote: Vote, digest: Uint8Array): boolean {
    const member = this.members.get(vote.memberId);
    if (!member) return false;
    if (!sameBytes(vote.digest, digest)) return false;
    return verifyEd25519(vote.signature, digest, member.publicKey);
  }

  /** Distinct members whose votes match `digest`. */
  countMatching(votes: Vote[], digest: Uint8Array): number {
    const seen = new Set<string>();
    for (const vote of votes) {
      if (seen.has(vote.memberId)) continue;
      if (this.verify(vote, digest)) seen.add(vote.memberId);
    }
    return seen.size;
  }
}

export type CommitteeMemberOptions = {
  id: string;
  /** The member's own view of the ledger. */
  store: DocumentStore;
  secretKey?: Uint8Array;
  /** Must match the coordinator's policy, or this member's digests never match. */
  overdraftPolicy?: OverdraftPolicy;
  logger?: Logger;
};

/**
 * Votes by recomputing admission from its own store, so a coordinator that
 * proposes anything else collects no signature from it.
 */
export class CommitteeMember implements CommitteeVoter {
  readonly id: string;
  readonly publicKey: Uint8Array;
  private readonly store: DocumentStore;
  private readonly secretKey: Uint8Array;
  private readonly overdraftPolicy: OverdraftPolicy;
  private readonly log: Logger;

  constructor(opts: CommitteeMemberOptions) {
    this.id = opts.id;
    this.store = opts.store;
    this.secretKey = opts.secretKey ?? randomEd25519SecretKey();
    this.publicKey = getEd25519PublicKey(this.secretKey);
    this.overdraftPolicy = opts.overdraftPolicy ?? rejectOverdrafts;
    this.log = componentLogger(opts.logger, "committee-member").child({ member: this.id });
  }

  info(): CommitteeMemberInfo {
    return { id: this.id, publicKey: this.publicKey };
  }

  async vote(proposal: Proposal): Promise<Vote | null> {
    const plan = planAdmission(this.store, proposal.account, this.overdraftPolicy);
    if (!plan) {
      this.log.debug({ account: proposal.account }, "abstaining: account unknown here");
      return null;
    }
    const own = toProposal(proposal.round, plan);
    const digest = proposalDigest(own);
    if (!sameBytes(digest, proposalDigest(proposal))) {
      this.log.warn({ account: proposal.account, round: proposal.round }, "proposal differs from local admission");
    }
    return {
      memberId: this.id,
      round: own.round,
      account: own.account,
      digest,
      signature: signEd25519(digest, this.secretKey),
    };
  }
}

export type InProcessCommitteeChannel = CommitteeChannel & {
  /** An unreachable member is treated as one that never answers. */
  setReachable(memberId: string, reachable: boolean): void;
};

export function createInProcessCommitteeChannel(
  voters: CommitteeVoter[],
  opts: { logger?: Logger } = {},
): InProcessCommitteeChannel {
  const log = componentLogger(opts.logger, "committee-channel");
  const unreachable = new Set<string>();

  const ask = (voter: CommitteeVoter, proposal: Proposal, timeoutMs: number): Promise<Vote | null> =>
    new Promise((resolve) => {
      const timer = setTimeout(() => {
        log.debug({ member: voter.id, account: proposal.account }, "vote timed out");
        resolve(null);
      }, timeoutMs);
      void voter.vote(structuredClone(proposal)).then(
        (vote) => {
          clearTimeout(timer);
          resolve(vote);
        },
        (err: unknown) => {
          clearTimeout(timer);
          log.warn({ member: voter.id, err: err instanceof Error ? err.message : String(err) }, "vote failed");
          resolve(null);
        },
      );
    });

  return {
    async requestVotes(proposal, { timeoutMs }) {
      const reachable = voters.filter((voter) => !unreachable.has(voter.id));
      const votes = await Promise.all(reachable.map((voter) => ask(voter, proposal, timeoutMs)));
      return votes.filter((vote): vote is Vote => vote !== null);
    },
    setReachable(memberId, reachable) {
      if (reachable) unreachable.delete(memberId);
      else unreachable.add(memberId);
    },
  };
}
