/** A spend asked for more than the account's local escrow. Nothing was written. */
export class InsufficientEscrowError extends Error {
  readonly code = "INSUFFICIENT_ESCROW";
  readonly recoverable = true;

  constructor(
    readonly account: string,
    readonly amount: number,
    readonly escrow: number,
  ) {
    super(`insufficient escrow on ${account}: requested ${amount}, available ${escrow}`);
    this.name = "InsufficientEscrowError";
  }
}

/** Too few matching committee votes; the account's round is deferred. */
export class QuorumNotReachedError extends Error {
  readonly code = "QUORUM_NOT_REACHED";
  readonly recoverable = true;

  constructor(
    readonly account: string,
    readonly round: number,
    readonly votes: number,
    readonly quorum: number,
  ) {
    super(`quorum not reached for ${account} in round ${round}: ${votes}/${quorum} votes`);
    this.name = "QuorumNotReachedError";
  }
}

export class CommitteeConfigError extends Error {
  readonly code = "COMMITTEE_CONFIG";
  readonly recoverable = false;

  constructor(message: string) {
    super(message);
    this.name = "CommitteeConfigError";
  }
}
