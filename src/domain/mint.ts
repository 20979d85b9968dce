/**
 * Mint domain model: auction submissions, resolutions and mint tasks.
 */

import { JsonValue } from './artifact';

export enum AuctionPhase {
  Waiting = 'waiting',
  Bidding = 'bidding',
  Resolving = 'resolving',
}

/** Valid auction phase transitions. Resolving loops back to bidding for the next period. */
export const VALID_AUCTION_TRANSITIONS: Record<AuctionPhase, AuctionPhase[]> = {
  [AuctionPhase.Waiting]: [AuctionPhase.Bidding],
  [AuctionPhase.Bidding]: [AuctionPhase.Resolving],
  [AuctionPhase.Resolving]: [AuctionPhase.Bidding],
};

export type TieBreak = 'earliest' | 'random';

/** A sealed bid. The bid amount is held by the mint while the submission is pending. */
export interface MintSubmission {
  submissionId: string;
  principalId: string;
  artifactId: string;
  bid: number;
  /** Monotonic submission order, used for the earliest tie-break. */
  sequence: number;
  submittedAt: string;
}

/** Public view of a pending submission. Bids stay sealed. */
export interface MintSubmissionView {
  submissionId: string;
  principalId: string;
  artifactId: string;
  submittedAt: string;
}

export interface MintResult {
  round: number;
  resolvedAt: string;
  noBids: boolean;
  winnerId?: string;
  artifactId?: string;
  winningBid?: number;
  pricePaid?: number;
  score?: number;
  scripMinted?: number;
  duplicate?: boolean;
  scoreError?: string;
  ubiDistributed?: number;
  refunds?: Record<string, number>;
}

export interface AuctionStatus {
  phase: AuctionPhase;
  round: number;
  roundStart: number | null;
  biddingEndsAt: number | null;
  nextRoundAt: number | null;
  pendingSubmissions: number;
}

export enum MintTaskStatus {
  Open = 'open',
  Completed = 'completed',
}

/** Test case run against a solution artifact: call `method(args)` and compare. */
export interface MintTaskTest {
  name: string;
  method: string;
  args: JsonValue[];
  expected: JsonValue;
}

export interface MintTask {
  taskId: string;
  description: string;
  reward: number;
  publicTests: MintTaskTest[];
  hiddenTests: MintTaskTest[];
  status: MintTaskStatus;
  solvedBy?: string;
  solvedAt?: string;
  solutionArtifactId?: string;
}

/** Public view of a task. Hidden tests are reduced to a count. */
export interface MintTaskView {
  taskId: string;
  description: string;
  reward: number;
  publicTests: MintTaskTest[];
  hiddenTestCount: number;
  status: MintTaskStatus;
  solvedBy?: string;
}

export function toMintTaskView(task: MintTask): MintTaskView {
  const view: MintTaskView = {
    taskId: task.taskId,
    description: task.description,
    reward: task.reward,
    publicTests: task.publicTests,
    hiddenTestCount: task.hiddenTests.length,
    status: task.status,
  };
  if (task.solvedBy) view.solvedBy = task.solvedBy;
  return view;
}
