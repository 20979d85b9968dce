/**
 * Mint auction: sealed-bid, second-price, periodic.
 *
 * Rounds start at `start + firstAuctionDelayMs + k * periodMs`; bids are
 * accepted while the round's window is open. At window end the highest
 * bidder wins and pays the second-highest bid (a lone bidder pays the
 * minimum bid), its artifact is scored by the oracle, and
 * `floor(score / mintRatio)` new scrip is minted to the winner. The price
 * paid is shared out as UBI to everyone except the winner, or returned to
 * the winner when nobody else is eligible.
 *
 * Bids are held in the mint's own principal account from submission until
 * resolution. Resolution is split in three so the oracle call runs outside
 * the dispatch lock: `close` (under the lock) picks the winner, `score`
 * (outside) asks the oracle, `settle` (under the lock) moves the money.
 */

import { v4 as uuid } from 'uuid';
import { Artifact, JsonValue, toJsonValue } from '../domain/artifact';
import { AuctionConfig } from '../config';
import { Clock, isoAt } from '../domain/clock';
import {
  Result,
  err,
  notFoundError,
  ok,
  permissionError,
  validationError,
} from '../domain/errors';
import {
  AuctionPhase,
  AuctionStatus,
  MintResult,
  MintSubmission,
  MintSubmissionView,
} from '../domain/mint';
import { EventPublisher } from '../data-plane/publisher';
import { MintGateway } from '../engine/context';
import { KernelService, argPositiveInteger, argString } from '../engine/service-registry';
import { transitionAuctionPhase } from '../engine/state-machine';
import { Ledger } from '../ledger/ledger';
import { KernelActions } from '../kernel/kernel-actions';
import { ArtifactStore } from '../storage/store';
import { Logger } from '../logger';
import { MintScorer, ScoreOutcome } from './mint-scorer';

export const MINT_SERVICE_ID = 'genesis_mint';

/** A round whose window has closed, with its winner chosen. */
export interface ClosedRound {
  round: number;
  submissions: MintSubmission[];
  winner?: MintSubmission;
  price?: number;
  /** Snapshot of the winning artifact, taken under the lock. */
  artifact?: Artifact;
}

export interface MintAuctionDeps {
  config: AuctionConfig;
  ledger: Ledger;
  artifacts: ArtifactStore;
  publisher: EventPublisher;
  clock: Clock;
  logger: Logger;
  /** Facade acting for the mint's own account. */
  actions: KernelActions;
  scorer: MintScorer;
  /** Principals never paid UBI besides the winner (genesis services). */
  ubiExclusions: () => string[];
  /** Kernel start time; round times are offsets from it. */
  startedAt: number;
}

/** Deterministic PRNG for the random tie-break. */
function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export class MintAuction implements MintGateway {
  readonly serviceId = MINT_SERVICE_ID;
  private phase = AuctionPhase.Waiting;
  private round = 0;
  private roundStart: number | null = null;
  private pending = new Map<string, MintSubmission>();
  private sequence = 0;
  private resolved: MintResult[] = [];
  private random: () => number;
  private log: Logger;

  constructor(private deps: MintAuctionDeps) {
    this.random = seededRandom(deps.config.randomSeed);
    this.log = deps.logger.child({ component: 'mint-auction' });
  }

  // --- Bids ---

  async submit(
    bidder: KernelActions,
    principalId: string,
    artifactId: string,
    bid: number,
  ): Promise<Result<MintSubmission>> {
    const { minimumBid, acceptBidsOutsideWindow } = this.deps.config;
    if (!Number.isInteger(bid) || bid < minimumBid) {
      return err(validationError('invalid_argument', `Bid must be an integer of at least ${minimumBid}`, { bid, minimumBid }));
    }
    if (!acceptBidsOutsideWindow && !this.windowOpen(this.deps.clock.now())) {
      const status = this.status();
      return err(
        validationError('invalid_argument', 'The mint bidding window is closed', {
          phase: status.phase,
          nextRoundAt: status.nextRoundAt,
        }),
      );
    }

    const previous = this.pending.get(principalId);
    const delta = bid - (previous?.bid ?? 0);
    if (delta > 0) {
      const held = await bidder.transferScrip(principalId, this.serviceId, delta);
      if (!held.ok) return held;
    } else if (delta < 0) {
      const refunded = await this.deps.actions.transferScrip(this.serviceId, principalId, -delta);
      if (!refunded.ok) return refunded;
    }

    const submission: MintSubmission = {
      submissionId: `mint_sub_${uuid()}`,
      principalId,
      artifactId,
      bid,
      sequence: ++this.sequence,
      submittedAt: isoAt(this.deps.clock),
    };
    this.pending.set(principalId, submission);
    this.log.info(previous ? 'Mint bid replaced' : 'Mint bid submitted', { principalId, artifactId, bid });
    return ok(submission);
  }

  async cancel(principalId: string, submissionId: string): Promise<Result<MintSubmission>> {
    const submission = [...this.pending.values()].find((s) => s.submissionId === submissionId);
    if (!submission) return err(notFoundError('Mint submission', submissionId));
    if (submission.principalId !== principalId) {
      return err(permissionError(`Submission ${submissionId} belongs to another principal`, 'not_owner'));
    }
    const refunded = await this.deps.actions.transferScrip(this.serviceId, principalId, submission.bid);
    if (!refunded.ok) return refunded;
    this.pending.delete(principalId);
    return ok(submission);
  }

  submissions(): MintSubmissionView[] {
    return [...this.pending.values()]
      .sort((a, b) => a.sequence - b.sequence)
      .map(({ submissionId, principalId, artifactId, submittedAt }) => ({
        submissionId,
        principalId,
        artifactId,
        submittedAt,
      }));
  }

  history(limit?: number): MintResult[] {
    const all = [...this.resolved].reverse();
    return limit !== undefined ? all.slice(0, limit) : all;
  }

  status(): AuctionStatus {
    const { biddingWindowMs, periodMs } = this.deps.config;
    const start = this.roundStart;
    return {
      phase: this.phase,
      round: this.round,
      roundStart: start,
      biddingEndsAt: start === null ? null : start + biddingWindowMs,
      nextRoundAt: start === null ? this.firstRoundAt() : start + periodMs,
      pendingSubmissions: this.pending.size,
    };
  }

  // --- Clock ---

  /**
   * Advance phases to `now`. Returns the round to resolve when a bidding
   * window has just closed. Call under the dispatch lock.
   */
  async close(now: number): Promise<ClosedRound | null> {
    if (this.phase === AuctionPhase.Waiting) {
      if (now < this.firstRoundAt()) return null;
      this.enter(AuctionPhase.Bidding);
      this.round = 1;
      this.roundStart = this.latestPeriodStart(now);
    }
    if (this.phase !== AuctionPhase.Bidding || this.roundStart === null) return null;
    if (now < this.roundStart + this.deps.config.biddingWindowMs) return null;

    this.enter(AuctionPhase.Resolving);
    const submissions = [...this.pending.values()];
    this.pending.clear();
    const closed: ClosedRound = { round: this.round, submissions };
    if (submissions.length === 0) return closed;

    const winner = this.pickWinner(submissions);
    const others = submissions.filter((s) => s !== winner);
    closed.winner = winner;
    closed.price =
      others.length > 0
        ? Math.max(...others.map((s) => s.bid))
        : Math.min(this.deps.config.minimumBid, winner.bid);
    const artifact = await this.deps.artifacts.get(winner.artifactId);
    if (artifact && !artifact.deleted) closed.artifact = artifact;
    return closed;
  }

  /** Ask the oracle. Runs outside the dispatch lock. */
  async score(closed: ClosedRound): Promise<ScoreOutcome | null> {
    if (!closed.winner) return null;
    if (!closed.artifact) {
      return { score: 0, duplicate: false, error: `Artifact ${closed.winner.artifactId} is no longer available` };
    }
    return this.deps.scorer.score(closed.artifact);
  }

  /** Refund, mint, distribute UBI and open the next round. Call under the dispatch lock. */
  async settle(closed: ClosedRound, outcome: ScoreOutcome | null, now: number): Promise<MintResult> {
    const result: MintResult = { round: closed.round, resolvedAt: isoAt(this.deps.clock), noBids: true };
    const { winner, price } = closed;

    if (winner && price !== undefined) {
      result.noBids = false;
      result.winnerId = winner.principalId;
      result.artifactId = winner.artifactId;
      result.winningBid = winner.bid;
      result.pricePaid = price;

      const refunds: Record<string, number> = {};
      for (const submission of closed.submissions) {
        const amount = submission === winner ? winner.bid - price : submission.bid;
        if (amount <= 0) continue;
        const refunded = await this.deps.actions.transferScrip(this.serviceId, submission.principalId, amount);
        if (refunded.ok) refunds[submission.principalId] = amount;
        else this.log.error('Mint refund failed', { principalId: submission.principalId, amount, error: refunded.error.message });
      }
      result.refunds = refunds;

      const score = outcome?.score ?? 0;
      result.score = score;
      if (outcome?.duplicate) result.duplicate = true;
      if (outcome?.error) result.scoreError = outcome.error;
      const minted = Math.floor(score / this.deps.config.mintRatio);
      result.scripMinted = minted;
      if (minted > 0) {
        const credited = await this.deps.ledger.creditScrip(winner.principalId, minted);
        if (!credited.ok) {
          this.log.error('Minting failed', { winnerId: winner.principalId, minted, error: credited.error.message });
          result.scripMinted = 0;
        }
      }

      const exclude = [winner.principalId, ...this.deps.ubiExclusions()];
      const ubi = await this.deps.ledger.distributeUbi(price, exclude, this.serviceId);
      if (ubi.ok) {
        result.ubiDistributed = Object.values(ubi.value).reduce((sum, share) => sum + share, 0);
        if (result.ubiDistributed === 0 && price > 0) await this.returnUnsharedPrice(winner, price, refunds);
      } else {
        this.log.error('UBI distribution failed', { price, error: ubi.error.message });
        result.ubiDistributed = 0;
      }
    }

    this.resolved.push(result);
    this.enter(AuctionPhase.Bidding);
    const previousStart = this.roundStart ?? this.firstRoundAt();
    this.roundStart = Math.max(previousStart + this.deps.config.periodMs, this.latestPeriodStart(now));
    this.round = closed.round + 1;

    await this.deps.publisher.publish('mint_auction_resolved', toEventFields(result));
    this.log.info('Mint auction resolved', {
      round: result.round,
      noBids: result.noBids,
      winnerId: result.winnerId,
      scripMinted: result.scripMinted,
    });
    return result;
  }

  /** Nobody is eligible for UBI: the price goes back to the winner instead of staying with the mint. */
  private async returnUnsharedPrice(
    winner: MintSubmission,
    price: number,
    refunds: Record<string, number>,
  ): Promise<void> {
    const returned = await this.deps.actions.transferScrip(this.serviceId, winner.principalId, price);
    if (!returned.ok) {
      this.log.error('Returning the unshared price failed', {
        winnerId: winner.principalId,
        price,
        error: returned.error.message,
      });
      return;
    }
    refunds[winner.principalId] = (refunds[winner.principalId] ?? 0) + price;
    this.log.warn('No UBI recipients; price returned to the winner', { winnerId: winner.principalId, price });
  }

  private windowOpen(now: number): boolean {
    if (this.phase !== AuctionPhase.Bidding || this.roundStart === null) return false;
    return now >= this.roundStart && now < this.roundStart + this.deps.config.biddingWindowMs;
  }

  private firstRoundAt(): number {
    return this.deps.startedAt + this.deps.config.firstAuctionDelayMs;
  }

  private latestPeriodStart(now: number): number {
    const first = this.firstRoundAt();
    if (now <= first) return first;
    return first + Math.floor((now - first) / this.deps.config.periodMs) * this.deps.config.periodMs;
  }

  private pickWinner(submissions: MintSubmission[]): MintSubmission {
    const top = Math.max(...submissions.map((s) => s.bid));
    const tied = submissions.filter((s) => s.bid === top).sort((a, b) => a.sequence - b.sequence);
    if (tied.length === 1 || this.deps.config.tieBreak === 'earliest') return tied[0];
    return tied[Math.floor(this.random() * tied.length)];
  }

  private enter(target: AuctionPhase): void {
    const transition = transitionAuctionPhase(this.phase, target);
    if (!transition.success || !transition.newStatus) {
      throw new Error(transition.error?.message ?? `Invalid auction transition to ${target}`);
    }
    this.phase = transition.newStatus;
  }
}

function toEventFields(result: MintResult): Record<string, JsonValue | undefined> {
  return {
    round: result.round,
    no_bids: result.noBids,
    winner_id: result.winnerId,
    artifact_id: result.artifactId,
    winning_bid: result.winningBid,
    price_paid: result.pricePaid,
    score: result.score,
    scrip_minted: result.scripMinted,
    duplicate: result.duplicate,
    score_error: result.scoreError,
    ubi_distributed: result.ubiDistributed,
    refunds: result.refunds,
  };
}

/** Genesis service exposing the auction to agents and artifacts. */
export function createMintService(auction: MintAuction): KernelService<'status' | 'submit' | 'cancel' | 'history'> {
  return {
    id: MINT_SERVICE_ID,
    description: 'Sealed-bid second-price auction that mints scrip for valuable artifacts',
    methods: {
      status: {
        description: 'Current phase, round timing and pending submissions',
        cost: 0,
        handler: async (_args, ctx) =>
          ok(toJsonValue({ status: ctx.state.getAuctionStatus(), submissions: ctx.state.getMintSubmissions() })),
      },
      submit: {
        description: 'Bid on minting an artifact you control',
        cost: 0,
        args: { artifact_id: 'string', bid: 'integer' },
        handler: async (args, ctx) => {
          const artifactId = argString(args, 0);
          const bid = argPositiveInteger(args, 1);
          if (!artifactId || bid === undefined) {
            return err(validationError('invalid_argument', 'submit takes [artifact_id, bid]'));
          }
          const submitted = await ctx.actions.submitForMint(ctx.invokerId, artifactId, bid);
          return submitted.ok ? ok({ submission_id: submitted.value.submissionId, bid }) : submitted;
        },
      },
      cancel: {
        description: 'Withdraw a pending bid and get it refunded',
        cost: 0,
        args: { submission_id: 'string' },
        handler: async (args, ctx) => {
          const submissionId = argString(args, 0);
          if (!submissionId) return err(validationError('invalid_argument', 'cancel takes [submission_id]'));
          const cancelled = await ctx.actions.cancelMintSubmission(ctx.invokerId, submissionId);
          return cancelled.ok ? ok({ submission_id: submissionId, refunded: cancelled.value.bid }) : cancelled;
        },
      },
      history: {
        description: 'Resolved rounds, newest first',
        cost: 0,
        args: { limit: 'integer' },
        handler: async (args) => ok(toJsonValue(auction.history(argPositiveInteger(args, 0) ?? 10))),
      },
    },
  };
}
