/**
 * Auction phase and escrow listing state machines.
 *
 * Enforces valid state transitions, producing kernel errors on invalid ones.
 */

import { AuctionPhase, VALID_AUCTION_TRANSITIONS } from '../domain/mint';
import { ListingStatus, VALID_LISTING_TRANSITIONS } from '../domain/escrow';
import { KernelError, validationError } from '../domain/errors';

/** Result of a state transition attempt. */
export interface TransitionResult<S> {
  success: boolean;
  newStatus?: S;
  error?: KernelError;
}

/** Attempt an auction phase transition. */
export function transitionAuctionPhase(
  current: AuctionPhase,
  target: AuctionPhase,
): TransitionResult<AuctionPhase> {
  const validTargets = VALID_AUCTION_TRANSITIONS[current];
  if (!validTargets.includes(target)) {
    return {
      success: false,
      error: validationError('invalid_argument', `Invalid auction phase transition: ${current} -> ${target}`, {
        current,
        target,
        validTargets,
      }),
    };
  }
  return { success: true, newStatus: target };
}

/** Attempt an escrow listing transition. */
export function transitionListingStatus(
  current: ListingStatus,
  target: ListingStatus,
): TransitionResult<ListingStatus> {
  const validTargets = VALID_LISTING_TRANSITIONS[current];
  if (!validTargets.includes(target)) {
    return {
      success: false,
      error: validationError('invalid_argument', `Listing is ${current}; cannot move to ${target}`, {
        current,
        target,
        validTargets,
      }),
    };
  }
  return { success: true, newStatus: target };
}

export function isTerminalListingStatus(status: ListingStatus): boolean {
  return status === ListingStatus.Completed || status === ListingStatus.Cancelled;
}
