import {
  isTerminalListingStatus,
  transitionAuctionPhase,
  transitionListingStatus,
} from '../../src/engine/state-machine';
import { AuctionPhase } from '../../src/domain/mint';
import { ListingStatus } from '../../src/domain/escrow';

describe('Auction phase state machine', () => {
  test('valid transition: waiting -> bidding', () => {
    const result = transitionAuctionPhase(AuctionPhase.Waiting, AuctionPhase.Bidding);
    expect(result.success).toBe(true);
    expect(result.newStatus).toBe(AuctionPhase.Bidding);
  });

  test('valid transition: bidding -> resolving -> bidding', () => {
    expect(transitionAuctionPhase(AuctionPhase.Bidding, AuctionPhase.Resolving).success).toBe(true);
    expect(transitionAuctionPhase(AuctionPhase.Resolving, AuctionPhase.Bidding).success).toBe(true);
  });

  test('invalid transition: waiting -> resolving', () => {
    const result = transitionAuctionPhase(AuctionPhase.Waiting, AuctionPhase.Resolving);
    expect(result.success).toBe(false);
    expect(result.error?.code).toBe('invalid_argument');
    expect(result.error?.details).toEqual({
      current: AuctionPhase.Waiting,
      target: AuctionPhase.Resolving,
      validTargets: [AuctionPhase.Bidding],
    });
  });

  test('invalid transition: bidding -> waiting', () => {
    expect(transitionAuctionPhase(AuctionPhase.Bidding, AuctionPhase.Waiting).success).toBe(false);
  });
});

describe('Escrow listing state machine', () => {
  test('valid transitions out of active', () => {
    expect(transitionListingStatus(ListingStatus.Active, ListingStatus.Completed).newStatus).toBe(ListingStatus.Completed);
    expect(transitionListingStatus(ListingStatus.Active, ListingStatus.Cancelled).newStatus).toBe(ListingStatus.Cancelled);
  });

  test('invalid transition: completed -> cancelled', () => {
    const result = transitionListingStatus(ListingStatus.Completed, ListingStatus.Cancelled);
    expect(result.success).toBe(false);
    expect(result.error?.message).toBe('Listing is completed; cannot move to cancelled');
  });

  test('terminal status detection', () => {
    expect(isTerminalListingStatus(ListingStatus.Completed)).toBe(true);
    expect(isTerminalListingStatus(ListingStatus.Cancelled)).toBe(true);
    expect(isTerminalListingStatus(ListingStatus.Active)).toBe(false);
  });
});
