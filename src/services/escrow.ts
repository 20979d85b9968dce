/**
 * Escrow: trustless artifact sales.
 *
 * A seller hands control of an artifact to the escrow principal
 * (`transferOwnership` to `genesis_escrow`), then lists it with a price.
 * A purchase moves the buyer's scrip to the escrow account, hands control
 * to the buyer and pays the seller; if handing over control fails the
 * buyer is refunded and nothing changes hands. The seller is whoever the
 * kernel recorded as `previous_writer` when control moved to escrow.
 */

import {
  JsonValue,
  META_AUTHORIZED_WRITER,
  META_PREVIOUS_WRITER,
  metadataString,
  toJsonValue,
} from '../domain/artifact';
import { Clock, isoAt } from '../domain/clock';
import {
  Result,
  deletedError,
  err,
  notFoundError,
  ok,
  permissionError,
  resourceError,
  systemError,
  validationError,
} from '../domain/errors';
import { EscrowListing, ListingStatus } from '../domain/escrow';
import { EventPublisher } from '../data-plane/publisher';
import { EscrowGateway } from '../engine/context';
import { InvocationContext, KernelService, argPositiveInteger, argString } from '../engine/service-registry';
import { transitionListingStatus } from '../engine/state-machine';
import { Logger } from '../logger';

export const ESCROW_SERVICE_ID = 'genesis_escrow';

type EscrowMethod = 'deposit' | 'purchase' | 'cancel' | 'check' | 'list_active';

export class EscrowService implements EscrowGateway {
  readonly serviceId = ESCROW_SERVICE_ID;
  /** Latest listing per artifact. */
  private byArtifact = new Map<string, EscrowListing>();
  private closed: EscrowListing[] = [];
  private log: Logger;

  constructor(
    private publisher: EventPublisher,
    private clock: Clock,
    log: Logger,
  ) {
    this.log = log.child({ component: 'escrow' });
  }

  listings(activeOnly: boolean): EscrowListing[] {
    const latest = [...this.byArtifact.values()];
    if (activeOnly) return latest.filter((l) => l.status === ListingStatus.Active);
    return [...this.closed, ...latest];
  }

  check(artifactId: string): EscrowListing | null {
    return this.byArtifact.get(artifactId) ?? null;
  }

  async deposit(ctx: InvocationContext, artifactId: string, price: number, buyerId?: string): Promise<Result<EscrowListing>> {
    const sellerId = ctx.invokerId;
    if (this.byArtifact.get(artifactId)?.status === ListingStatus.Active) {
      return err(resourceError('already_listed', `Artifact ${artifactId} is already listed`, { artifactId }));
    }
    const metadata = await ctx.state.getArtifactMetadata(artifactId);
    if (!metadata) return err(notFoundError('Artifact', artifactId));
    if (metadataString(metadata, META_AUTHORIZED_WRITER) !== this.serviceId) {
      return err(
        validationError('invalid_argument', `Transfer control of ${artifactId} to ${this.serviceId} before listing it`, {
          artifactId,
        }),
      );
    }
    if (metadataString(metadata, META_PREVIOUS_WRITER) !== sellerId) {
      return err(permissionError(`${sellerId} did not hand ${artifactId} to escrow`, 'not_owner', { artifactId }));
    }
    if (buyerId === sellerId) {
      return err(validationError('invalid_argument', 'A listing cannot be restricted to its seller'));
    }

    const listing: EscrowListing = {
      artifactId,
      sellerId,
      price,
      status: ListingStatus.Active,
      createdAt: isoAt(this.clock),
    };
    if (buyerId) listing.buyerId = buyerId;
    this.archive(artifactId);
    this.byArtifact.set(artifactId, listing);
    await this.publisher.publish('escrow_listed', {
      artifact_id: artifactId,
      seller_id: sellerId,
      price,
      buyer_id: buyerId,
    });
    this.log.info('Artifact listed', { artifactId, sellerId, price });
    return ok(listing);
  }

  async purchase(ctx: InvocationContext, artifactId: string): Promise<Result<EscrowListing>> {
    const buyerId = ctx.invokerId;
    const listing = this.byArtifact.get(artifactId);
    if (!listing || listing.status !== ListingStatus.Active) {
      return err(notFoundError('Escrow listing', artifactId));
    }
    if (listing.buyerId && listing.buyerId !== buyerId) {
      return err(permissionError(`Listing for ${artifactId} is reserved for another buyer`, 'not_authorized', { artifactId }));
    }
    if (listing.sellerId === buyerId) {
      return err(validationError('invalid_argument', 'Cannot purchase your own listing', { artifactId }));
    }
    const metadata = await ctx.state.getArtifactMetadata(artifactId);
    if (!metadata) return err(deletedError(artifactId));
    if (metadataString(metadata, META_AUTHORIZED_WRITER) !== this.serviceId) {
      return err(systemError(`Escrow no longer controls ${artifactId}`, 'internal_error', { artifactId }));
    }

    const paid = await ctx.actions.transferScrip(buyerId, this.serviceId, listing.price);
    if (!paid.ok) return paid;

    const handed = await ctx.actions.updateArtifactMetadata(this.serviceId, artifactId, META_AUTHORIZED_WRITER, buyerId);
    if (!handed.ok) {
      return this.abort(ctx, listing, buyerId, `Handing ${artifactId} to ${buyerId} failed: ${handed.error.message}`);
    }

    const payout = await ctx.actions.transferScrip(this.serviceId, listing.sellerId, listing.price);
    if (!payout.ok) {
      const reclaimed = await ctx.actions.updateArtifactMetadata(
        this.serviceId,
        artifactId,
        META_AUTHORIZED_WRITER,
        this.serviceId,
      );
      if (!reclaimed.ok) {
        this.log.error('Escrow could not reclaim artifact after failed payout', { artifactId, buyerId });
      }
      return this.abort(ctx, listing, buyerId, `Paying ${listing.sellerId} failed: ${payout.error.message}`);
    }

    const closed = this.close(listing, ListingStatus.Completed);
    if (!closed.ok) return closed;
    closed.value.purchasedBy = buyerId;
    await this.publisher.publish('escrow_purchased', {
      artifact_id: artifactId,
      seller_id: listing.sellerId,
      buyer_id: buyerId,
      price: listing.price,
    });
    this.log.info('Artifact sold', { artifactId, sellerId: listing.sellerId, buyerId, price: listing.price });
    return ok(closed.value);
  }

  async cancel(ctx: InvocationContext, artifactId: string): Promise<Result<EscrowListing>> {
    const listing = this.byArtifact.get(artifactId);
    if (!listing || listing.status !== ListingStatus.Active) {
      return err(notFoundError('Escrow listing', artifactId));
    }
    if (listing.sellerId !== ctx.invokerId) {
      return err(permissionError('Only the seller may cancel a listing', 'not_owner', { artifactId }));
    }
    const returned = await ctx.actions.updateArtifactMetadata(
      this.serviceId,
      artifactId,
      META_AUTHORIZED_WRITER,
      listing.sellerId,
    );
    if (!returned.ok) return returned;
    const closed = this.close(listing, ListingStatus.Cancelled);
    if (!closed.ok) return closed;
    await this.publisher.publish('escrow_cancelled', { artifact_id: artifactId, seller_id: listing.sellerId });
    return ok(closed.value);
  }

  /** Refund the buyer and report a retriable failure. The listing stays active. */
  private async abort(
    ctx: InvocationContext,
    listing: EscrowListing,
    buyerId: string,
    reason: string,
  ): Promise<Result<never>> {
    const refund = await ctx.actions.transferScrip(this.serviceId, buyerId, listing.price);
    if (!refund.ok) {
      this.log.error('Escrow refund failed', { artifactId: listing.artifactId, buyerId, error: refund.error.message });
    }
    this.log.warn('Escrow purchase rolled back', { artifactId: listing.artifactId, buyerId, reason });
    return err(systemError(reason, 'settlement_failed', { artifactId: listing.artifactId, refunded: refund.ok }));
  }

  private close(listing: EscrowListing, status: ListingStatus): Result<EscrowListing> {
    const transition = transitionListingStatus(listing.status, status);
    if (!transition.success || !transition.newStatus) {
      return err(transition.error ?? systemError(`Cannot close listing for ${listing.artifactId}`));
    }
    listing.status = transition.newStatus;
    listing.closedAt = isoAt(this.clock);
    return ok(listing);
  }

  /** Move a finished listing out of the way of a new one. */
  private archive(artifactId: string): void {
    const previous = this.byArtifact.get(artifactId);
    if (previous) this.closed.push(previous);
  }
}

function listingView(listing: EscrowListing | null): JsonValue {
  return toJsonValue(listing);
}

export function createEscrowService(escrow: EscrowService): KernelService<EscrowMethod> {
  return {
    id: ESCROW_SERVICE_ID,
    description: 'Trustless sale of artifact control for scrip',
    methods: {
      deposit: {
        description: 'List an artifact you handed to escrow: [artifact_id, price, buyer_id?]',
        cost: 0,
        args: { artifact_id: 'string', price: 'integer', buyer_id: 'string?' },
        handler: async (args, ctx) => {
          const artifactId = argString(args, 0);
          const price = argPositiveInteger(args, 1);
          if (!artifactId || price === undefined) {
            return err(validationError('invalid_argument', 'deposit takes [artifact_id, price, buyer_id?]'));
          }
          const listed = await escrow.deposit(ctx, artifactId, price, argString(args, 2));
          return listed.ok ? ok(listingView(listed.value)) : listed;
        },
      },
      purchase: {
        description: 'Buy a listed artifact: [artifact_id]',
        cost: 0,
        args: { artifact_id: 'string' },
        handler: async (args, ctx) => {
          const artifactId = argString(args, 0);
          if (!artifactId) return err(validationError('invalid_argument', 'purchase takes [artifact_id]'));
          const bought = await escrow.purchase(ctx, artifactId);
          return bought.ok ? ok(listingView(bought.value)) : bought;
        },
      },
      cancel: {
        description: 'Withdraw your listing and take back control: [artifact_id]',
        cost: 0,
        args: { artifact_id: 'string' },
        handler: async (args, ctx) => {
          const artifactId = argString(args, 0);
          if (!artifactId) return err(validationError('invalid_argument', 'cancel takes [artifact_id]'));
          const cancelled = await escrow.cancel(ctx, artifactId);
          return cancelled.ok ? ok(listingView(cancelled.value)) : cancelled;
        },
      },
      check: {
        description: 'Latest listing for an artifact: [artifact_id]',
        cost: 0,
        args: { artifact_id: 'string' },
        handler: async (args) => {
          const artifactId = argString(args, 0);
          if (!artifactId) return err(validationError('invalid_argument', 'check takes [artifact_id]'));
          return ok(listingView(escrow.check(artifactId)));
        },
      },
      list_active: {
        description: 'All active listings',
        cost: 0,
        handler: async () => ok(toJsonValue(escrow.listings(true))),
      },
    },
  };
}
