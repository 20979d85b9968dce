/**
 * Escrow listing domain model.
 */

export enum ListingStatus {
  Active = 'active',
  Completed = 'completed',
  Cancelled = 'cancelled',
}

export const VALID_LISTING_TRANSITIONS: Record<ListingStatus, ListingStatus[]> = {
  [ListingStatus.Active]: [ListingStatus.Completed, ListingStatus.Cancelled],
  [ListingStatus.Completed]: [],
  [ListingStatus.Cancelled]: [],
};

export interface EscrowListing {
  artifactId: string;
  sellerId: string;
  price: number;
  /** When set, only this principal may purchase. */
  buyerId?: string;
  status: ListingStatus;
  createdAt: string;
  closedAt?: string;
  purchasedBy?: string;
}
