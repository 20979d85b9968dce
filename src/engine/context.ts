/**
 * Kernel context.
 *
 * The explicit bundle of collaborators every kernel component receives.
 * There are no module-level singletons: two kernels in one process share
 * nothing.
 */

import { KernelConfig } from '../config';
import { Clock } from '../domain/clock';
import { Result } from '../domain/errors';
import { EscrowListing } from '../domain/escrow';
import { AuctionStatus, MintResult, MintSubmission, MintSubmissionView, MintTaskView } from '../domain/mint';
import { JsonValue } from '../domain/artifact';
import { Ledger } from '../ledger/ledger';
import { PermissionChecker } from '../contracts/permission-checker';
import { EventPublisher } from '../data-plane/publisher';
import { Store } from '../storage/store';
import { Logger } from '../logger';
import { DelegationManager } from './delegation';
import { ScripHolds } from './holds';
import { CodeSandbox } from './sandbox';
import { ServiceRegistry } from './service-registry';
import type { KernelActions } from '../kernel/kernel-actions';

/** The mint auction as seen by the facades. */
export interface MintGateway {
  readonly serviceId: string;
  /** Escrow the bid through `bidder`, a facade acting for the bidder. */
  submit(bidder: KernelActions, principalId: string, artifactId: string, bid: number): Promise<Result<MintSubmission>>;
  cancel(principalId: string, submissionId: string): Promise<Result<MintSubmission>>;
  submissions(): MintSubmissionView[];
  history(limit?: number): MintResult[];
  status(): AuctionStatus;
}

export interface EscrowGateway {
  readonly serviceId: string;
  listings(activeOnly: boolean): EscrowListing[];
}

export interface TaskGateway {
  submit(principalId: string, artifactId: string, taskId: string): Promise<Result<Record<string, JsonValue>>>;
  tasks(includeCompleted: boolean): MintTaskView[];
}

/** Protocols attached after construction; they are built on the facades themselves. */
export interface ProtocolSlots {
  mint?: MintGateway;
  escrow?: EscrowGateway;
  tasks?: TaskGateway;
}

export interface KernelContext {
  config: KernelConfig;
  store: Store;
  ledger: Ledger;
  permissions: PermissionChecker;
  delegation: DelegationManager;
  registry: ServiceRegistry;
  sandbox: CodeSandbox;
  publisher: EventPublisher;
  holds: ScripHolds;
  clock: Clock;
  logger: Logger;
  protocols: ProtocolSlots;
}
