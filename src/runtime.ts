/**
 * Kernel runtime: wires the context, executor and genesis services.
 *
 * Genesis principals start with the configured scrip, quotas and LLM budget
 * plus a self-owned agent artifact holding their working configuration.
 * Each genesis service gets its own principal and a kernel-protected
 * executable artifact whose `interface` lists its methods.
 */

import { KernelConfig, resolveKernelConfig } from './config';
import {
  ARTIFACT_TYPE_AGENT,
  Artifact,
  META_AUTHORIZED_PRINCIPAL,
  META_AUTHORIZED_WRITER,
  toJsonValue,
} from './domain/artifact';
import { Clock, isoAt, systemClock } from './domain/clock';
import { KernelContractId } from './domain/contracts';
import { KernelException, errorMessage } from './domain/errors';
import { ActionIntent } from './domain/intents';
import { MintResult, MintTask } from './domain/mint';
import { PrincipalSnapshot, RESOURCE_LLM_BUDGET, snapshotPrincipal } from './domain/principal';
import { ActionResult } from './domain/results';
import { PermissionChecker } from './contracts/permission-checker';
import { JsonlFileSink } from './data-plane/jsonl-sink';
import { EventPublisher } from './data-plane/publisher';
import { CONFIG_CONTEXT_SECTIONS, CONFIG_SECTION_PRIORITIES, CONFIG_SUBSCRIBED_ARTIFACTS } from './engine/agent-config';
import { KernelContext } from './engine/context';
import { DelegationManager } from './engine/delegation';
import { ActionExecutor } from './engine/executor';
import { ScripHolds } from './engine/holds';
import { CodeSandbox, UnconfiguredSandbox } from './engine/sandbox';
import { KernelService, ServiceRegistry } from './engine/service-registry';
import { Ledger } from './ledger/ledger';
import { Logger, logger as rootLogger } from './logger';
import { EscrowService, createEscrowService } from './services/escrow';
import { createLedgerService } from './services/ledger-service';
import { MINT_SERVICE_ID, MintAuction, createMintService } from './services/mint-auction';
import { MintScorer, ScoringOracle, UnconfiguredOracle } from './services/mint-scorer';
import { MintTaskBoard, loadMintTasks } from './services/mint-tasks';
import { createMemoryStore } from './storage/memory-store';
import { Store } from './storage/store';

export interface KernelOptions {
  sandbox?: CodeSandbox;
  oracle?: ScoringOracle;
  clock?: Clock;
  store?: Store;
  /** Mint tasks. Loaded from `config.mintTasksPath` when absent. */
  tasks?: MintTask[];
  logger?: Logger;
}

export interface TickReport {
  tick: number;
  /** Present when this tick resolved an auction round. */
  resolution?: MintResult;
}

export class Kernel {
  readonly executor: ActionExecutor;
  readonly auction: MintAuction;
  readonly escrow: EscrowService;
  readonly tasks: MintTaskBoard;
  private services: KernelService[];
  private tickCount = 0;
  private timer: NodeJS.Timeout | null = null;
  private log: Logger;

  constructor(
    readonly context: KernelContext,
    oracle: ScoringOracle,
    tasks: MintTask[],
  ) {
    this.log = context.logger.child({ component: 'kernel' });
    this.executor = new ActionExecutor(context);

    const scorer = new MintScorer(oracle, context.config.auction.scoringTimeoutMs, context.logger);
    this.auction = new MintAuction({
      config: context.config.auction,
      ledger: context.ledger,
      artifacts: context.store.artifacts,
      publisher: context.publisher,
      clock: context.clock,
      logger: context.logger,
      actions: this.executor.actions.scoped([MINT_SERVICE_ID]),
      scorer,
      ubiExclusions: () => this.services.map((s) => s.id),
      startedAt: context.clock.now(),
    });
    this.escrow = new EscrowService(context.publisher, context.clock, context.logger);
    this.tasks = new MintTaskBoard(
      {
        artifacts: context.store.artifacts,
        ledger: context.ledger,
        sandbox: context.sandbox,
        publisher: context.publisher,
        clock: context.clock,
        logger: context.logger,
        timeoutMs: context.config.invocationTimeoutMs,
      },
      tasks,
    );
    context.protocols.mint = this.auction;
    context.protocols.escrow = this.escrow;
    context.protocols.tasks = this.tasks;

    this.services = [createLedgerService(), createMintService(this.auction), createEscrowService(this.escrow)];
  }

  get config(): KernelConfig {
    return this.context.config;
  }

  /** Create genesis principals and service artifacts. Call once. */
  async bootstrap(): Promise<void> {
    const { config, ledger, registry, store } = this.context;
    for (const service of this.services) {
      registry.register(service);
      const created = await ledger.createPrincipal({ id: service.id, scrip: 0 });
      if (!created.ok) throw new KernelException(created.error);
      await store.artifacts.put(this.serviceArtifact(service));
    }

    for (const principalId of config.principals) {
      const resources: Record<string, number> = {};
      if (config.startingLlmBudget > 0) resources[RESOURCE_LLM_BUDGET] = config.startingLlmBudget;
      const created = await ledger.createPrincipal({
        id: principalId,
        scrip: config.startingScrip,
        quotas: config.defaultQuotas,
        resources,
      });
      if (!created.ok) throw new KernelException(created.error);
      await store.artifacts.put(this.agentArtifact(principalId));
    }
    this.log.info('Kernel bootstrapped', { principals: config.principals.length, services: registry.ids() });
  }

  execute(intent: ActionIntent): Promise<ActionResult> {
    return this.executor.execute(intent);
  }

  /**
   * Advance the auction to `now` and publish a snapshot of every principal.
   * Scoring runs between two locked steps so intents keep flowing while the
   * oracle works.
   */
  async tick(now: number = this.context.clock.now()): Promise<TickReport> {
    const report: TickReport = { tick: ++this.tickCount };
    const closed = await this.executor.withLock(() => this.auction.close(now));
    if (closed) {
      const outcome = await this.auction.score(closed);
      report.resolution = await this.executor.withLock(() => this.auction.settle(closed, outcome, now));
    }

    await this.executor.withLock(async () => {
      const principals: Record<string, PrincipalSnapshot> = {};
      for (const principal of await this.context.ledger.listPrincipals()) {
        principals[principal.id] = snapshotPrincipal(principal);
      }
      await this.context.publisher.publish('tick', {
        tick: report.tick,
        auction_phase: this.auction.status().phase,
        principals: toJsonValue(principals),
      });
    });
    return report;
  }

  /** Tick on a timer until `close`. */
  startTicking(intervalMs: number): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      this.tick().catch((error: unknown) => {
        this.log.error('Tick failed', { error: errorMessage(error) });
      });
    }, intervalMs);
    this.timer.unref();
  }

  async close(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    await this.executor.withLock(() => this.context.publisher.close());
  }

  private serviceArtifact(service: KernelService): Artifact {
    const now = isoAt(this.context.clock);
    return {
      id: service.id,
      type: 'genesis_service',
      content: service.description,
      executable: true,
      createdBy: service.id,
      accessContractId: KernelContractId.Freeware,
      metadata: { [META_AUTHORIZED_WRITER]: service.id },
      price: 0,
      readPrice: 0,
      hasStanding: true,
      kernelProtected: true,
      deleted: false,
      createdAt: now,
      updatedAt: now,
      interface: this.context.registry.describe(service),
    };
  }

  private agentArtifact(principalId: string): Artifact {
    const now = isoAt(this.context.clock);
    const config = {
      [CONFIG_SUBSCRIBED_ARTIFACTS]: [],
      [CONFIG_CONTEXT_SECTIONS]: {},
      [CONFIG_SECTION_PRIORITIES]: {},
    };
    return {
      id: principalId,
      type: ARTIFACT_TYPE_AGENT,
      content: JSON.stringify(config, null, 2),
      executable: false,
      createdBy: principalId,
      accessContractId: KernelContractId.SelfOwned,
      metadata: { [META_AUTHORIZED_WRITER]: principalId, [META_AUTHORIZED_PRINCIPAL]: principalId },
      price: 0,
      readPrice: 0,
      hasStanding: true,
      kernelProtected: false,
      deleted: false,
      createdAt: now,
      updatedAt: now,
    };
  }
}

/** Build and bootstrap a kernel. */
export async function createKernel(config: KernelConfig = resolveKernelConfig(), options: KernelOptions = {}): Promise<Kernel> {
  const clock = options.clock ?? systemClock;
  const log = options.logger ?? rootLogger;
  const store = options.store ?? createMemoryStore();
  const sandbox = options.sandbox ?? new UnconfiguredSandbox();
  const sinks = config.eventLogPath ? [new JsonlFileSink(config.eventLogPath)] : [];
  const tasks = options.tasks ?? (config.mintTasksPath ? loadMintTasks(config.mintTasksPath) : []);

  const context: KernelContext = {
    config,
    store,
    ledger: new Ledger(store.principals, { allowNegativeScrip: config.allowNegativeScrip }, clock, log),
    permissions: new PermissionChecker(
      store.artifacts,
      sandbox,
      { contractTimeoutMs: config.invocationTimeoutMs },
      clock,
      log,
    ),
    delegation: new DelegationManager(store.artifacts, { maxHistory: config.delegationMaxHistory }, clock, log),
    registry: new ServiceRegistry(),
    sandbox,
    publisher: new EventPublisher(store, clock, sinks, log),
    holds: new ScripHolds(),
    clock,
    logger: log,
    protocols: {},
  };

  const kernel = new Kernel(context, options.oracle ?? new UnconfiguredOracle(), tasks);
  await kernel.bootstrap();
  return kernel;
}
