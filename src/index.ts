/**
 * Scrip Kernel: resource-metered execution kernel for multi-agent worlds.
 *
 * Agents act only through intents. The kernel owns artifacts, access
 * contracts, the scrip ledger, resource quotas, the mint auction and escrow,
 * and records everything in an append-only event log.
 *
 * Run directly to serve the HTTP API; import for programmatic use.
 */

import { createApp } from './server';
import { createKernel } from './runtime';
import { loadConfigFromEnv, resolveKernelConfig, validateKernelConfig } from './config';
import { errorMessage } from './domain/errors';
import { logger, setLogLevel } from './logger';

async function main(): Promise<void> {
  const config = resolveKernelConfig(loadConfigFromEnv(process.env));
  setLogLevel(config.logLevel);
  const validation = validateKernelConfig(config);
  for (const warning of validation.warnings) logger.warn('Config warning', { warning });
  if (!validation.valid) {
    throw new Error(`Invalid configuration: ${validation.errors.join('; ')}`);
  }

  const kernel = await createKernel(config);
  const app = createApp(kernel);
  const server = app.listen(config.port, () => {
    logger.info('Kernel listening', { port: config.port, principals: config.principals });
  });
  kernel.startTicking(config.tickIntervalMs);

  const shutdown = () => {
    server.close();
    kernel.close().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error('Shutdown failed', { error: errorMessage(error) });
        process.exit(1);
      },
    );
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

if (require.main === module) {
  main().catch((error: unknown) => {
    logger.error('Kernel failed to start', { error: errorMessage(error) });
    process.exit(1);
  });
}

// Public exports for programmatic use
export { createApp } from './server';
export { Kernel, KernelOptions, TickReport, createKernel } from './runtime';
export * from './config';
export * from './logger';
export * from './domain';
export { Ledger } from './ledger/ledger';
export { Store } from './storage/store';
export { createMemoryStore } from './storage/memory-store';
export { EventPublisher, EventSink } from './data-plane/publisher';
export { JsonlFileSink, readJsonlEvents } from './data-plane/jsonl-sink';
export { ActionExecutor } from './engine/executor';
export { CodeSandbox, SandboxRequest, SandboxResponse, UnconfiguredSandbox } from './engine/sandbox';
export { KernelService, InvocationContext } from './engine/service-registry';
export { KernelState } from './kernel/kernel-state';
export { KernelActions } from './kernel/kernel-actions';
export { ScoringOracle } from './services/mint-scorer';
