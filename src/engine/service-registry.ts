/**
 * Genesis service registry.
 *
 * Genesis services are executable artifacts whose methods are implemented in
 * the kernel process instead of the sandbox. Each service declares a closed
 * set of methods; invocation goes through the same pipeline as user code and
 * handlers reach state only through the facades in their InvocationContext.
 */

import { ArtifactInterface, JsonValue } from '../domain/artifact';
import { Result } from '../domain/errors';
import type { KernelActions } from '../kernel/kernel-actions';
import type { KernelState } from '../kernel/kernel-state';

export interface InvocationContext {
  /** Verified principal that invoked the service. */
  invokerId: string;
  serviceId: string;
  state: KernelState;
  /** Accepts only the invoker or the service itself as caller. */
  actions: KernelActions;
}

export interface ServiceMethod {
  description: string;
  /** Scrip charged to the payer per call. */
  cost: number;
  args?: Record<string, JsonValue>;
  handler(args: JsonValue[], ctx: InvocationContext): Promise<Result<JsonValue>>;
}

export interface KernelService<M extends string = string> {
  id: string;
  description: string;
  methods: Record<M, ServiceMethod>;
}

export class ServiceRegistry {
  private services = new Map<string, KernelService>();

  register(service: KernelService): void {
    if (this.services.has(service.id)) {
      throw new Error(`Service already registered: ${service.id}`);
    }
    this.services.set(service.id, service);
  }

  get(id: string): KernelService | undefined {
    return this.services.get(id);
  }

  has(id: string): boolean {
    return this.services.has(id);
  }

  ids(): string[] {
    return [...this.services.keys()].sort();
  }

  /** Look up a method by name. Inherited object properties never match. */
  method(service: KernelService, name: string): ServiceMethod | undefined {
    return Object.prototype.hasOwnProperty.call(service.methods, name) ? service.methods[name] : undefined;
  }

  /** Discoverability description stored on the service's artifact. */
  describe(service: KernelService): ArtifactInterface {
    return {
      description: service.description,
      methods: Object.entries(service.methods).map(([name, method]) => {
        const entry: ArtifactInterface['methods'][number] = {
          name,
          description: method.description,
          cost: method.cost,
        };
        if (method.args) entry.args = method.args;
        return entry;
      }),
    };
  }
}

// --- Argument readers shared by services ---

export function argString(args: JsonValue[], index: number): string | undefined {
  const value = args[index];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

export function argPositiveInteger(args: JsonValue[], index: number): number | undefined {
  const value = args[index];
  return typeof value === 'number' && Number.isInteger(value) && value > 0 ? value : undefined;
}

export function argPositiveNumber(args: JsonValue[], index: number): number | undefined {
  const value = args[index];
  return typeof value === 'number' && Number.isFinite(value) && value > 0 ? value : undefined;
}
