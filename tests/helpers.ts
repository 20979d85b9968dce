/**
 * Shared fixtures: a kernel on a manual clock with three funded agents, a
 * scripted code sandbox and a fixed scoring oracle.
 */

import { KernelConfigOverrides, resolveKernelConfig } from '../src/config';
import { Artifact, JsonValue } from '../src/domain/artifact';
import { ManualClock } from '../src/domain/clock';
import { errorMessage } from '../src/domain/errors';
import { parseIntent } from '../src/domain/intents';
import { MintTask } from '../src/domain/mint';
import { ActionResult } from '../src/domain/results';
import { CodeSandbox, SandboxRequest, SandboxResponse } from '../src/engine/sandbox';
import { setLogHandler } from '../src/logger';
import { Kernel, createKernel } from '../src/runtime';
import { ScoringOracle } from '../src/services/mint-scorer';

/** 2026-01-01T00:00:00.000Z */
export const T0 = Date.UTC(2026, 0, 1);

export const AGENTS = ['alice', 'bob', 'carol'];

export type ProgramMethod = (args: JsonValue[], request: SandboxRequest) => JsonValue | Promise<JsonValue>;

/** Runs "programs" registered by code string. */
export class ScriptedSandbox implements CodeSandbox {
  readonly calls: SandboxRequest[] = [];
  private programs = new Map<string, Record<string, ProgramMethod>>();

  define(code: string, methods: Record<string, ProgramMethod>): void {
    this.programs.set(code, methods);
  }

  async execute(request: SandboxRequest): Promise<SandboxResponse> {
    this.calls.push(request);
    const program = this.programs.get(request.artifact.code ?? '');
    if (!program) return { success: false, error: `No program for ${request.artifact.id}` };
    const method = Object.prototype.hasOwnProperty.call(program, request.method) ? program[request.method] : undefined;
    if (!method) return { success: false, error: `No method ${request.method}`, code: 'method_not_found' };
    try {
      return { success: true, result: await method(request.args, request) };
    } catch (error) {
      return { success: false, error: errorMessage(error) };
    }
  }
}

export class FixedOracle implements ScoringOracle {
  readonly scored: string[] = [];

  constructor(private scores: Record<string, number> = {}) {}

  async score(artifact: Artifact): Promise<{ score: number }> {
    this.scored.push(artifact.id);
    return { score: this.scores[artifact.id] ?? 0 };
  }
}

export interface TestKernel {
  kernel: Kernel;
  clock: ManualClock;
  sandbox: ScriptedSandbox;
  oracle: ScoringOracle;
}

export interface TestKernelOptions {
  scores?: Record<string, number>;
  /** Replaces the fixed oracle built from `scores`. */
  oracle?: ScoringOracle;
  tasks?: MintTask[];
}

export async function createTestKernel(
  overrides: KernelConfigOverrides = {},
  options: TestKernelOptions = {},
): Promise<TestKernel> {
  setLogHandler(() => undefined);
  const clock = new ManualClock(T0);
  const sandbox = new ScriptedSandbox();
  const oracle = options.oracle ?? new FixedOracle(options.scores);
  const kernel = await createKernel(resolveKernelConfig({ principals: AGENTS, ...overrides }), {
    clock,
    sandbox,
    oracle,
    tasks: options.tasks ?? [],
  });
  return { kernel, clock, sandbox, oracle };
}

/** Parse a wire intent for `principalId` and execute it. */
export async function act(kernel: Kernel, principalId: string, wire: Record<string, unknown>): Promise<ActionResult> {
  const parsed = parseIntent(wire, principalId);
  if (!parsed.ok) throw new Error(`Bad test intent: ${parsed.error.message}`);
  return kernel.execute(parsed.value);
}

export function writeIntent(artifactId: string, fields: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    action_type: 'write_artifact',
    artifact_id: artifactId,
    content: `content of ${artifactId}`,
    access_contract_id: 'kernel_contract_freeware',
    ...fields,
  };
}

export async function balances(kernel: Kernel): Promise<Record<string, number>> {
  const out: Record<string, number> = {};
  for (const principal of await kernel.context.ledger.listPrincipals()) out[principal.id] = principal.scrip;
  return out;
}
