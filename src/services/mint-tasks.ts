/**
 * Task-based minting.
 *
 * A task pays a fixed reward to the first principal whose executable
 * artifact passes all of its tests. Public tests run first and their
 * results are reported in full; hidden tests run only once every public
 * test passes and are reported as a count. Tests run in the code sandbox
 * without kernel facades.
 */

import { readFileSync } from 'fs';
import { isDeepStrictEqual } from 'util';
import { JsonValue, artifactController, isJsonValue, isRecord } from '../domain/artifact';
import { Clock, isoAt } from '../domain/clock';
import {
  Result,
  deletedError,
  err,
  notFoundError,
  ok,
  permissionError,
  validationError,
} from '../domain/errors';
import { MintTask, MintTaskStatus, MintTaskTest, MintTaskView, toMintTaskView } from '../domain/mint';
import { EventPublisher } from '../data-plane/publisher';
import { TaskGateway } from '../engine/context';
import { CodeSandbox, runSandboxed } from '../engine/sandbox';
import { Ledger } from '../ledger/ledger';
import { ArtifactStore } from '../storage/store';
import { Logger } from '../logger';

export interface MintTaskDeps {
  artifacts: ArtifactStore;
  ledger: Ledger;
  sandbox: CodeSandbox;
  publisher: EventPublisher;
  clock: Clock;
  logger: Logger;
  timeoutMs: number;
}

interface TestOutcome {
  name: string;
  passed: boolean;
  actual?: JsonValue;
  error?: string;
}

function parseTest(raw: unknown, where: string): MintTaskTest {
  if (!isRecord(raw) || typeof raw.name !== 'string' || typeof raw.method !== 'string') {
    throw new Error(`${where}: a test needs a name and a method`);
  }
  const args = raw.args ?? [];
  if (!Array.isArray(args) || !args.every(isJsonValue)) {
    throw new Error(`${where}.${raw.name}: args must be a JSON array`);
  }
  if (!isJsonValue(raw.expected)) {
    throw new Error(`${where}.${raw.name}: expected must be a JSON value`);
  }
  return { name: raw.name, method: raw.method, args, expected: raw.expected };
}

/** Validate task definitions. Throws on the first malformed entry. */
export function parseMintTasks(raw: unknown): MintTask[] {
  if (!Array.isArray(raw)) throw new Error('Mint tasks must be a JSON array');
  const seen = new Set<string>();
  return raw.map((entry, index) => {
    if (!isRecord(entry) || typeof entry.task_id !== 'string' || entry.task_id === '') {
      throw new Error(`Mint task #${index} needs a task_id`);
    }
    const taskId = entry.task_id;
    if (seen.has(taskId)) throw new Error(`Duplicate mint task id: ${taskId}`);
    seen.add(taskId);
    if (typeof entry.reward !== 'number' || !Number.isInteger(entry.reward) || entry.reward <= 0) {
      throw new Error(`Mint task ${taskId}: reward must be a positive integer`);
    }
    const publicTests = entry.public_tests ?? [];
    const hiddenTests = entry.hidden_tests ?? [];
    if (!Array.isArray(publicTests) || !Array.isArray(hiddenTests)) {
      throw new Error(`Mint task ${taskId}: public_tests and hidden_tests must be arrays`);
    }
    if (publicTests.length + hiddenTests.length === 0) {
      throw new Error(`Mint task ${taskId} has no tests`);
    }
    return {
      taskId,
      description: typeof entry.description === 'string' ? entry.description : '',
      reward: entry.reward,
      publicTests: publicTests.map((t) => parseTest(t, taskId)),
      hiddenTests: hiddenTests.map((t) => parseTest(t, taskId)),
      status: MintTaskStatus.Open,
    };
  });
}

export function loadMintTasks(filePath: string): MintTask[] {
  const parsed: unknown = JSON.parse(readFileSync(filePath, 'utf8'));
  return parseMintTasks(parsed);
}

export class MintTaskBoard implements TaskGateway {
  private board = new Map<string, MintTask>();
  private log: Logger;

  constructor(
    private deps: MintTaskDeps,
    tasks: MintTask[] = [],
  ) {
    this.log = deps.logger.child({ component: 'mint-tasks' });
    for (const task of tasks) this.board.set(task.taskId, { ...task });
  }

  tasks(includeCompleted: boolean): MintTaskView[] {
    return [...this.board.values()]
      .filter((task) => includeCompleted || task.status === MintTaskStatus.Open)
      .map(toMintTaskView);
  }

  async submit(principalId: string, artifactId: string, taskId: string): Promise<Result<Record<string, JsonValue>>> {
    const task = this.board.get(taskId);
    if (!task) return err(notFoundError('Mint task', taskId));
    if (task.status !== MintTaskStatus.Open) {
      return err(
        validationError('invalid_argument', `Task ${taskId} was already solved by ${task.solvedBy ?? 'someone else'}`, {
          taskId,
        }),
      );
    }
    const artifact = await this.deps.artifacts.get(artifactId);
    if (!artifact) return err(notFoundError('Artifact', artifactId));
    if (artifact.deleted) return err(deletedError(artifactId));
    if (!artifact.executable) {
      return err(validationError('not_executable', `Artifact ${artifactId} is not executable`, { artifactId }));
    }
    if (artifactController(artifact) !== principalId) {
      return err(permissionError(`Only the controller of ${artifactId} may submit it`, 'not_owner', { artifactId }));
    }

    const run = async (test: MintTaskTest): Promise<TestOutcome> => {
      const outcome = await runSandboxed(this.deps.sandbox, {
        artifact,
        method: test.method,
        args: test.args,
        callerId: principalId,
        timeoutMs: this.deps.timeoutMs,
      });
      if (!outcome.ok) return { name: test.name, passed: false, error: outcome.error.message };
      return { name: test.name, passed: isDeepStrictEqual(outcome.value, test.expected), actual: outcome.value };
    };

    const publicResults: TestOutcome[] = [];
    for (const test of task.publicTests) publicResults.push(await run(test));
    const publicPassed = publicResults.filter((r) => r.passed).length;

    let hiddenPassed = 0;
    if (publicPassed === task.publicTests.length) {
      for (const test of task.hiddenTests) {
        if ((await run(test)).passed) hiddenPassed += 1;
      }
    }
    const passed = publicPassed === task.publicTests.length && hiddenPassed === task.hiddenTests.length;

    const report: Record<string, JsonValue> = {
      task_id: taskId,
      artifact_id: artifactId,
      passed,
      public_passed: publicPassed,
      public_total: task.publicTests.length,
      public_results: publicResults.map((r) => {
        const entry: Record<string, JsonValue> = { name: r.name, passed: r.passed };
        if (r.actual !== undefined) entry.actual = r.actual;
        if (r.error !== undefined) entry.error = r.error;
        return entry;
      }),
      hidden_passed: hiddenPassed,
      hidden_total: task.hiddenTests.length,
    };
    if (!passed) return ok(report);

    const credited = await this.deps.ledger.creditScrip(principalId, task.reward);
    if (!credited.ok) return credited;
    task.status = MintTaskStatus.Completed;
    task.solvedBy = principalId;
    task.solvedAt = isoAt(this.deps.clock);
    task.solutionArtifactId = artifactId;
    await this.deps.publisher.publish('mint_task_completed', {
      task_id: taskId,
      principal_id: principalId,
      artifact_id: artifactId,
      reward: task.reward,
    });
    this.log.info('Mint task solved', { taskId, principalId, reward: task.reward });
    return ok({ ...report, reward: task.reward });
  }
}
