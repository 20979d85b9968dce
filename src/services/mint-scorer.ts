/**
 * Mint scoring.
 *
 * Wraps the external scoring oracle with duplicate detection and a time
 * limit. Content already scored once (after trimming and lowercasing) scores
 * 0 and is marked duplicate without calling the oracle.
 */

import { createHash } from 'crypto';
import { Artifact } from '../domain/artifact';
import { errorMessage } from '../domain/errors';
import { TimeoutError, executeWithTimeout } from '../engine/sandbox';
import { Logger, logger as rootLogger } from '../logger';

/** External judge of an artifact's value. */
export interface ScoringOracle {
  score(artifact: Artifact): Promise<{ score: number; reason?: string }>;
}

/** Default oracle when none is configured: every score fails. */
export class UnconfiguredOracle implements ScoringOracle {
  async score(artifact: Artifact): Promise<{ score: number }> {
    throw new Error(`No scoring oracle is configured; cannot score ${artifact.id}`);
  }
}

export interface ScoreOutcome {
  score: number;
  duplicate: boolean;
  reason?: string;
  error?: string;
}

export function contentHash(artifact: Pick<Artifact, 'content' | 'code'>): string {
  const normalized = `${artifact.content}\n${artifact.code ?? ''}`.trim().toLowerCase();
  return createHash('sha256').update(normalized).digest('hex');
}

export class MintScorer {
  private scored = new Set<string>();
  private log: Logger;

  constructor(
    private oracle: ScoringOracle,
    private timeoutMs: number,
    log: Logger = rootLogger,
  ) {
    this.log = log.child({ component: 'mint-scorer' });
  }

  async score(artifact: Artifact): Promise<ScoreOutcome> {
    const hash = contentHash(artifact);
    if (this.scored.has(hash)) {
      this.log.info('Duplicate mint content', { artifactId: artifact.id });
      return { score: 0, duplicate: true };
    }

    try {
      const judged = await executeWithTimeout(() => this.oracle.score(artifact), this.timeoutMs);
      this.scored.add(hash);
      const score = Number.isFinite(judged.score) ? Math.max(0, judged.score) : 0;
      const outcome: ScoreOutcome = { score, duplicate: false };
      if (judged.reason !== undefined) outcome.reason = judged.reason;
      return outcome;
    } catch (error) {
      const message =
        error instanceof TimeoutError ? `Scoring timed out after ${error.timeoutMs}ms` : errorMessage(error);
      this.log.warn('Mint scoring failed', { artifactId: artifact.id, error: message });
      return { score: 0, duplicate: false, error: message };
    }
  }
}
