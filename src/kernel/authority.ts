/**
 * Caller authority for kernel facades.
 *
 * A facade acts only for the principals its authority names. Invocation
 * facades are revoked when the invocation returns, so code that outlives
 * its call (a timed-out sandbox) can no longer act.
 */

export class Authority {
  private revoked = false;

  private constructor(private readonly callers: ReadonlySet<string> | null) {}

  /** Authority over every principal. Used by kernel wiring and tests. */
  static root(): Authority {
    return new Authority(null);
  }

  static of(callerIds: Iterable<string>): Authority {
    return new Authority(new Set(callerIds));
  }

  permits(callerId: string): boolean {
    if (this.revoked) return false;
    return this.callers === null || this.callers.has(callerId);
  }

  get isRevoked(): boolean {
    return this.revoked;
  }

  revoke(): void {
    this.revoked = true;
  }

  callerIds(): string[] | null {
    return this.callers === null ? null : [...this.callers];
  }
}
