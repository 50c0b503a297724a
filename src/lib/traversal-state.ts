import type { TerminationReason, TraversalPhase } from "./types.js";

export class TraversalState {
  currentPage = 1;
  consecutiveEmptyPages = 0;
  previousFingerprint: readonly string[] | null = null;
  phase: TraversalPhase = "fetching";
  private reason: TerminationReason | null = null;

  get terminationReason(): TerminationReason | null {
    return this.reason;
  }

  get terminated(): boolean {
    return this.reason !== null;
  }

  /** Terminal and set once; a second call is a programming error. */
  terminate(reason: TerminationReason): void {
    if (this.reason !== null) {
      throw new Error(
        `Traversal already terminated with ${this.reason}, cannot terminate again with ${reason}`
      );
    }
    this.reason = reason;
    this.phase = "terminated";
  }

  enter(phase: Exclude<TraversalPhase, "terminated">): void {
    if (this.reason !== null) {
      throw new Error(`Traversal terminated with ${this.reason}, cannot enter ${phase}`);
    }
    this.phase = phase;
  }

  recordPageYield(emittedCount: number): void {
    this.consecutiveEmptyPages = emittedCount === 0 ? this.consecutiveEmptyPages + 1 : 0;
  }

  /** True when `fingerprint` repeats the previous non-empty one. Stores it otherwise. */
  checkFingerprint(fingerprint: readonly string[]): boolean {
    const previous = this.previousFingerprint;
    if (
      previous !== null &&
      previous.length > 0 &&
      previous.length === fingerprint.length &&
      previous.every((url, i) => url === fingerprint[i])
    ) {
      return true;
    }
    this.previousFingerprint = fingerprint;
    return false;
  }
}
