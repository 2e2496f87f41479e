// Evaluation guard: breaks recursion through feedback loops
//
// A device re-entered while it is still computing (the pull came back to it
// around a cycle) answers with the value of its previous pass instead of
// computing again. Repeated external calls then iterate the loop towards its
// fixed point, one pass per call.

import type { Signal } from '../types/signal.js';

export class EvaluationGuard {
  private inEvaluation: boolean = false;
  private last: Signal = null;

  // Counters for inspection
  private computeCount: number = 0;
  private reentryCount: number = 0;

  /**
   * Run a computation under the guard.
   */
  run(compute: () => Signal): Signal {
    if (this.inEvaluation) {
      this.reentryCount++;
      return this.last;
    }

    this.inEvaluation = true;
    try {
      this.computeCount++;
      this.last = compute();
      return this.last;
    } finally {
      // Also cleared when compute throws
      this.inEvaluation = false;
    }
  }

  get active(): boolean {
    return this.inEvaluation;
  }

  /** Value produced by the last completed computation (floating before the first) */
  get lastValue(): Signal {
    return this.last;
  }

  get computations(): number {
    return this.computeCount;
  }

  get reentries(): number {
    return this.reentryCount;
  }

  resetCounters(): void {
    this.computeCount = 0;
    this.reentryCount = 0;
  }
}
