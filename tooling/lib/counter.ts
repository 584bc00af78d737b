/**
 * Scoped success counter owned by a single running trial
 */

export class TrialCounter {
  private count = 0;
  private released = false;

  increment(): number {
    if (this.released) {
      throw new Error("Trial counter used after its trial ended");
    }
    this.count += 1;
    return this.count;
  }

  get value(): number {
    return this.count;
  }

  get isReleased(): boolean {
    return this.released;
  }

  release(): void {
    this.released = true;
  }
}

/**
 * Run `body` with a fresh counter that is released when it returns or throws.
 */
export function withCounter<T>(body: (counter: TrialCounter) => T): T {
  const counter = new TrialCounter();
  try {
    return body(counter);
  } finally {
    counter.release();
  }
}
