import { Clock } from '../clock';

/**
 * Per-source repeat suppression. A press counts as a repeat when it lands
 * within `windowMs` of the last accepted press from the same source code.
 * Repeats do not extend the window.
 */
export class Debouncer {
  private lastAccepted: Map<number, number> = new Map();

  constructor(
    private readonly windowMs: number,
    private readonly clock: Clock,
  ) {}

  /**
   * Returns true if the press should be handled, and records it.
   * `at` is when the press arrived; defaults to now.
   */
  accept(sourceCode: number, at: number = this.clock.now()): boolean {
    if (this.windowMs <= 0) return true;

    const last = this.lastAccepted.get(sourceCode);
    if (last !== undefined && at - last < this.windowMs) {
      return false;
    }
    this.lastAccepted.set(sourceCode, at);
    return true;
  }

  reset(): void {
    this.lastAccepted.clear();
  }
}
