import type { Target } from "../domain";

/**
 * Holds the current target set. Readers always see one complete snapshot;
 * `replace` swaps it in a single assignment.
 */
export class TargetRegistry {
  private snapshot: readonly Target[];

  constructor(targets: readonly Target[] = []) {
    this.snapshot = Object.freeze([...targets]);
  }

  list(): readonly Target[] {
    return this.snapshot;
  }

  get(key: string): Target | undefined {
    return this.snapshot.find((target) => target.key === key);
  }

  get size(): number {
    return this.snapshot.length;
  }

  replace(targets: readonly Target[]): void {
    this.snapshot = Object.freeze([...targets]);
  }

  keys(): Set<string> {
    return new Set(this.snapshot.map((target) => target.key));
  }
}
