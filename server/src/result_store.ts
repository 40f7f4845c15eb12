import type { CycleResult } from "./pipeline/schemas.js";

/** Single slot holding the most recently finished cycle; the last finisher wins. */
export class LastResultStore {
  private result: CycleResult | null = null;

  get(): CycleResult | null {
    return this.result;
  }

  set(result: CycleResult): void {
    this.result = result;
  }
}
