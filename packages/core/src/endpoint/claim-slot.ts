/**
 * One-shot ownership slot: Unclaimed(value) → Claimed, irreversible.
 *
 * take() is the only mutator. It runs synchronously, so between two racing
 * callers exactly one observes the value.
 */
export class ClaimSlot<T extends object> {
  private value: T | undefined;

  constructor(value: T) {
    this.value = value;
  }

  get isClaimed(): boolean {
    return this.value === undefined;
  }

  /**
   * Move the value out. Returns undefined once claimed.
   */
  take(): T | undefined {
    const value = this.value;
    this.value = undefined;
    return value;
  }
}
