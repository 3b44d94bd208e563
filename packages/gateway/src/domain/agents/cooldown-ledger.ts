/**
 * Last-fired timestamps (ms) per trigger name.
 */
export class CooldownLedger {
  private lastFired = new Map<string, number>();

  /**
   * A trigger is eligible once strictly more than `cooldownSeconds` have passed
   * since it last fired. Triggers that never fired are always eligible.
   */
  isEligible(triggerName: string, cooldownSeconds: number, now: number): boolean {
    const last = this.lastFired.get(triggerName);
    if (last === undefined) return true;
    return (now - last) / 1000 > cooldownSeconds;
  }

  record(triggerName: string, at: number): void {
    this.lastFired.set(triggerName, at);
  }

  get(triggerName: string): number | undefined {
    return this.lastFired.get(triggerName);
  }

  clear(): void {
    this.lastFired.clear();
  }

  get size(): number {
    return this.lastFired.size;
  }
}
