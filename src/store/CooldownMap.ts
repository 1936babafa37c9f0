import { KeyedMap } from './KeyedMap';

/**
 * Last failure time per key. Suppresses new fetches for a key until the cooldown has elapsed.
 */
export class CooldownMap<K> {
  private failures: KeyedMap<K, number> = new KeyedMap();

  /**
   * @param cooldown - Minimum time in milliseconds between a failure and the next attempt.
   */
  public constructor(public readonly cooldown: number) { }

  public recordFailure(key: K, at: number): void {
    this.failures.set(key, at);
  }

  public lastFailure(key: K): number | null {
    return this.failures.get(key) ?? null;
  }

  /**
   * True while `now - lastFailure < cooldown`.
   */
  public isCoolingDown(key: K, now: number): boolean {
    const failedAt = this.failures.get(key);
    if (failedAt === undefined) {
      return false;
    }
    return now - failedAt < this.cooldown;
  }

  /**
   * Milliseconds until the key may be fetched again; 0 when it is not cooling down.
   */
  public remaining(key: K, now: number): number {
    const failedAt = this.failures.get(key);
    if (failedAt === undefined) {
      return 0;
    }
    return Math.max(0, failedAt + this.cooldown - now);
  }

  public delete(key: K): boolean {
    return this.failures.delete(key);
  }

  public get size(): number {
    return this.failures.size;
  }

  public clear(): void {
    this.failures.clear();
  }
}
