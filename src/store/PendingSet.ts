import { KeyedMap } from './KeyedMap';

/**
 * Keys that have a worker in flight.
 * A key stays here from spawn until its result message is processed.
 */
export class PendingSet<K> {
  private pending: KeyedMap<K, true> = new KeyedMap();

  /**
   * Add a key. Returns false if it was already pending.
   */
  public add(key: K): boolean {
    if (this.pending.has(key)) {
      return false;
    }
    this.pending.set(key, true);
    return true;
  }

  public has(key: K): boolean {
    return this.pending.has(key);
  }

  public delete(key: K): boolean {
    return this.pending.delete(key);
  }

  public keys(): K[] {
    return this.pending.keys();
  }

  public get size(): number {
    return this.pending.size;
  }

  public clear(): void {
    this.pending.clear();
  }
}
