import { createNormalizedHashFunction } from '../normalization';

interface DictionaryEntry<K, V> {
  originalKey: K;
  value: V;
}

/**
 * Map keyed by normalized key hashes.
 * Keeps the original key next to each value so callers get back exactly what they stored.
 */
export class KeyedMap<K, V> {
  private map: Map<string, DictionaryEntry<K, V>> = new Map();
  private readonly normalizedHashFunction: (key: K) => string = createNormalizedHashFunction<K>();

  public get(key: K): V | undefined {
    return this.map.get(this.normalizedHashFunction(key))?.value;
  }

  public set(key: K, value: V): void {
    this.map.set(this.normalizedHashFunction(key), { originalKey: key, value });
  }

  public has(key: K): boolean {
    return this.map.has(this.normalizedHashFunction(key));
  }

  public delete(key: K): boolean {
    return this.map.delete(this.normalizedHashFunction(key));
  }

  public keys(): K[] {
    return Array.from(this.map.values(), entry => entry.originalKey);
  }

  public get size(): number {
    return this.map.size;
  }

  public clear(): void {
    this.map.clear();
  }
}
