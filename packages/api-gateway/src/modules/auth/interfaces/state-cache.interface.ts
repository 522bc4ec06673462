/**
 * Short-lived key/value storage for OAuth state
 */
export interface StateCache {
  put(key: string, value: string, ttlSeconds: number): Promise<void>;
  /** Atomically reads and removes the key; only one caller receives the value */
  take(key: string): Promise<string | null>;
}
