/**
 * Per-collection counters for registry and store operations
 */

export type StoreOperation = "load" | "find" | "insert" | "update" | "delete";

export interface CollectionMetrics {
  hitCount: number;
  missCount: number;
  loads: number;
  finds: number;
  inserts: number;
  updates: number;
  deletes: number;
  failures: number;
  writeTimeMs: number[];
}

const MAX_SAMPLES = 100;

/**
 * Metrics for one connection, keyed by collection
 */
export class MetricsCollector {
  #metrics = new Map<string, CollectionMetrics>();

  /**
   * Get or create metrics for a collection
   */
  #getMetrics(collection: string): CollectionMetrics {
    let metrics = this.#metrics.get(collection);
    if (!metrics) {
      metrics = {
        hitCount: 0,
        missCount: 0,
        loads: 0,
        finds: 0,
        inserts: 0,
        updates: 0,
        deletes: 0,
        failures: 0,
        writeTimeMs: [],
      };
      this.#metrics.set(collection, metrics);
    }
    return metrics;
  }

  /**
   * Record a registry hit (live instance reused)
   */
  recordHit(collection: string): void {
    this.#getMetrics(collection).hitCount++;
  }

  /**
   * Record a registry miss (store consulted)
   */
  recordMiss(collection: string): void {
    this.#getMetrics(collection).missCount++;
  }

  /**
   * Record a completed store operation
   */
  recordOperation(collection: string, operation: StoreOperation): void {
    const metrics = this.#getMetrics(collection);
    switch (operation) {
      case "load":
        metrics.loads++;
        break;
      case "find":
        metrics.finds++;
        break;
      case "insert":
        metrics.inserts++;
        break;
      case "update":
        metrics.updates++;
        break;
      case "delete":
        metrics.deletes++;
        break;
    }
  }

  /**
   * Record a failed store operation
   */
  recordFailure(collection: string): void {
    this.#getMetrics(collection).failures++;
  }

  /**
   * Record write latency
   */
  recordWriteTime(collection: string, ms: number): void {
    const metrics = this.#getMetrics(collection);
    metrics.writeTimeMs.push(ms);

    if (metrics.writeTimeMs.length > MAX_SAMPLES) {
      metrics.writeTimeMs.shift();
    }
  }

  /**
   * Get metrics for a collection
   */
  getMetrics(collection: string): CollectionMetrics | undefined {
    return this.#metrics.get(collection);
  }

  /**
   * Get all metrics
   */
  getAllMetrics(): Map<string, CollectionMetrics> {
    return new Map(this.#metrics);
  }

  /**
   * Registry hit rate for a collection
   */
  getHitRate(collection: string): number {
    const metrics = this.#metrics.get(collection);
    if (!metrics) return 0;
    const total = metrics.hitCount + metrics.missCount;
    return total > 0 ? metrics.hitCount / total : 0;
  }

  /**
   * Calculate p95 for a list of samples
   */
  getP95(values: number[]): number {
    if (values.length === 0) return 0;

    const sorted = [...values].sort((a, b) => a - b);
    const idx = Math.ceil(sorted.length * 0.95) - 1;
    return sorted[Math.max(0, idx)] ?? 0;
  }

  /**
   * Get p95 write time for a collection
   */
  getP95WriteTime(collection: string): number {
    return this.getP95(this.#metrics.get(collection)?.writeTimeMs ?? []);
  }

  /**
   * Reset metrics for one collection or all
   */
  reset(collection?: string): void {
    if (collection) {
      this.#metrics.delete(collection);
    } else {
      this.#metrics.clear();
    }
  }
}
