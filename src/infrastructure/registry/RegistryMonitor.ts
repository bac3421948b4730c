/**
 * @squadline/runtime - Registry Monitor
 *
 * In-process lookup metrics per registry: request counts, hit rate, rolling
 * latency and item counts.
 */

/** Latency samples kept per registry */
export const LATENCY_WINDOW_SIZE = 100;

/** Items listed per registry in the performance report */
const TOP_ITEMS = 5;

export interface RegistryMetrics {
  registryName: string;
  totalItems: number;
  totalRequests: number;
  hits: number;
  misses: number;
  /** Mean of the last `LATENCY_WINDOW_SIZE` samples */
  averageLatencyMs: number;
  errorCount: number;
  lastUpdated: Date;
}

export interface RegistryPerformance {
  totalRequests: number;
  /** Percentage, 0-100 */
  hitRate: number;
  averageLatencyMs: number;
  errorCount: number;
  totalItems: number;
  topItems: Array<{ name: string; requests: number }>;
}

export interface PerformanceReport {
  registries: Record<string, RegistryPerformance>;
  totals: {
    registries: number;
    totalItems: number;
    totalRequests: number;
    hitRate: number;
    errorCount: number;
  };
  generatedAt: Date;
}

interface RegistryState {
  metrics: RegistryMetrics;
  latencies: number[];
  itemRequests: Map<string, number>;
}

function hitRate(hits: number, requests: number): number {
  return (hits / Math.max(requests, 1)) * 100;
}

/**
 * RegistryMonitor
 *
 * @example
 * ```typescript
 * const monitor = new RegistryMonitor();
 * monitor.recordRequest('tools', 'get_players', true, 0.4);
 * monitor.getPerformanceReport().registries.tools.hitRate; // 100
 * ```
 */
export class RegistryMonitor {
  private states: Map<string, RegistryState> = new Map();
  private enabled = true;

  constructor(private readonly now: () => Date = () => new Date()) {}

  recordRequest(registryName: string, itemName: string, success: boolean, latencyMs: number): void {
    if (!this.enabled) return;

    const state = this.stateOf(registryName);
    const { metrics } = state;

    metrics.totalRequests++;
    if (success) {
      metrics.hits++;
    } else {
      metrics.misses++;
      metrics.errorCount++;
    }

    state.latencies.push(latencyMs);
    if (state.latencies.length > LATENCY_WINDOW_SIZE) {
      state.latencies.splice(0, state.latencies.length - LATENCY_WINDOW_SIZE);
    }
    metrics.averageLatencyMs = state.latencies.reduce((sum, sample) => sum + sample, 0) / state.latencies.length;

    state.itemRequests.set(itemName, (state.itemRequests.get(itemName) ?? 0) + 1);
    metrics.lastUpdated = this.now();
  }

  recordItemCount(registryName: string, count: number): void {
    if (!this.enabled) return;

    const { metrics } = this.stateOf(registryName);
    metrics.totalItems = count;
    metrics.lastUpdated = this.now();
  }

  /**
   * Metrics of one registry, or of all of them
   */
  getMetrics(): RegistryMetrics[];
  getMetrics(registryName: string): RegistryMetrics | undefined;
  getMetrics(registryName?: string): RegistryMetrics[] | RegistryMetrics | undefined {
    if (registryName !== undefined) {
      const state = this.states.get(registryName);
      return state ? { ...state.metrics } : undefined;
    }
    return Array.from(this.states.values(), (state) => ({ ...state.metrics }));
  }

  getPerformanceReport(): PerformanceReport {
    const registries: Record<string, RegistryPerformance> = {};
    let totalItems = 0;
    let totalRequests = 0;
    let totalHits = 0;
    let errorCount = 0;

    for (const [name, state] of this.states) {
      const { metrics } = state;
      registries[name] = {
        totalRequests: metrics.totalRequests,
        hitRate: hitRate(metrics.hits, metrics.totalRequests),
        averageLatencyMs: metrics.averageLatencyMs,
        errorCount: metrics.errorCount,
        totalItems: metrics.totalItems,
        topItems: Array.from(state.itemRequests, ([item, requests]) => ({ name: item, requests }))
          .sort((a, b) => b.requests - a.requests)
          .slice(0, TOP_ITEMS),
      };

      totalItems += metrics.totalItems;
      totalRequests += metrics.totalRequests;
      totalHits += metrics.hits;
      errorCount += metrics.errorCount;
    }

    return {
      registries,
      totals: {
        registries: this.states.size,
        totalItems,
        totalRequests,
        hitRate: hitRate(totalHits, totalRequests),
        errorCount,
      },
      generatedAt: this.now(),
    };
  }

  /**
   * Forget the metrics of one registry, or of all of them
   */
  resetMetrics(registryName?: string): void {
    if (registryName === undefined) {
      this.states.clear();
    } else {
      this.states.delete(registryName);
    }
  }

  enable(): void {
    this.enabled = true;
  }

  disable(): void {
    this.enabled = false;
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  private stateOf(registryName: string): RegistryState {
    let state = this.states.get(registryName);
    if (!state) {
      state = {
        metrics: {
          registryName,
          totalItems: 0,
          totalRequests: 0,
          hits: 0,
          misses: 0,
          averageLatencyMs: 0,
          errorCount: 0,
          lastUpdated: this.now(),
        },
        latencies: [],
        itemRequests: new Map(),
      };
      this.states.set(registryName, state);
    }
    return state;
  }
}
