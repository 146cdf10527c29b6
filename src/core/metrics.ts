/**
 * Metrics collection and the client observability hooks.
 */

import type { ClientState } from './types.js';

// ── Observer Hooks ──

export interface CallInfo {
  id: string;
  method: string;
}

/**
 * Structured observability hooks. Every hook is optional; the client calls
 * them synchronously and logs (never propagates) anything they throw.
 */
export interface ClientObserver {
  onStateChange?(from: ClientState, to: ClientState): void;
  onCallSent?(call: CallInfo): void;
  onCallResolved?(call: CallInfo & { durationMs: number }): void;
  onCallFailed?(call: CallInfo & { durationMs: number; error: Error }): void;
  onCallTimedOut?(call: CallInfo & { timeoutMs: number }): void;
  onNotification?(method: string): void;
}

// ── Collector ──

type Tags = Record<string, string>;

export interface MetricsSnapshot {
  counters: Record<string, { value: number; tags?: Tags }[]>;
  gauges: Record<string, { value: number; tags?: Tags }[]>;
  histograms: Record<string, { values: number[]; tags?: Tags }[]>;
  collectedAt: string;
}

function tagsKey(tags?: Tags): string {
  if (!tags || Object.keys(tags).length === 0) return '';
  return Object.entries(tags).sort(([a], [b]) => a.localeCompare(b)).map(([k, v]) => `${k}=${v}`).join(',');
}

function slot<V>(store: Map<string, Map<string, V>>, name: string): Map<string, V> {
  let byTags = store.get(name);
  if (!byTags) {
    byTags = new Map();
    store.set(name, byTags);
  }
  return byTags;
}

export class MetricsCollector {
  private counters = new Map<string, Map<string, { value: number; tags?: Tags }>>();
  private gauges = new Map<string, Map<string, { value: number; tags?: Tags }>>();
  private histograms = new Map<string, Map<string, { values: number[]; tags?: Tags }>>();

  counter(name: string, tags?: Tags, amount = 1): void {
    const byTags = slot(this.counters, name);
    const key = tagsKey(tags);
    const existing = byTags.get(key);
    if (existing) {
      existing.value += amount;
    } else {
      byTags.set(key, { value: amount, tags });
    }
  }

  gauge(name: string, value: number, tags?: Tags): void {
    slot(this.gauges, name).set(tagsKey(tags), { value, tags });
  }

  histogram(name: string, value: number, tags?: Tags): void {
    const byTags = slot(this.histograms, name);
    const key = tagsKey(tags);
    const existing = byTags.get(key);
    if (existing) {
      existing.values.push(value);
    } else {
      byTags.set(key, { values: [value], tags });
    }
  }

  /** Sum across all tag combinations, or the value for specific tags. */
  getCounter(name: string, tags?: Tags): number {
    const byTags = this.counters.get(name);
    if (!byTags) return 0;
    if (tags) return byTags.get(tagsKey(tags))?.value ?? 0;
    let total = 0;
    for (const entry of byTags.values()) total += entry.value;
    return total;
  }

  getGauge(name: string, tags?: Tags): number | undefined {
    return this.gauges.get(name)?.get(tagsKey(tags))?.value;
  }

  getHistogramValues(name: string, tags?: Tags): number[] {
    const byTags = this.histograms.get(name);
    if (!byTags) return [];
    if (tags) return byTags.get(tagsKey(tags))?.values ?? [];
    return Array.from(byTags.values()).flatMap(entry => entry.values);
  }

  getSnapshot(): MetricsSnapshot {
    const flatten = <V>(store: Map<string, Map<string, V>>): Record<string, V[]> =>
      Object.fromEntries(Array.from(store, ([name, byTags]) => [name, Array.from(byTags.values())]));
    return {
      counters: flatten(this.counters),
      gauges: flatten(this.gauges),
      histograms: flatten(this.histograms),
      collectedAt: new Date().toISOString(),
    };
  }

  reset(): void {
    this.counters.clear();
    this.gauges.clear();
    this.histograms.clear();
  }
}

/** Process-wide collector for callers that don't bring their own. */
export const globalMetrics = new MetricsCollector();

/**
 * Observer that records call and connection metrics:
 * `mcp.calls.sent|resolved|failed|timeout` counters tagged by method,
 * `mcp.call.duration_ms` histogram, `mcp.calls.pending` gauge and
 * `mcp.client.transitions` counter tagged by target state.
 */
export function createMetricsObserver(metrics: MetricsCollector = globalMetrics): ClientObserver {
  let pending = 0;
  const settle = () => {
    pending = Math.max(0, pending - 1);
    metrics.gauge('mcp.calls.pending', pending);
  };

  return {
    onStateChange(_from, to) {
      metrics.counter('mcp.client.transitions', { to });
      if (to === 'disposed') {
        pending = 0;
        metrics.gauge('mcp.calls.pending', 0);
      }
    },
    onCallSent({ method }) {
      metrics.counter('mcp.calls.sent', { method });
      pending++;
      metrics.gauge('mcp.calls.pending', pending);
    },
    onCallResolved({ method, durationMs }) {
      metrics.counter('mcp.calls.resolved', { method });
      metrics.histogram('mcp.call.duration_ms', durationMs, { method });
      settle();
    },
    onCallFailed({ method, durationMs }) {
      metrics.counter('mcp.calls.failed', { method });
      metrics.histogram('mcp.call.duration_ms', durationMs, { method });
      settle();
    },
    onCallTimedOut({ method }) {
      metrics.counter('mcp.calls.timeout', { method });
      settle();
    },
    onNotification(method) {
      metrics.counter('mcp.notifications', { method });
    },
  };
}
