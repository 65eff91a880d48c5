/**
 * METRICS COLLECTION
 *
 * Lightweight in-process metrics for the standings API
 * Exposes Prometheus-compatible /metrics endpoint
 *
 * Collected metrics:
 * - Upstream fetch latency histogram
 * - Total request latency
 * - Result cache hits, misses and single-flight joins
 * - Upstream fetches and rejected upstream rows
 * - Errors by kind
 * - Requests per endpoint
 */

import { Router, Request, Response, NextFunction } from 'express';

// Histogram bucket boundaries (milliseconds)
const LATENCY_BUCKETS = [10, 25, 50, 100, 250, 500, 1000, 2500, 5000, 10000];

interface HistogramData {
  buckets: Map<number, number>;
  sum: number;
  count: number;
}

export interface MetricsSnapshot {
  upstream: {
    fetches: number;
    rejected_rows: number;
    latency: { count: number; sum_ms: number; avg_ms: number };
  };
  requests: {
    latency: { count: number; sum_ms: number; avg_ms: number };
  };
  cache: {
    hits: number;
    misses: number;
    joins: number;
    hit_rate: number;
  };
  requests_by_endpoint: Record<string, number>;
  errors_by_kind: Record<string, number>;
  concurrency: {
    current: number;
    peak: number;
  };
}

/**
 * Metrics collector singleton
 */
class MetricsCollector {
  // Histograms
  private upstreamLatency: HistogramData;
  private totalRequestLatency: HistogramData;

  // Counters
  private cacheHits = 0;
  private cacheMisses = 0;
  private cacheJoins = 0;
  private upstreamFetches = 0;
  private rejectedRows = 0;
  private requestsByEndpoint: Map<string, number> = new Map();
  private errorsByKind: Map<string, number> = new Map();

  // Gauges
  private activeConcurrentRequests = 0;
  private peakConcurrentRequests = 0;

  constructor() {
    this.upstreamLatency = this.createHistogram();
    this.totalRequestLatency = this.createHistogram();
  }

  private createHistogram(): HistogramData {
    const buckets = new Map<number, number>();
    LATENCY_BUCKETS.forEach(b => buckets.set(b, 0));
    return { buckets, sum: 0, count: 0 };
  }

  private recordHistogram(histogram: HistogramData, value: number): void {
    histogram.sum += value;
    histogram.count += 1;

    // bucket counts are per-bucket, cumulated at export
    const bucket = LATENCY_BUCKETS.find(b => value <= b);
    if (bucket !== undefined) {
      histogram.buckets.set(bucket, (histogram.buckets.get(bucket) || 0) + 1);
    }
  }

  // Upstream metrics
  recordUpstreamLatency(ms: number): void {
    this.upstreamFetches++;
    this.recordHistogram(this.upstreamLatency, ms);
  }

  incrementRejectedRows(count: number): void {
    this.rejectedRows += count;
  }

  // Request metrics
  recordRequestLatency(ms: number): void {
    this.recordHistogram(this.totalRequestLatency, ms);
  }

  incrementRequestCount(endpoint: string): void {
    this.requestsByEndpoint.set(endpoint, (this.requestsByEndpoint.get(endpoint) || 0) + 1);
  }

  incrementError(kind: string): void {
    this.errorsByKind.set(kind, (this.errorsByKind.get(kind) || 0) + 1);
  }

  // Cache metrics
  incrementCacheHit(): void {
    this.cacheHits++;
  }

  incrementCacheMiss(): void {
    this.cacheMisses++;
  }

  incrementCacheJoin(): void {
    this.cacheJoins++;
  }

  // Concurrency tracking
  incrementConcurrentRequests(): void {
    this.activeConcurrentRequests++;
    if (this.activeConcurrentRequests > this.peakConcurrentRequests) {
      this.peakConcurrentRequests = this.activeConcurrentRequests;
    }
  }

  decrementConcurrentRequests(): void {
    this.activeConcurrentRequests = Math.max(0, this.activeConcurrentRequests - 1);
  }

  getCacheHitRate(): number {
    const total = this.cacheHits + this.cacheMisses;
    return total > 0 ? this.cacheHits / total : 0;
  }

  // Format histogram for Prometheus
  private formatHistogram(name: string, histogram: HistogramData, help: string): string {
    const lines: string[] = [];
    lines.push(`# HELP ${name} ${help}`);
    lines.push(`# TYPE ${name} histogram`);

    let cumulative = 0;
    for (const bucket of LATENCY_BUCKETS) {
      cumulative += histogram.buckets.get(bucket) || 0;
      lines.push(`${name}_bucket{le="${bucket}"} ${cumulative}`);
    }
    lines.push(`${name}_bucket{le="+Inf"} ${histogram.count}`);
    lines.push(`${name}_sum ${histogram.sum}`);
    lines.push(`${name}_count ${histogram.count}`);

    return lines.join('\n');
  }

  private formatCounter(name: string, help: string, value: number, type: 'counter' | 'gauge' = 'counter'): string {
    return [
      `# HELP ${name} ${help}`,
      `# TYPE ${name} ${type}`,
      `${name} ${value}`
    ].join('\n');
  }

  private formatLabeled(name: string, help: string, label: string, values: Map<string, number>): string {
    const lines = [`# HELP ${name} ${help}`, `# TYPE ${name} counter`];
    for (const [key, count] of values) {
      lines.push(`${name}{${label}="${key.replace(/"/g, '\\"')}"} ${count}`);
    }
    if (values.size === 0) {
      lines.push(`${name} 0`);
    }
    return lines.join('\n');
  }

  // Generate Prometheus-compatible metrics output
  toPrometheus(): string {
    const sections: string[] = [];

    sections.push(this.formatHistogram(
      'standings_upstream_latency_ms',
      this.upstreamLatency,
      'Upstream provider request latency in milliseconds'
    ));

    sections.push(this.formatHistogram(
      'standings_request_latency_ms',
      this.totalRequestLatency,
      'Total request latency in milliseconds'
    ));

    sections.push(this.formatCounter('standings_upstream_fetches_total', 'Upstream requests issued', this.upstreamFetches));
    sections.push(this.formatCounter('standings_upstream_rejected_rows_total', 'Malformed upstream rows dropped', this.rejectedRows));

    sections.push(this.formatCounter('standings_cache_hits_total', 'Result cache hits', this.cacheHits));
    sections.push(this.formatCounter('standings_cache_misses_total', 'Result cache misses', this.cacheMisses));
    sections.push(this.formatCounter('standings_cache_joins_total', 'Requests that joined an in-flight fetch', this.cacheJoins));
    sections.push(this.formatCounter('standings_cache_hit_rate', 'Cache hit rate (0-1)', Number(this.getCacheHitRate().toFixed(4)), 'gauge'));

    sections.push(this.formatLabeled('standings_requests_total', 'Requests by endpoint', 'endpoint', this.requestsByEndpoint));
    sections.push(this.formatLabeled('standings_errors_total', 'Errors by kind', 'kind', this.errorsByKind));

    sections.push(this.formatCounter('standings_concurrent_requests', 'Current concurrent requests', this.activeConcurrentRequests, 'gauge'));
    sections.push(this.formatCounter('standings_peak_concurrent_requests', 'Peak concurrent requests', this.peakConcurrentRequests, 'gauge'));

    return sections.join('\n\n') + '\n';
  }

  // Get summary for JSON endpoint
  toJSON(): MetricsSnapshot {
    return {
      upstream: {
        fetches: this.upstreamFetches,
        rejected_rows: this.rejectedRows,
        latency: summarize(this.upstreamLatency),
      },
      requests: {
        latency: summarize(this.totalRequestLatency),
      },
      cache: {
        hits: this.cacheHits,
        misses: this.cacheMisses,
        joins: this.cacheJoins,
        hit_rate: this.getCacheHitRate(),
      },
      requests_by_endpoint: Object.fromEntries(this.requestsByEndpoint),
      errors_by_kind: Object.fromEntries(this.errorsByKind),
      concurrency: {
        current: this.activeConcurrentRequests,
        peak: this.peakConcurrentRequests,
      },
    };
  }

  // Reset all metrics (for testing)
  reset(): void {
    this.upstreamLatency = this.createHistogram();
    this.totalRequestLatency = this.createHistogram();
    this.cacheHits = 0;
    this.cacheMisses = 0;
    this.cacheJoins = 0;
    this.upstreamFetches = 0;
    this.rejectedRows = 0;
    this.requestsByEndpoint.clear();
    this.errorsByKind.clear();
    this.activeConcurrentRequests = 0;
    this.peakConcurrentRequests = 0;
  }
}

function summarize(histogram: HistogramData): { count: number; sum_ms: number; avg_ms: number } {
  return {
    count: histogram.count,
    sum_ms: histogram.sum,
    avg_ms: histogram.count > 0 ? Math.round(histogram.sum / histogram.count) : 0,
  };
}

// Singleton instance
export const metrics = new MetricsCollector();

/**
 * Create metrics router
 */
export function createMetricsRouter(): Router {
  const router = Router();

  // Prometheus-compatible metrics endpoint
  router.get('/metrics', (_req: Request, res: Response) => {
    res.set('Content-Type', 'text/plain; version=0.0.4; charset=utf-8');
    res.send(metrics.toPrometheus());
  });

  router.get('/metrics/json', (_req: Request, res: Response) => {
    res.json(metrics.toJSON());
  });

  return router;
}

/**
 * Middleware to track request metrics
 */
export function metricsMiddleware() {
  return (_req: Request, res: Response, next: NextFunction) => {
    const startTime = Date.now();
    metrics.incrementConcurrentRequests();

    res.on('finish', () => {
      metrics.decrementConcurrentRequests();
      metrics.recordRequestLatency(Date.now() - startTime);
    });

    next();
  };
}
