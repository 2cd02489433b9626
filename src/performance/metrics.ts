export interface LatencyStats {
  min: number;
  max: number;
  avg: number;
  p50: number;
  p95: number;
  p99: number;
}

export interface PerformanceResults {
  readonly totalRequests: number;
  readonly successfulRequests: number;
  readonly failedRequests: number;
  /** Fraction in [0, 1] */
  readonly successRate: number;
  readonly requestsPerSecond: number;
  /** Response times in milliseconds */
  readonly averageResponseTime: number;
  readonly minResponseTime: number;
  readonly maxResponseTime: number;
  readonly p50ResponseTime: number;
  readonly p95ResponseTime: number;
  readonly p99ResponseTime: number;
  readonly statusCodeDistribution: ReadonlyMap<number, number>;
  readonly bytesPerSecondSent: number;
  readonly bytesPerSecondReceived: number;
  readonly connectionErrors: number;
  /** Milliseconds since the metrics were created */
  readonly totalDuration: number;
}

const NANOS_PER_MS = 1_000_000;

/**
 * Value at index `floor(len * p / 100)` of an ascending array, with no
 * interpolation between neighbours.
 */
export function percentile(sorted: readonly number[], p: number): number {
  if (sorted.length === 0) {
    return 0;
  }
  const index = Math.floor((sorted.length * p) / 100);
  return sorted[Math.min(index, sorted.length - 1)];
}

export function calculateLatencyStats(latencies: readonly number[]): LatencyStats {
  if (latencies.length === 0) {
    return { min: 0, max: 0, avg: 0, p50: 0, p95: 0, p99: 0 };
  }

  const sorted = [...latencies].sort((a, b) => a - b);
  // Mean over whole nanoseconds, truncated.
  const totalNanos = sorted.reduce((sum, ms) => sum + Math.round(ms * NANOS_PER_MS), 0);

  return {
    min: sorted[0],
    max: sorted[sorted.length - 1],
    avg: Math.floor(totalNanos / sorted.length) / NANOS_PER_MS,
    p50: percentile(sorted, 50),
    p95: percentile(sorted, 95),
    p99: percentile(sorted, 99),
  };
}

/**
 * The aggregate every worker of a performance run writes into. `record`,
 * `recordConnectionError` and `merge` are the only mutators; readers take a
 * `calculateResults()` snapshot instead of looking at the counters. All
 * three run to completion without yielding, so concurrent workers on the
 * event loop never observe a half-applied update.
 */
export class PerformanceMetrics {
  private responseTimes: number[] = [];
  private requestCount = 0;
  private errorCount = 0;
  private connectionErrors = 0;
  private statusCodes = new Map<number, number>();
  private bytesSent = 0;
  private bytesReceived = 0;
  private readonly startTime: number;
  private readonly now: () => number;

  constructor(now: () => number = () => performance.now()) {
    this.now = now;
    this.startTime = now();
  }

  record(duration: number, status: number, bytesSent: number, bytesReceived: number, isError: boolean): void {
    this.responseTimes.push(duration);
    this.requestCount += 1;
    this.bytesSent += bytesSent;
    this.bytesReceived += bytesReceived;
    this.statusCodes.set(status, (this.statusCodes.get(status) ?? 0) + 1);

    if (isError) {
      this.errorCount += 1;
    }
  }

  /** A request that never got a response; counts as a request and as an error. */
  recordConnectionError(): void {
    this.connectionErrors += 1;
    this.errorCount += 1;
  }

  merge(other: PerformanceMetrics): void {
    this.responseTimes.push(...other.responseTimes);
    this.requestCount += other.requestCount;
    this.errorCount += other.errorCount;
    this.connectionErrors += other.connectionErrors;
    this.bytesSent += other.bytesSent;
    this.bytesReceived += other.bytesReceived;
    for (const [status, count] of other.statusCodes) {
      this.statusCodes.set(status, (this.statusCodes.get(status) ?? 0) + count);
    }
  }

  calculateResults(): PerformanceResults {
    const totalDuration = this.now() - this.startTime;
    const totalRequests = this.requestCount + this.connectionErrors;
    const statusCodeDistribution = new Map(this.statusCodes);

    if (this.responseTimes.length === 0) {
      return {
        totalRequests,
        successfulRequests: 0,
        failedRequests: this.errorCount,
        successRate: 0,
        requestsPerSecond: 0,
        averageResponseTime: 0,
        minResponseTime: 0,
        maxResponseTime: 0,
        p50ResponseTime: 0,
        p95ResponseTime: 0,
        p99ResponseTime: 0,
        statusCodeDistribution,
        bytesPerSecondSent: 0,
        bytesPerSecondReceived: 0,
        connectionErrors: this.connectionErrors,
        totalDuration,
      };
    }

    const stats = calculateLatencyStats(this.responseTimes);
    const seconds = totalDuration / 1000;

    return {
      totalRequests,
      successfulRequests: totalRequests - this.errorCount,
      failedRequests: this.errorCount,
      successRate: (totalRequests - this.errorCount) / totalRequests,
      requestsPerSecond: seconds > 0 ? totalRequests / seconds : 0,
      averageResponseTime: stats.avg,
      minResponseTime: stats.min,
      maxResponseTime: stats.max,
      p50ResponseTime: stats.p50,
      p95ResponseTime: stats.p95,
      p99ResponseTime: stats.p99,
      statusCodeDistribution,
      bytesPerSecondSent: seconds > 0 ? this.bytesSent / seconds : 0,
      bytesPerSecondReceived: seconds > 0 ? this.bytesReceived / seconds : 0,
      connectionErrors: this.connectionErrors,
      totalDuration,
    };
  }
}
