import { logger } from './logger.js';

export interface HealthMetrics {
  uptime: number; // milliseconds
  digestsComposed: number;
  liveDigests: number;
  fallbackDigests: number;
  completionCalls: number;
  completionFailures: number;
  imageProbes: number;
  imageFallbacks: number;
  lastError: string | null;
  lastErrorTime: number | null;
  liveRate: number; // 0-100
}

export interface PerformanceMetrics {
  avgCompletionTime: number; // ms
  avgProbeTime: number; // ms
  p95CompletionTime: number;
  p95ProbeTime: number;
}

export type DigestSource = 'live' | 'fallback';

export class Monitor {
  private startTime = Date.now();
  private metrics: HealthMetrics = {
    uptime: 0,
    digestsComposed: 0,
    liveDigests: 0,
    fallbackDigests: 0,
    completionCalls: 0,
    completionFailures: 0,
    imageProbes: 0,
    imageFallbacks: 0,
    lastError: null,
    lastErrorTime: null,
    liveRate: 100
  };

  private performanceData = {
    completionTimes: [] as number[],
    probeTimes: [] as number[]
  };

  recordCompletion(success: boolean, timeMs: number) {
    this.metrics.completionCalls++;
    if (!success) {
      this.metrics.completionFailures++;
    }
    this.performanceData.completionTimes.push(timeMs);
    logger.debug(`Completion call ${success ? 'succeeded' : 'failed'} in ${timeMs}ms`);
  }

  recordImageProbe(success: boolean, timeMs: number) {
    this.metrics.imageProbes++;
    if (!success) {
      this.metrics.imageFallbacks++;
    }
    this.performanceData.probeTimes.push(timeMs);
  }

  recordDigest(source: DigestSource) {
    this.metrics.digestsComposed++;
    if (source === 'live') {
      this.metrics.liveDigests++;
    } else {
      this.metrics.fallbackDigests++;
    }
    this.updateLiveRate();
  }

  recordError(error: Error) {
    this.metrics.lastError = error.message;
    this.metrics.lastErrorTime = Date.now();
    logger.error('Monitor recorded error', error.message);
  }

  getMetrics(): HealthMetrics {
    return {
      ...this.metrics,
      uptime: Date.now() - this.startTime
    };
  }

  getPerformanceMetrics(): PerformanceMetrics {
    const percentile = (arr: number[], p: number) => {
      const sorted = [...arr].sort((a, b) => a - b);
      const index = Math.ceil((p / 100) * sorted.length) - 1;
      return sorted[Math.max(0, index)] || 0;
    };

    return {
      avgCompletionTime: this.getAverage(this.performanceData.completionTimes),
      avgProbeTime: this.getAverage(this.performanceData.probeTimes),
      p95CompletionTime: percentile(this.performanceData.completionTimes, 95),
      p95ProbeTime: percentile(this.performanceData.probeTimes, 95)
    };
  }

  getDashboard() {
    const health = this.getMetrics();
    const perf = this.getPerformanceMetrics();

    const uptimeHours = (health.uptime / (1000 * 60 * 60)).toFixed(1);
    const status = health.liveRate > 90 ? '✅ LIVE' : health.liveRate > 50 ? '⚠️  DEGRADED' : '❌ FALLBACK';

    return `
╔════════════════════════════════════════════════════════════╗
║                 Crypto Digest - Run Dashboard              ║
╠════════════════════════════════════════════════════════════╣
║ HEALTH                                                     ║
║  Uptime: ${uptimeHours}h
║  Live Rate: ${health.liveRate.toFixed(1)}%
║  Status: ${status}
╠════════════════════════════════════════════════════════════╣
║ DIGESTS                                                    ║
║  Composed: ${health.digestsComposed}
║  Live: ${health.liveDigests}
║  Fallback: ${health.fallbackDigests}
╠════════════════════════════════════════════════════════════╣
║ API USAGE                                                  ║
║  Completion Calls: ${health.completionCalls} (${health.completionFailures} failed)
║  Image Probes: ${health.imageProbes} (${health.imageFallbacks} fell back)
╠════════════════════════════════════════════════════════════╣
║ PERFORMANCE (latency)                                      ║
║  Completion: avg ${perf.avgCompletionTime.toFixed(0)}ms | p95 ${perf.p95CompletionTime.toFixed(0)}ms
║  Image Probe: avg ${perf.avgProbeTime.toFixed(0)}ms | p95 ${perf.p95ProbeTime.toFixed(0)}ms
╠════════════════════════════════════════════════════════════╣
║ LAST ERROR                                                 ║
║  ${health.lastError ? health.lastError.slice(0, 56) : 'None'}
║  Time: ${health.lastErrorTime ? new Date(health.lastErrorTime).toLocaleTimeString() : '-'}
╚════════════════════════════════════════════════════════════╝
    `;
  }

  private getAverage(arr: number[]): number {
    if (arr.length === 0) return 0;
    return arr.reduce((a, b) => a + b, 0) / arr.length;
  }

  private updateLiveRate() {
    const total = this.metrics.digestsComposed;
    if (total === 0) {
      this.metrics.liveRate = 100;
    } else {
      this.metrics.liveRate = (this.metrics.liveDigests / total) * 100;
    }
  }
}

export const monitor = new Monitor();
