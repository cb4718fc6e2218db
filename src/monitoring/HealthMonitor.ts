import type { MetricsCollector } from './MetricsCollector.js';

export type HealthStatus = 'healthy' | 'degraded' | 'unhealthy';

export interface CheckResult {
  status: HealthStatus;
  message: string;
}

export interface HealthReport {
  status: HealthStatus;
  /** ISO-8601 */
  checkedAt: string;
  checks: Record<string, CheckResult>;
}

export interface HealthThresholds {
  /** Error rate (0..1) at or above which the engine is degraded (default 0.1) */
  degradedErrorRate: number;
  /** Error rate (0..1) at or above which the engine is unhealthy (default 0.5) */
  unhealthyErrorRate: number;
}

const DEFAULT_THRESHOLDS: HealthThresholds = {
  degradedErrorRate: 0.1,
  unhealthyErrorRate: 0.5,
};

const SEVERITY: Record<HealthStatus, number> = { healthy: 0, degraded: 1, unhealthy: 2 };

export class HealthMonitor {
  private readonly thresholds: HealthThresholds;

  constructor(
    private readonly metrics: MetricsCollector,
    thresholds: Partial<HealthThresholds> = {},
  ) {
    this.thresholds = { ...DEFAULT_THRESHOLDS, ...thresholds };
  }

  checkHealth(): HealthReport {
    const checks: Record<string, CheckResult> = {
      metrics_collection: this.checkMetricsCollection(),
      error_rates: this.checkErrorRates(),
    };
    const status = Object.values(checks).reduce<HealthStatus>(
      (worst, check) => (SEVERITY[check.status] > SEVERITY[worst] ? check.status : worst),
      'healthy',
    );
    return { status, checkedAt: new Date().toISOString(), checks };
  }

  private checkMetricsCollection(): CheckResult {
    const { totalExecutions } = this.metrics.globalMetrics();
    if (totalExecutions === 0) {
      return { status: 'degraded', message: 'No executions recorded yet' };
    }
    return { status: 'healthy', message: `Metrics collection active with ${totalExecutions} total executions` };
  }

  private checkErrorRates(): CheckResult {
    const { totalExecutions, errorRate } = this.metrics.globalMetrics();
    if (totalExecutions === 0) {
      return { status: 'healthy', message: 'No executions to check' };
    }
    const percent = (errorRate * 100).toFixed(1);
    if (errorRate >= this.thresholds.unhealthyErrorRate) {
      return { status: 'unhealthy', message: `High error rate: ${percent}%` };
    }
    if (errorRate >= this.thresholds.degradedErrorRate) {
      return { status: 'degraded', message: `Elevated error rate: ${percent}%` };
    }
    return { status: 'healthy', message: `Error rate within normal range: ${percent}%` };
  }
}
