export { MetricsCollector } from './MetricsCollector.js';
export type { ExecutionEvent, ToolMetrics, GlobalMetrics } from './MetricsCollector.js';
export { HealthMonitor } from './HealthMonitor.js';
export type { HealthStatus, CheckResult, HealthReport, HealthThresholds } from './HealthMonitor.js';
