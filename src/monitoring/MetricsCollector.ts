/**
 * In-memory execution metrics, per tool and global.
 */

import type { ToolErrorKind } from '../errors/ToolError.js';

export interface ExecutionEvent {
  toolName: string;
  success: boolean;
  durationMs: number;
  /** Set for failures */
  errorKind?: ToolErrorKind | undefined;
  /** Epoch milliseconds; defaults to now */
  timestamp?: number;
}

export interface ToolMetrics {
  toolName: string;
  totalExecutions: number;
  successfulExecutions: number;
  failedExecutions: number;
  totalDurationMs: number;
  avgDurationMs: number;
  /** 0 until the first execution */
  minDurationMs: number;
  maxDurationMs: number;
  lastExecutionAt: number | undefined;
  errorCounts: Partial<Record<ToolErrorKind, number>>;
  /** Fractions in [0, 1] */
  successRate: number;
  failureRate: number;
}

export interface GlobalMetrics {
  totalExecutions: number;
  successfulExecutions: number;
  failedExecutions: number;
  parallelBatches: number;
  parallelExecutions: number;
  registryOperations: number;
  /** NotFound failures; kept out of the per-tool entries */
  unknownToolExecutions: number;
  avgDurationMs: number;
  errorRate: number;
  /** Epoch milliseconds when collection (re)started */
  since: number;
}

interface MutableToolMetrics {
  total: number;
  successes: number;
  failures: number;
  totalDurationMs: number;
  minDurationMs: number;
  maxDurationMs: number;
  lastExecutionAt: number | undefined;
  errorCounts: Partial<Record<ToolErrorKind, number>>;
}

function rate(part: number, whole: number): number {
  return whole === 0 ? 0 : part / whole;
}

export class MetricsCollector {
  private tools = new Map<string, MutableToolMetrics>();
  private parallelBatches = 0;
  private parallelExecutions = 0;
  private registryOperations = 0;
  private unknownTool = { total: 0, totalDurationMs: 0 };
  private since = Date.now();

  /**
   * NotFound events carry a caller-supplied name; they are counted in one
   * global bucket rather than under that name.
   */
  recordExecution(event: ExecutionEvent): void {
    if (!event.success && event.errorKind === 'NotFound') {
      this.unknownTool.total += 1;
      this.unknownTool.totalDurationMs += event.durationMs;
      return;
    }

    let m = this.tools.get(event.toolName);
    if (m === undefined) {
      m = {
        total: 0,
        successes: 0,
        failures: 0,
        totalDurationMs: 0,
        minDurationMs: Number.POSITIVE_INFINITY,
        maxDurationMs: 0,
        lastExecutionAt: undefined,
        errorCounts: {},
      };
      this.tools.set(event.toolName, m);
    }

    m.total += 1;
    if (event.success) {
      m.successes += 1;
    } else {
      m.failures += 1;
      if (event.errorKind !== undefined) {
        m.errorCounts[event.errorKind] = (m.errorCounts[event.errorKind] ?? 0) + 1;
      }
    }
    m.totalDurationMs += event.durationMs;
    m.minDurationMs = Math.min(m.minDurationMs, event.durationMs);
    m.maxDurationMs = Math.max(m.maxDurationMs, event.durationMs);
    m.lastExecutionAt = event.timestamp ?? Date.now();
  }

  recordParallelExecution(count: number): void {
    this.parallelBatches += 1;
    this.parallelExecutions += count;
  }

  recordRegistryOperation(): void {
    this.registryOperations += 1;
  }

  toolMetrics(toolName: string): ToolMetrics | undefined {
    const m = this.tools.get(toolName);
    return m === undefined ? undefined : snapshot(toolName, m);
  }

  allToolMetrics(): ToolMetrics[] {
    return Array.from(this.tools, ([name, m]) => snapshot(name, m));
  }

  globalMetrics(): GlobalMetrics {
    let total = this.unknownTool.total;
    let successes = 0;
    let duration = this.unknownTool.totalDurationMs;
    for (const m of this.tools.values()) {
      total += m.total;
      successes += m.successes;
      duration += m.totalDurationMs;
    }
    return {
      totalExecutions: total,
      successfulExecutions: successes,
      failedExecutions: total - successes,
      parallelBatches: this.parallelBatches,
      parallelExecutions: this.parallelExecutions,
      registryOperations: this.registryOperations,
      unknownToolExecutions: this.unknownTool.total,
      avgDurationMs: rate(duration, total),
      errorRate: rate(total - successes, total),
      since: this.since,
    };
  }

  /**
   * Human-readable summary, one line per tool.
   */
  report(): string {
    const g = this.globalMetrics();
    const lines = [
      `Executions: ${g.totalExecutions} (${g.successfulExecutions} ok, ${g.failedExecutions} failed), ` +
        `error rate ${(g.errorRate * 100).toFixed(1)}%, avg ${g.avgDurationMs.toFixed(1)}ms`,
      `Parallel batches: ${g.parallelBatches} (${g.parallelExecutions} executions)`,
      `Registry operations: ${g.registryOperations}`,
    ];
    if (g.unknownToolExecutions > 0) {
      lines.push(`Unknown tool calls: ${g.unknownToolExecutions}`);
    }
    for (const t of this.allToolMetrics()) {
      lines.push(
        `  ${t.toolName}: ${t.totalExecutions} runs, ${(t.successRate * 100).toFixed(1)}% ok, ` +
          `avg ${t.avgDurationMs.toFixed(1)}ms (min ${t.minDurationMs.toFixed(1)}, max ${t.maxDurationMs.toFixed(1)})`,
      );
    }
    return lines.join('\n');
  }

  reset(): void {
    this.tools = new Map();
    this.parallelBatches = 0;
    this.parallelExecutions = 0;
    this.registryOperations = 0;
    this.unknownTool = { total: 0, totalDurationMs: 0 };
    this.since = Date.now();
  }
}

function snapshot(toolName: string, m: MutableToolMetrics): ToolMetrics {
  return {
    toolName,
    totalExecutions: m.total,
    successfulExecutions: m.successes,
    failedExecutions: m.failures,
    totalDurationMs: m.totalDurationMs,
    avgDurationMs: rate(m.totalDurationMs, m.total),
    minDurationMs: m.total === 0 ? 0 : m.minDurationMs,
    maxDurationMs: m.maxDurationMs,
    lastExecutionAt: m.lastExecutionAt,
    errorCounts: { ...m.errorCounts },
    successRate: rate(m.successes, m.total),
    failureRate: rate(m.failures, m.total),
  };
}
