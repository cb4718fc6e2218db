import { describe, it, expect, beforeEach } from 'vitest';
import { MetricsCollector } from './MetricsCollector.js';

describe('MetricsCollector', () => {
  let metrics: MetricsCollector;

  beforeEach(() => {
    metrics = new MetricsCollector();
  });

  it('starts empty', () => {
    expect(metrics.toolMetrics('add')).toBeUndefined();
    expect(metrics.allToolMetrics()).toEqual([]);
    expect(metrics.globalMetrics()).toMatchObject({
      totalExecutions: 0,
      successfulExecutions: 0,
      failedExecutions: 0,
      avgDurationMs: 0,
      errorRate: 0,
    });
  });

  it('aggregates executions per tool', () => {
    metrics.recordExecution({ toolName: 'add', success: true, durationMs: 10, timestamp: 1_000 });
    metrics.recordExecution({ toolName: 'add', success: true, durationMs: 30, timestamp: 2_000 });
    metrics.recordExecution({
      toolName: 'add',
      success: false,
      durationMs: 20,
      errorKind: 'InvalidParameters',
      timestamp: 3_000,
    });
    metrics.recordExecution({ toolName: 'add', success: false, durationMs: 40, errorKind: 'TimeoutError' });
    metrics.recordExecution({ toolName: 'add', success: false, durationMs: 0, errorKind: 'TimeoutError' });

    const add = metrics.toolMetrics('add');
    expect(add).toMatchObject({
      toolName: 'add',
      totalExecutions: 5,
      successfulExecutions: 2,
      failedExecutions: 3,
      totalDurationMs: 100,
      avgDurationMs: 20,
      minDurationMs: 0,
      maxDurationMs: 40,
      errorCounts: { InvalidParameters: 1, TimeoutError: 2 },
      successRate: 0.4,
      failureRate: 0.6,
    });
  });

  it('keeps the timestamp of the last execution', () => {
    metrics.recordExecution({ toolName: 'add', success: true, durationMs: 1, timestamp: 5_000 });
    metrics.recordExecution({ toolName: 'add', success: true, durationMs: 1, timestamp: 9_000 });
    expect(metrics.toolMetrics('add')?.lastExecutionAt).toBe(9_000);
  });

  it('aggregates across tools', () => {
    metrics.recordExecution({ toolName: 'a', success: true, durationMs: 10 });
    metrics.recordExecution({ toolName: 'b', success: false, durationMs: 30, errorKind: 'ExecutionFailed' });
    metrics.recordExecution({ toolName: 'b', success: true, durationMs: 20 });
    metrics.recordExecution({ toolName: 'c', success: true, durationMs: 20 });
    metrics.recordParallelExecution(3);
    metrics.recordParallelExecution(2);
    metrics.recordRegistryOperation();

    expect(metrics.allToolMetrics().map((t) => t.toolName)).toEqual(['a', 'b', 'c']);
    expect(metrics.globalMetrics()).toMatchObject({
      totalExecutions: 4,
      successfulExecutions: 3,
      failedExecutions: 1,
      parallelBatches: 2,
      parallelExecutions: 5,
      registryOperations: 1,
      avgDurationMs: 20,
      errorRate: 0.25,
    });
  });

  it('counts unknown-tool failures in one global bucket', () => {
    for (const name of ['weather', 'wether', 'whether']) {
      metrics.recordExecution({ toolName: name, success: false, durationMs: 0, errorKind: 'NotFound' });
    }
    metrics.recordExecution({ toolName: 'add', success: true, durationMs: 8 });

    expect(metrics.allToolMetrics().map((t) => t.toolName)).toEqual(['add']);
    expect(metrics.toolMetrics('weather')).toBeUndefined();
    expect(metrics.globalMetrics()).toMatchObject({
      totalExecutions: 4,
      successfulExecutions: 1,
      failedExecutions: 3,
      unknownToolExecutions: 3,
      avgDurationMs: 2,
      errorRate: 0.75,
    });
    expect(metrics.report().split('\n')).toContain('Unknown tool calls: 3');

    metrics.reset();
    expect(metrics.globalMetrics().unknownToolExecutions).toBe(0);
  });

  it('returns snapshots that later recording does not change', () => {
    metrics.recordExecution({ toolName: 'a', success: false, durationMs: 1, errorKind: 'Unknown' });
    const before = metrics.toolMetrics('a');
    metrics.recordExecution({ toolName: 'a', success: false, durationMs: 1, errorKind: 'Unknown' });

    expect(before?.totalExecutions).toBe(1);
    expect(before?.errorCounts).toEqual({ Unknown: 1 });
  });

  it('summarises everything in a report', () => {
    metrics.recordExecution({ toolName: 'add', success: true, durationMs: 10 });
    metrics.recordExecution({ toolName: 'add', success: false, durationMs: 30, errorKind: 'ExecutionFailed' });
    metrics.recordParallelExecution(2);

    expect(metrics.report().split('\n')).toEqual([
      'Executions: 2 (1 ok, 1 failed), error rate 50.0%, avg 20.0ms',
      'Parallel batches: 1 (2 executions)',
      'Registry operations: 0',
      '  add: 2 runs, 50.0% ok, avg 20.0ms (min 10.0, max 30.0)',
    ]);
  });

  it('resets every counter', () => {
    metrics.recordExecution({ toolName: 'add', success: true, durationMs: 10 });
    metrics.recordParallelExecution(4);
    metrics.recordRegistryOperation();
    metrics.reset();

    expect(metrics.allToolMetrics()).toEqual([]);
    expect(metrics.globalMetrics()).toMatchObject({
      totalExecutions: 0,
      parallelBatches: 0,
      parallelExecutions: 0,
      registryOperations: 0,
    });
  });
});
