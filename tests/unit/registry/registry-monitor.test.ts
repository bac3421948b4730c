/**
 * @fileoverview Unit tests for RegistryMonitor
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import { LATENCY_WINDOW_SIZE, RegistryMonitor } from '../../../src';

describe('RegistryMonitor', () => {
  const clock = new Date('2026-03-01T12:00:00Z');
  let monitor: RegistryMonitor;

  beforeEach(() => {
    monitor = new RegistryMonitor(() => clock);
  });

  it('should count hits and misses, treating a miss as an error', () => {
    monitor.recordRequest('tools', 'get_players', true, 1);
    monitor.recordRequest('tools', 'get_players', true, 2);
    monitor.recordRequest('tools', 'get_fixtures', true, 3);
    monitor.recordRequest('tools', 'unknown', false, 2);

    expect(monitor.getMetrics('tools')).toEqual({
      registryName: 'tools',
      totalItems: 0,
      totalRequests: 4,
      hits: 3,
      misses: 1,
      averageLatencyMs: 2,
      errorCount: 1,
      lastUpdated: clock,
    });
  });

  it('should average latency over the most recent window only', () => {
    for (let sample = 1; sample <= 150; sample++) {
      monitor.recordRequest('tools', 'get_players', true, sample);
    }

    expect(LATENCY_WINDOW_SIZE).toBe(100);
    // mean of 51..150
    expect(monitor.getMetrics('tools')?.averageLatencyMs).toBe(100.5);
    expect(monitor.getMetrics('tools')?.totalRequests).toBe(150);
  });

  it('should record item counts', () => {
    monitor.recordItemCount('commands', 4);

    expect(monitor.getMetrics('commands')?.totalItems).toBe(4);
  });

  it('should return copies of the metrics', () => {
    monitor.recordRequest('tools', 'get_players', true, 1);
    const metrics = monitor.getMetrics('tools');
    if (metrics) metrics.hits = 99;

    expect(monitor.getMetrics('tools')?.hits).toBe(1);
  });

  it('should build a performance report with per-registry and total figures', () => {
    monitor.recordItemCount('tools', 2);
    monitor.recordItemCount('commands', 3);
    monitor.recordRequest('tools', 'get_players', true, 1);
    monitor.recordRequest('tools', 'get_players', true, 1);
    monitor.recordRequest('tools', 'get_players', true, 1);
    monitor.recordRequest('tools', 'get_fixtures', false, 1);
    monitor.recordRequest('commands', '/list', true, 1);

    const report = monitor.getPerformanceReport();

    expect(report.registries.tools).toEqual({
      totalRequests: 4,
      hitRate: 75,
      averageLatencyMs: 1,
      errorCount: 1,
      totalItems: 2,
      topItems: [
        { name: 'get_players', requests: 3 },
        { name: 'get_fixtures', requests: 1 },
      ],
    });
    expect(report.totals).toEqual({
      registries: 2,
      totalItems: 5,
      totalRequests: 5,
      hitRate: 80,
      errorCount: 1,
    });
    expect(report.generatedAt).toBe(clock);
  });

  it('should report a zero hit rate for a registry without requests', () => {
    monitor.recordItemCount('services', 1);

    expect(monitor.getPerformanceReport().registries.services?.hitRate).toBe(0);
  });

  it('should ignore records while disabled', () => {
    monitor.disable();
    monitor.recordRequest('tools', 'get_players', true, 1);
    monitor.recordItemCount('tools', 1);

    expect(monitor.isEnabled()).toBe(false);
    expect(monitor.getMetrics('tools')).toBeUndefined();

    monitor.enable();
    monitor.recordItemCount('tools', 1);
    expect(monitor.getMetrics()).toHaveLength(1);
  });

  it('should reset one registry or all of them', () => {
    monitor.recordItemCount('tools', 1);
    monitor.recordItemCount('commands', 1);

    monitor.resetMetrics('tools');
    expect(monitor.getMetrics().map((metrics) => metrics.registryName)).toEqual(['commands']);

    monitor.resetMetrics();
    expect(monitor.getMetrics()).toEqual([]);
  });
});
