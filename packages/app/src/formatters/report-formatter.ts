/**
 * Text and JSON renderings of health, sweep and anomaly output
 */

import type { AnomalyRecord } from '@barwatch/contracts';
import type { RetentionSweepResult } from '@barwatch/bar-store';
import type { HealthReport } from '../health.js';
import type { OutputFormat } from '../commands/types.js';

export function formatAge(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  const totalSeconds = Math.floor(ms / 1000);
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;

  if (hours > 0) {
    return `${hours}h ${minutes}m`;
  }
  if (minutes > 0) {
    return `${minutes}m ${seconds}s`;
  }
  return `${seconds}s`;
}

export function formatBytes(bytes: number): string {
  if (bytes < 1024) {
    return `${bytes} B`;
  }
  if (bytes < 1024 * 1024) {
    return `${(bytes / 1024).toFixed(1)} KB`;
  }
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

export function formatTime(timestamp: number | null): string {
  return timestamp === null ? 'never' : new Date(timestamp).toISOString();
}

function formatPercent(value: number): string {
  const sign = value >= 0 ? '+' : '';
  return `${sign}${(value * 100).toFixed(2)}%`;
}

export function formatHealthReport(report: HealthReport, format: OutputFormat = 'text'): string {
  if (format === 'json') {
    return JSON.stringify(report, null, 2);
  }

  return [
    `Status: ${report.status.toUpperCase()}`,
    `Checked: ${formatTime(report.checkedAt)}`,
    `Stored bars: ${report.storedRowCount}`,
    `Oldest bar age: ${report.oldestBarAge === null ? 'n/a' : formatAge(report.oldestBarAge)}`,
    `Universe size: ${report.activeUniverseSize}`,
    `Last scoring pass: ${formatTime(report.lastScoringPassTime)}`,
    `Last retention sweep: ${formatTime(report.lastRetentionSweepTime)}`,
    `Anomaly records: ${report.anomalyRowCount}`,
    `Estimated storage: ${formatBytes(report.estimatedStorageBytes)}`,
    `Degraded instruments: ${report.degradedInstruments.length === 0 ? 'none' : report.degradedInstruments.join(', ')}`,
    `Retention failures: ${report.retentionFailures}`,
  ].join('\n');
}

export function formatSweepResult(result: RetentionSweepResult, format: OutputFormat = 'text'): string {
  if (format === 'json') {
    return JSON.stringify(
      {
        ...result,
        steps: result.steps.map((step) => ({
          step: step.step,
          deleted: step.deleted,
          error: step.error?.message,
        })),
      },
      null,
      2
    );
  }

  const lines = [`Retention sweep finished in ${result.durationMs}ms`, `Cutoff: ${formatTime(result.cutoff)}`];
  for (const step of result.steps) {
    lines.push(
      step.error === undefined ? `  ${step.step}: ${step.deleted} deleted` : `  ${step.step}: failed (${step.error.message})`
    );
  }
  lines.push(`Total deleted: ${result.totalDeleted}`);
  lines.push(`Failures: ${result.failures}`);
  return lines.join('\n');
}

export function formatAnomalies(records: readonly AnomalyRecord[], format: OutputFormat = 'text'): string {
  if (format === 'json') {
    return JSON.stringify(records, null, 2);
  }
  if (records.length === 0) {
    return 'No anomaly records found';
  }

  const lines = [`Found ${records.length} record(s)`];
  for (const record of records) {
    const reasons = record.reasons.length === 0 ? '-' : record.reasons.join(',');
    lines.push(
      [
        formatTime(record.timestamp),
        record.instrument.padEnd(12),
        record.intervalType.padEnd(4),
        `score ${record.compositeScore.toFixed(2)}`,
        `return ${formatPercent(record.currentReturn)}`,
        reasons,
      ].join('  ')
    );
  }
  return lines.join('\n');
}
