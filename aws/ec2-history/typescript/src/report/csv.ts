/**
 * CSV and text rendering of a lifecycle report.
 * @module report/csv
 */

import { isStillRunning } from '../types/records.js';
import type { Timestamp } from '../types/records.js';
import type { LifecycleReport } from './types.js';

export const CSV_HEADER = ['Region', 'InstanceID', 'InstanceType', 'LaunchTime', 'TerminationTime'] as const;

export const STILL_RUNNING_LABEL = 'Still Running';

/**
 * ISO-8601 UTC without milliseconds, e.g. `2024-12-01T08:30:00Z`.
 */
export function formatTimestamp(timestamp: Timestamp): string {
  return new Date(timestamp).toISOString().replace(/\.\d{3}Z$/, 'Z');
}

/**
 * Quotes a field when it contains a comma, quote or line break (RFC 4180).
 */
export function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/**
 * Renders the lifecycle records, one line per instance, header first.
 */
export function renderCsv(report: LifecycleReport): string {
  const lines = [CSV_HEADER.join(',')];

  for (const record of report.records) {
    const fields = [
      record.key.region,
      record.key.instanceId,
      record.instanceType,
      formatTimestamp(record.launchTimestamp),
      isStillRunning(record.termination) ? STILL_RUNNING_LABEL : formatTimestamp(record.termination),
    ];
    lines.push(fields.map(escapeCsvField).join(','));
  }

  return `${lines.join('\n')}\n`;
}

/**
 * Renders the parts of the report that do not fit the CSV: orphan
 * terminations, regions that did not complete and rejected records.
 */
export function renderSummary(report: LifecycleReport): string {
  const stillRunning = report.records.filter((record) => isStillRunning(record.termination)).length;
  const lines = [
    `Window: ${formatTimestamp(report.window.start)} .. ${formatTimestamp(report.window.end)}`,
    `Instances: ${report.records.length} (${stillRunning} still running)`,
    `Orphan terminations: ${report.orphans.length}`,
  ];

  for (const orphan of report.orphans) {
    lines.push(
      `  ${orphan.key.region}/${orphan.key.instanceId} terminated ${formatTimestamp(orphan.terminationTimestamp)}`
    );
  }

  const incomplete = report.regions.filter((outcome) => outcome.status !== 'complete');
  lines.push(`Regions: ${report.regions.length} (${incomplete.length} incomplete)`);
  for (const outcome of incomplete) {
    const reason = outcome.error ? `: ${outcome.error.message}` : '';
    lines.push(`  ${outcome.region} ${outcome.status}${reason}`);
  }

  lines.push(`Rejected records: ${report.rejectedRecords.length}`);
  if (!report.complete) {
    lines.push('WARNING: report is incomplete');
  }

  return `${lines.join('\n')}\n`;
}
