/**
 * Output formatting for CLI commands. Everything here returns text; the
 * commands decide where it is written.
 */

import type { DiagnosticResult } from '../../lib/diagnostics';
import { formatArea } from '../../lib/formatters';
import { formatIdentifier } from '../../lib/parsers';
import type { DebugEntry, FeatureSummary, ParcelFeature, ParseResponse } from '../../lib/types';

export interface TableColumn<T> {
  readonly header: string;
  readonly align?: 'left' | 'right';
  readonly value: (row: T) => string;
}

function padCell(value: string, width: number, align: 'left' | 'right'): string {
  return align === 'right' ? value.padStart(width) : value.padEnd(width);
}

export function formatTable<T>(rows: readonly T[], columns: readonly TableColumn<T>[]): string {
  if (rows.length === 0) {
    return 'No entries found.';
  }

  const cells = rows.map((row) => columns.map((column) => column.value(row)));
  const widths = columns.map((column, i) =>
    Math.max(column.header.length, ...cells.map((row) => (row[i] ?? '').length))
  );

  const line = (values: readonly string[]) =>
    values
      .map((value, i) => padCell(value, widths[i] ?? 0, columns[i]?.align ?? 'left'))
      .join(' | ')
      .trimEnd();

  const separator = widths.map((width) => '-'.repeat(width)).join('-+-');

  return [line(columns.map((column) => column.header)), separator, ...cells.map(line)].join('\n');
}

export function formatJson<T>(data: T, pretty = true): string {
  return pretty ? JSON.stringify(data, null, 2) : JSON.stringify(data);
}

export function formatParseReport(response: ParseResponse): string {
  const lines = [`Valid: ${response.valid.length}`];
  for (const identifier of response.valid) {
    lines.push(`  ${formatIdentifier(identifier)}`);
  }

  if (response.malformed.length > 0) {
    lines.push(`Malformed: ${response.malformed.length}`);
    for (const entry of response.malformed) {
      lines.push(`  ${entry.raw}: ${entry.error}`);
    }
  }

  return lines.join('\n');
}

export function formatFeatureTable(features: readonly ParcelFeature[]): string {
  return formatTable(
    features.map((feature, index) => ({ index: index + 1, properties: feature.properties })),
    [
      { header: '#', align: 'right', value: (row) => String(row.index) },
      { header: 'State', value: (row) => row.properties.jurisdiction },
      { header: 'Id', value: (row) => row.properties.id },
      { header: 'Name', value: (row) => row.properties.name },
      {
        header: 'Area',
        align: 'right',
        value: (row) => (row.properties.area_ha === undefined ? '' : formatArea(row.properties.area_ha)),
      },
    ]
  );
}

export function formatSummary(summary: FeatureSummary): string {
  const states = Object.entries(summary.byJurisdiction)
    .map(([jurisdiction, count]) => `${jurisdiction} ${count}`)
    .join(', ');

  const lines = [`Parcels: ${summary.count}${states ? ` (${states})` : ''}`, `Total area: ${formatArea(summary.totalAreaHa)}`];
  if (summary.bbox) {
    const [lat, lon] = summary.center;
    lines.push(`Centre: ${lat.toFixed(5)}, ${lon.toFixed(5)}`);
  }
  return lines.join('\n');
}

export function formatMissing(missing: readonly string[]): string {
  return missing.length === 0 ? '' : `Not found (${missing.length}): ${missing.join(', ')}`;
}

const STATUS_LABELS: Record<DiagnosticResult['status'], string> = {
  pass: 'PASS',
  warning: 'WARN',
  fail: 'FAIL',
};

export function formatDiagnostics(results: readonly DiagnosticResult[]): string {
  return results
    .map((result) => {
      const line = `[${STATUS_LABELS[result.status]}] ${result.jurisdiction} ${result.test}: ${result.message}`;
      return result.details ? `${line}\n       ${result.details}` : line;
    })
    .join('\n');
}

export function formatDebugEntries(entries: readonly DebugEntry[]): string {
  return entries
    .map((entry) => {
      const outcome = entry.error ?? (entry.status === undefined ? 'no response' : String(entry.status));
      const duration = entry.duration === undefined ? '' : ` ${entry.duration}ms`;
      return `${entry.timestamp.toISOString()} ${entry.method} ${entry.url} -> ${outcome}${duration}`;
    })
    .join('\n');
}
