import { stat, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { exportFileName } from '../../lib/formatters';
import { renderExport } from '../../lib/kml';
import { logger } from '../../lib/logger';
import type { ExportFormat, ParcelFeature, StyleOptions } from '../../lib/types';

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

/** A directory target gets the default `cadastral-parcels-…` file name. */
export async function resolveExportPath(
  target: string,
  count: number,
  format: ExportFormat,
  date: Date = new Date()
): Promise<string> {
  return (await isDirectory(target)) ? join(target, exportFileName(count, format, date)) : target;
}

export interface WrittenExport {
  path: string;
  bytes: number;
}

export async function writeExport(
  features: readonly ParcelFeature[],
  format: ExportFormat,
  target: string,
  style: StyleOptions
): Promise<WrittenExport> {
  if (features.length === 0) {
    throw new Error('Nothing to export: no parcels selected');
  }

  const path = await resolveExportPath(target, features.length, format);
  const content = await renderExport(features, format, style);
  await writeFile(path, content);

  const bytes = typeof content === 'string' ? Buffer.byteLength(content, 'utf8') : content.length;
  logger.info(`Wrote ${format.toUpperCase()} export`, { path, parcels: features.length, bytes });
  return { path, bytes };
}
