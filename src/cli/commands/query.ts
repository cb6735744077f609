/**
 * Query Command
 *
 * Parses identifiers, fetches the matching parcels from the jurisdiction's
 * cadastre service and optionally exports them.
 *
 * Usage:
 *   lotplan-kml query [entries...] --state <state> [--kml <path>] [--kmz <path>] [--geojson <path>]
 */

import type { Command } from 'commander';
import { arcgisClient, type ArcGisClient } from '../../lib/api';
import { createAdapters, queryParcels } from '../../lib/adapters';
import { getConfig } from '../../lib/config';
import { summarizeFeatures } from '../../lib/features';
import { resolveFillColor } from '../../lib/kml';
import { logger } from '../../lib/logger';
import { parseParcelInput } from '../../lib/parsers';
import type { Jurisdiction } from '../../lib/types';
import { writeExport, type WrittenExport } from '../lib/export';
import { collectInput } from '../lib/input';
import {
  exportTargets,
  integerOption,
  parseHexColor,
  parseJurisdiction,
  parsePreset,
  styleFromFlags,
  type ExportFlags,
  type StyleFlags,
} from '../lib/options';
import {
  formatDebugEntries,
  formatFeatureTable,
  formatJson,
  formatMissing,
  formatSummary,
} from '../lib/output';

export interface QueryCommandOptions extends StyleFlags, ExportFlags {
  readonly state: Jurisdiction;
  readonly file?: string;
  readonly maxRecords?: number;
  readonly debug?: boolean;
  readonly json?: boolean;
}

/** Exits 1 when a jurisdiction's service failed. */
export async function executeQuery(
  entries: readonly string[],
  options: QueryCommandOptions,
  client: ArcGisClient = arcgisClient
): Promise<number> {
  const config = getConfig();
  const text = await collectInput({ entries, file: options.file });

  const parsed = parseParcelInput(options.state, text, { maxRangeSize: config.maxRangeSize });
  for (const entry of parsed.malformed) {
    logger.warn(`Skipping '${entry.raw}'`, { reason: entry.error });
  }
  if (parsed.valid.length === 0) {
    throw new Error('No valid parcel identifiers to query');
  }

  const style = styleFromFlags(options, config);
  resolveFillColor(style);
  const targets = exportTargets(options);

  try {
    const response = await queryParcels(
      parsed.valid,
      { maxRecords: options.maxRecords ?? config.maxRecords },
      createAdapters(client)
    );
    const summary = summarizeFeatures(response.features);

    const written: WrittenExport[] = [];
    for (const target of targets) {
      written.push(await writeExport(response.features, target.format, target.path, style));
    }

    if (options.json) {
      console.log(
        formatJson({
          summary,
          missing: response.missing,
          malformed: parsed.malformed,
          errors: response.errors.map(({ jurisdiction, error }) => ({
            jurisdiction,
            reason: error.reason,
            message: error.message,
          })),
          exports: written,
          features: response.features,
        })
      );
    } else {
      console.log(formatFeatureTable(response.features));
      console.log('');
      console.log(formatSummary(summary));
      const missing = formatMissing(response.missing);
      if (missing) console.log(missing);
      for (const { path } of written) {
        console.log(`Saved ${path}`);
      }
    }

    return response.errors.length > 0 ? 1 : 0;
  } finally {
    if (options.debug) {
      console.error(formatDebugEntries(client.getDebugEntries()));
    }
  }
}

export function registerQueryCommand(parent: Command): void {
  parent
    .command('query [entries...]')
    .description('Query parcels from the cadastre service and export them')
    .requiredOption('-s, --state <state>', 'Jurisdiction: NSW|QLD|SA', parseJurisdiction)
    .option('-f, --file <path>', 'Read identifiers from a file')
    .option('--kml <path>', 'Write a KML file (a directory gets the default file name)')
    .option('--kmz <path>', 'Write a KMZ file')
    .option('--geojson <path>', 'Write a GeoJSON file')
    .option('--preset <name>', 'Fill colour preset: Subjects|Quotes|Sales|For Sales', parsePreset)
    .option('--color <hex>', 'Fill colour as #RRGGBB (overrides --preset)', parseHexColor)
    .option('--opacity <0-255>', 'Fill opacity', integerOption(0, 255))
    .option('--line-width <px>', 'Border width', integerOption(1, 10))
    .option('--color-by-state', 'Colour parcels by jurisdiction')
    .option('--folder <name>', 'KML folder name')
    .option('--max-records <n>', 'Records requested per query', integerOption(1))
    .option('--debug', 'Print the request log')
    .option('--json', 'Output as JSON')
    .action(async (entries: string[], options: QueryCommandOptions) => {
      process.exitCode = await executeQuery(entries, options);
    });
}
