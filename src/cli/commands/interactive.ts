/**
 * Interactive Command
 *
 * Guided session: choose a jurisdiction, paste identifiers, review the
 * matches, pick parcels and export them.
 */

import { createInterface } from 'node:readline/promises';
import type { Command } from 'commander';
import { arcgisClient, type ArcGisClient } from '../../lib/api';
import { createAdapters, queryParcels } from '../../lib/adapters';
import { getConfig } from '../../lib/config';
import { errorMessage } from '../../lib/errors';
import { parseSelection, selectFeatures, summarizeFeatures } from '../../lib/features';
import { COLOR_PRESETS, findPreset } from '../../lib/kml';
import {
  EXAMPLE_INPUT,
  createParcelInputState,
  updateRawInput,
  updateSelectedState,
} from '../../lib/parcelInput';
import type { ExportFormat, Jurisdiction, Result } from '../../lib/types';
import { writeExport } from '../lib/export';
import { parseJurisdiction, styleFromFlags } from '../lib/options';
import { formatFeatureTable, formatMissing, formatParseReport, formatSummary } from '../lib/output';

/** The part of a readline interface the session needs. */
export interface Prompt {
  question(query: string): Promise<string>;
}

async function ask<T>(prompt: Prompt, query: string, parse: (answer: string) => Result<T, string>, print: (line: string) => void): Promise<T> {
  for (;;) {
    const result = parse((await prompt.question(query)).trim());
    if (result.ok) {
      return result.value;
    }
    print(result.error);
  }
}

async function readBlock(prompt: Prompt): Promise<string> {
  const lines: string[] = [];
  for (;;) {
    const line = await prompt.question('> ');
    if (!line.trim()) {
      return lines.join('\n');
    }
    lines.push(line);
  }
}

function parseFormat(answer: string): Result<ExportFormat, string> {
  const format = answer.toLowerCase() || 'kml';
  return format === 'kml' || format === 'kmz' || format === 'geojson'
    ? { ok: true, value: format }
    : { ok: false, error: `Unknown format '${answer}'. Use kml, kmz or geojson` };
}

export async function runInteractive(
  prompt: Prompt,
  client: ArcGisClient = arcgisClient,
  print: (line: string) => void = console.log
): Promise<number> {
  const config = getConfig();
  const parserOptions = { maxRangeSize: config.maxRangeSize };

  const jurisdiction = await ask(
    prompt,
    'State [NSW/QLD/SA] (NSW): ',
    (answer): Result<Jurisdiction, string> => {
      try {
        return { ok: true, value: answer ? parseJurisdiction(answer) : 'NSW' };
      } catch (error) {
        return { ok: false, error: errorMessage(error) };
      }
    },
    print
  );

  let input = updateSelectedState(createParcelInputState(), jurisdiction, parserOptions);

  print(`Paste ${jurisdiction} identifiers, one per line. Finish with a blank line. For example:`);
  print(EXAMPLE_INPUT[jurisdiction]);

  input = updateRawInput(input, await readBlock(prompt), parserOptions);
  print(formatParseReport({ valid: input.validParcels, malformed: input.malformedEntries }));

  if (!input.isValid) {
    print('Nothing to query.');
    return 1;
  }

  const response = await queryParcels(input.validParcels, { maxRecords: config.maxRecords }, createAdapters(client));
  const missing = formatMissing(response.missing);

  if (response.features.length === 0) {
    print('No parcels found.');
    if (missing) print(missing);
    return 1;
  }

  print(formatFeatureTable(response.features));
  print(formatSummary(summarizeFeatures(response.features)));
  if (missing) print(missing);

  const indexes = await ask(
    prompt,
    'Parcels to export, e.g. 1,3-5 (all): ',
    (answer) => parseSelection(answer || 'all', response.features.length),
    print
  );
  const selected = selectFeatures(response.features, indexes);
  if (selected.length === 0) {
    print('Nothing selected.');
    return 0;
  }

  const format = await ask(prompt, 'Format [kml/kmz/geojson] (kml): ', parseFormat, print);

  const preset = await ask(
    prompt,
    `Colour preset [${Object.keys(COLOR_PRESETS).join('/')}] (${config.export.preset}): `,
    (answer): Result<string, string> =>
      !answer || findPreset(answer) ? { ok: true, value: answer || config.export.preset } : { ok: false, error: `Unknown preset '${answer}'` },
    print
  );

  const folder = (await prompt.question(`Folder name (${config.export.folderName}): `)).trim();
  const target = (await prompt.question('Save to (current directory): ')).trim() || '.';

  const written = await writeExport(selected, format, target, styleFromFlags({ preset, folder: folder || undefined }, config));
  print(`Saved ${written.path}`);
  return 0;
}

export function registerInteractiveCommand(parent: Command): void {
  parent
    .command('interactive')
    .description('Step through parsing, querying and exporting parcels')
    .action(async () => {
      const rl = createInterface({ input: process.stdin, output: process.stdout });
      try {
        process.exitCode = await runInteractive(rl);
      } finally {
        rl.close();
      }
    });
}
