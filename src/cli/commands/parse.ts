/**
 * Parse Command
 *
 * Normalizes parcel identifiers without querying anything.
 *
 * Usage:
 *   lotplan-kml parse [entries...] --state <state> [--file <path>] [--json]
 */

import type { Command } from 'commander';
import { getConfig } from '../../lib/config';
import { parseParcelInput } from '../../lib/parsers';
import type { Jurisdiction } from '../../lib/types';
import { collectInput } from '../lib/input';
import { parseJurisdiction } from '../lib/options';
import { formatJson, formatParseReport } from '../lib/output';

export interface ParseCommandOptions {
  readonly state: Jurisdiction;
  readonly file?: string;
  readonly json?: boolean;
}

/** Exits 1 when no entry parsed. */
export async function executeParse(entries: readonly string[], options: ParseCommandOptions): Promise<number> {
  const text = await collectInput({ entries, file: options.file });
  const response = parseParcelInput(options.state, text, { maxRangeSize: getConfig().maxRangeSize });

  console.log(options.json ? formatJson(response) : formatParseReport(response));
  return response.valid.length > 0 ? 0 : 1;
}

export function registerParseCommand(parent: Command): void {
  parent
    .command('parse [entries...]')
    .description('Parse lot/plan identifiers and report malformed entries')
    .requiredOption('-s, --state <state>', 'Jurisdiction: NSW|QLD|SA', parseJurisdiction)
    .option('-f, --file <path>', 'Read identifiers from a file')
    .option('--json', 'Output as JSON')
    .action(async (entries: string[], options: ParseCommandOptions) => {
      process.exitCode = await executeParse(entries, options);
    });
}
