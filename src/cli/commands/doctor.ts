/**
 * Doctor Command
 *
 * Checks every configured cadastre layer is reachable and answers queries.
 */

import type { Command } from 'commander';
import { arcgisClient, type ArcGisClient } from '../../lib/api';
import { getConfig } from '../../lib/config';
import { NetworkDiagnostics } from '../../lib/diagnostics';
import { formatDiagnostics, formatJson } from '../lib/output';

export interface DoctorCommandOptions {
  readonly json?: boolean;
}

export async function executeDoctor(options: DoctorCommandOptions, client: ArcGisClient = arcgisClient): Promise<number> {
  const results = await new NetworkDiagnostics(client).runDiagnostics(getConfig().services);

  console.log(options.json ? formatJson(results) : formatDiagnostics(results));
  return results.some((result) => result.status === 'fail') ? 1 : 0;
}

export function registerDoctorCommand(parent: Command): void {
  parent
    .command('doctor')
    .description('Run connectivity checks against the configured cadastre services')
    .option('--json', 'Output as JSON')
    .action(async (options: DoctorCommandOptions) => {
      process.exitCode = await executeDoctor(options);
    });
}
