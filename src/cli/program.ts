/**
 * lotplan-kml command-line program: global options, config loading and
 * command registration.
 */

import { readFileSync } from 'node:fs';
import { Command } from 'commander';
import { z } from 'zod';
import { loadConfig } from '../lib/config';
import { logger } from '../lib/logger';
import { registerDoctorCommand } from './commands/doctor';
import { registerInteractiveCommand } from './commands/interactive';
import { registerParseCommand } from './commands/parse';
import { registerQueryCommand } from './commands/query';

export const CLI_NAME = 'lotplan-kml';

export interface GlobalOptions {
  readonly config?: string;
  readonly verbose?: boolean;
  readonly logJson?: boolean;
}

function getVersion(): string {
  try {
    const packageJson: unknown = JSON.parse(readFileSync(new URL('../../package.json', import.meta.url), 'utf-8'));
    const parsed = z.object({ version: z.string() }).safeParse(packageJson);
    return parsed.success ? parsed.data.version : '0.0.0';
  } catch {
    return '0.0.0';
  }
}

export async function initializeContext(options: GlobalOptions): Promise<void> {
  const config = await loadConfig(options.config);
  logger.configure({
    level: options.verbose ? 'debug' : config.logLevel,
    json: Boolean(options.logJson),
  });
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name(CLI_NAME)
    .description('Look up NSW, QLD and SA cadastre parcels by lot/plan and export them as KML')
    .version(getVersion(), '-V, --version', 'Output the version number')
    .option('--config <path>', 'Path to config file (default: lotplan-kml.config.json)')
    .option('-v, --verbose', 'Enable debug logging')
    .option('--log-json', 'Write log lines as JSON')
    .hook('preAction', async (thisCommand) => {
      await initializeContext(thisCommand.opts<GlobalOptions>());
    });

  registerParseCommand(program);
  registerQueryCommand(program);
  registerDoctorCommand(program);
  registerInteractiveCommand(program);

  return program;
}
