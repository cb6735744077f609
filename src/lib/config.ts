import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { z } from 'zod';
import { ConfigError, errorMessage } from './errors';
import { logger } from './logger';
import { JURISDICTIONS, type Jurisdiction } from './types';

export const CONFIG_FILE_NAME = 'lotplan-kml.config.json';
export const CONFIG_ENV_VAR = 'LOTPLAN_KML_CONFIG';

const serviceSchema = z.object({
  url: z.string().url(),
  source: z.string().min(1).optional(),
});

const configSchema = z
  .object({
    services: z
      .object({
        NSW: serviceSchema.partial(),
        QLD: serviceSchema.partial(),
        SA: serviceSchema.partial(),
      })
      .partial(),
    requestTimeoutMs: z.number().int().positive(),
    maxRecords: z.number().int().positive(),
    maxRangeSize: z.number().int().positive(),
    logLevel: z.enum(['debug', 'info', 'warn', 'error']),
    export: z
      .object({
        preset: z.string().min(1),
        alpha: z.number().int().min(0).max(255),
        lineWidth: z.number().positive().max(10),
        folderName: z.string(),
      })
      .partial(),
  })
  .partial()
  .strict();

export type ConfigFile = z.infer<typeof configSchema>;

export interface ServiceConfig {
  url: string;
  source: string;
}

export interface Config {
  services: Record<Jurisdiction, ServiceConfig>;
  requestTimeoutMs: number;
  maxRecords: number;
  maxRangeSize: number;
  logLevel: 'debug' | 'info' | 'warn' | 'error';
  export: {
    preset: string;
    alpha: number;
    lineWidth: number;
    folderName: string;
  };
}

export const DEFAULT_CONFIG: Config = {
  services: {
    NSW: {
      url: 'https://maps.six.nsw.gov.au/arcgis/rest/services/public/NSW_Cadastre/MapServer/9/query',
      source: 'NSW_Cadastre',
    },
    QLD: {
      url: 'https://spatial-gis.information.qld.gov.au/arcgis/rest/services/PlanningCadastre/LandParcelPropertyFramework/MapServer/4/query',
      source: 'QLD_LPPF',
    },
    SA: {
      url: 'https://lsa2.geohub.sa.gov.au/server/rest/services/ePlanning/DAP_Parcels/MapServer/1/query',
      source: 'SA_DAP_Parcels',
    },
  },
  requestTimeoutMs: 30000,
  maxRecords: 2000,
  maxRangeSize: 500,
  logLevel: 'info',
  export: {
    preset: 'Subjects',
    alpha: 125,
    lineWidth: 2,
    folderName: 'parcels_export',
  },
};

let config: Config | null = null;

export function mergeConfig(file: ConfigFile): Config {
  const services = { ...DEFAULT_CONFIG.services };
  for (const jurisdiction of JURISDICTIONS) {
    services[jurisdiction] = { ...services[jurisdiction], ...file.services?.[jurisdiction] };
  }

  return {
    ...DEFAULT_CONFIG,
    ...file,
    services,
    export: { ...DEFAULT_CONFIG.export, ...file.export },
  };
}

export function parseConfig(data: unknown, origin = 'config'): Config {
  const parsed = configSchema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigError(`Invalid ${origin}: ${issues.join('; ')}`);
  }
  return mergeConfig(parsed.data);
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Loads the config file once. An explicitly named file must exist; the
 * default file is optional and its absence falls back to defaults.
 */
export async function loadConfig(path?: string): Promise<Config> {
  if (config) {
    return config;
  }

  const explicit = path ?? process.env[CONFIG_ENV_VAR];
  const filePath = resolve(explicit ?? CONFIG_FILE_NAME);

  let text: string;
  try {
    text = await readFile(filePath, 'utf8');
  } catch (error) {
    if (!explicit && isMissingFile(error)) {
      logger.debug('No config file found, using defaults', { path: filePath });
      config = mergeConfig({});
      return config;
    }
    throw new ConfigError(`Failed to read config ${filePath}: ${errorMessage(error)}`);
  }

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`Config ${filePath} is not valid JSON: ${errorMessage(error)}`);
  }

  config = parseConfig(data, `config ${filePath}`);
  logger.debug('Loaded config', { path: filePath });
  return config;
}

export function getConfig(): Config {
  if (!config) {
    throw new ConfigError('Config not loaded. Call loadConfig() first.');
  }
  return config;
}

export function setConfig(next: Config): Config {
  config = next;
  return config;
}

export function resetConfig(): void {
  config = null;
}
