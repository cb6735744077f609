/**
 * Option parsers and the mapping from command-line flags to library options.
 */

import { InvalidArgumentError } from 'commander';
import type { Config } from '../../lib/config';
import { COLOR_PRESETS, findPreset } from '../../lib/kml';
import { JURISDICTIONS, type ExportFormat, type Jurisdiction, type StyleOptions } from '../../lib/types';

export function parseJurisdiction(value: string): Jurisdiction {
  const wanted = value.trim().toUpperCase();
  const jurisdiction = JURISDICTIONS.find((candidate) => candidate === wanted);
  if (!jurisdiction) {
    throw new InvalidArgumentError(`Unknown state '${value}'. Use one of: ${JURISDICTIONS.join(', ')}`);
  }
  return jurisdiction;
}

export function integerOption(min: number, max = Number.MAX_SAFE_INTEGER): (value: string) => number {
  return (value: string) => {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < min || parsed > max) {
      throw new InvalidArgumentError(
        max === Number.MAX_SAFE_INTEGER ? `Expected an integer >= ${min}` : `Expected an integer from ${min} to ${max}`
      );
    }
    return parsed;
  };
}

export function parsePreset(value: string): string {
  if (!findPreset(value)) {
    throw new InvalidArgumentError(`Unknown preset '${value}'. Use one of: ${Object.keys(COLOR_PRESETS).join(', ')}`);
  }
  return value;
}

export function parseHexColor(value: string): string {
  const trimmed = value.trim();
  if (!/^#?[0-9a-f]{6}$/i.test(trimmed)) {
    throw new InvalidArgumentError(`Invalid colour '${value}'. Expected #RRGGBB`);
  }
  return trimmed.startsWith('#') ? trimmed : `#${trimmed}`;
}

export interface StyleFlags {
  preset?: string;
  color?: string;
  opacity?: number;
  lineWidth?: number;
  folder?: string;
  colorByState?: boolean;
}

export function styleFromFlags(flags: StyleFlags, config: Config): StyleOptions {
  return {
    preset: flags.preset ?? config.export.preset,
    fillColor: flags.color,
    alpha: flags.opacity ?? config.export.alpha,
    lineWidth: flags.lineWidth ?? config.export.lineWidth,
    folderName: flags.folder ?? config.export.folderName,
    colorByJurisdiction: flags.colorByState ?? false,
  };
}

export interface ExportFlags {
  kml?: string;
  kmz?: string;
  geojson?: string;
}

export interface ExportTarget {
  format: ExportFormat;
  path: string;
}

export function exportTargets(flags: ExportFlags): ExportTarget[] {
  const targets: ExportTarget[] = [];
  if (flags.kml) targets.push({ format: 'kml', path: flags.kml });
  if (flags.kmz) targets.push({ format: 'kmz', path: flags.kmz });
  if (flags.geojson) targets.push({ format: 'geojson', path: flags.geojson });
  return targets;
}
