import { bbox } from '@turf/bbox';
import type { FeatureSummary, Jurisdiction, ParcelFeature, Result } from './types';
import { roundTo } from './utils';

// Centre of Australia, used when there is nothing to frame.
export const DEFAULT_CENTER: [number, number] = [-25.2744, 133.7751];

export function summarizeFeatures(features: readonly ParcelFeature[]): FeatureSummary {
  const byJurisdiction: Partial<Record<Jurisdiction, number>> = {};
  let totalAreaHa = 0;

  for (const feature of features) {
    const { jurisdiction, area_ha: areaHa } = feature.properties;
    byJurisdiction[jurisdiction] = (byJurisdiction[jurisdiction] ?? 0) + 1;
    totalAreaHa += areaHa ?? 0;
  }

  if (features.length === 0) {
    return { count: 0, totalAreaHa: 0, byJurisdiction, bbox: null, center: DEFAULT_CENTER };
  }

  const [minX, minY, maxX, maxY] = bbox({ type: 'FeatureCollection', features: [...features] });

  return {
    count: features.length,
    totalAreaHa: roundTo(totalAreaHa, 4),
    byJurisdiction,
    bbox: [minX, minY, maxX, maxY],
    center: [(minY + maxY) / 2, (minX + maxX) / 2],
  };
}

/**
 * Parses a 1-based selection such as `1,3-5`, `all` or `none` into sorted
 * 0-based indexes.
 */
export function parseSelection(text: string, count: number): Result<number[], string> {
  const trimmed = text.trim().toLowerCase();
  if (trimmed === 'all' || trimmed === '*') {
    return { ok: true, value: Array.from({ length: count }, (_, index) => index) };
  }
  if (trimmed === '' || trimmed === 'none') {
    return { ok: true, value: [] };
  }

  const selected = new Set<number>();
  for (const token of trimmed.split(/[\s,]+/).filter(Boolean)) {
    const match = /^(\d+)(?:-(\d+))?$/.exec(token);
    if (!match) {
      return { ok: false, error: `Invalid selection '${token}'` };
    }

    const start = Number.parseInt(match[1] ?? '', 10);
    const end = match[2] === undefined ? start : Number.parseInt(match[2], 10);
    if (start > end) {
      return { ok: false, error: `Selection range '${token}' runs backwards` };
    }
    if (start < 1 || end > count) {
      return { ok: false, error: `Selection '${token}' is outside 1-${count}` };
    }

    for (let position = start; position <= end; position += 1) {
      selected.add(position - 1);
    }
  }

  return { ok: true, value: [...selected].sort((a, b) => a - b) };
}

export function selectFeatures(features: readonly ParcelFeature[], indexes: readonly number[]): ParcelFeature[] {
  return indexes.flatMap((index) => {
    const feature = features[index];
    return feature ? [feature] : [];
  });
}
