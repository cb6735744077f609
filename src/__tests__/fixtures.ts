/**
 * Shared test fixtures: parcel features and stubbed service responses.
 */

import type { Position } from 'geojson';
import type { Jurisdiction, ParcelFeature } from '../lib/types';

export type FetchInput = string | URL | Request;

export function jsonResponse(body: unknown, init: ResponseInit = {}): Response {
  return new Response(JSON.stringify(body), {
    status: 200,
    headers: { 'Content-Type': 'application/json' },
    ...init,
  });
}

export function requestUrl(input: FetchInput): URL {
  return new URL(input instanceof Request ? input.url : String(input));
}

/** Closed square ring with its south-west corner at `[lon, lat]`. */
export function squareRing(lon: number, lat: number, size = 0.001): Position[] {
  return [
    [lon, lat],
    [lon + size, lat],
    [lon + size, lat + size],
    [lon, lat + size],
    [lon, lat],
  ];
}

export function rawParcel(properties: Record<string, unknown>, ring: Position[] = squareRing(151.2, -33.8)) {
  return {
    type: 'Feature',
    geometry: { type: 'Polygon', coordinates: [ring] },
    properties,
  };
}

export function featureCollection(features: unknown[], extra: Record<string, unknown> = {}) {
  return { type: 'FeatureCollection', features, ...extra };
}

export function parcelFeature(
  id: string,
  jurisdiction: Jurisdiction,
  ring: Position[] = squareRing(151.2, -33.8),
  areaHa = 1
): ParcelFeature {
  return {
    type: 'Feature',
    geometry: { type: 'Polygon', coordinates: [ring] },
    properties: { id, jurisdiction, name: id, source: `${jurisdiction}_test`, area_ha: areaHa },
  };
}
