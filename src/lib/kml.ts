import { XMLBuilder } from 'fast-xml-parser';
import JSZip from 'jszip';
import type { Position } from 'geojson';
import { formatFolderName } from './formatters';
import type { ExportFormat, Jurisdiction, ParcelFeature, ParcelProperties, StyleOptions } from './types';

export const COLOR_PRESETS: Record<string, string> = {
  Subjects: '#009FDF',
  Quotes: '#A23F97',
  Sales: '#FF0000',
  'For Sales': '#ED7D31',
};

// KML colours are aabbggrr.
export const JURISDICTION_COLORS: Record<Jurisdiction, string> = {
  NSW: '7d0000ff',
  QLD: '7d00ff00',
  SA: '7d00ffff',
};

export const DEFAULT_PRESET = 'Subjects';
export const DEFAULT_ALPHA = 125;
export const DEFAULT_LINE_WIDTH = 2;
export const DEFAULT_LINE_COLOR = 'ffaaaaaa';
export const DEFAULT_FOLDER_NAME = 'Parcels';

const POPUP_FIELDS = [
  'id', 'name', 'jurisdiction', 'source', 'lot', 'plan', 'lotplan', 'section', 'lotidstring', 'parcel',
  'volume', 'folio', 'locality', 'shire_name', 'planlabel', 'lotnumber', 'sectionnumber', 'lot_area', 'area_ha',
];

const HEX_COLOR_PATTERN = /^#?([0-9a-f]{2})([0-9a-f]{2})([0-9a-f]{2})$/i;

const hex2 = (value: number) => value.toString(16).padStart(2, '0');

/** `#RRGGBB` plus an alpha of 0–255 → KML `aabbggrr`. */
export function colorFromHex(hex: string, alpha: number = DEFAULT_ALPHA): string {
  const match = HEX_COLOR_PATTERN.exec(hex.trim());
  if (!match) {
    throw new Error(`Invalid colour '${hex}'. Expected #RRGGBB`);
  }
  const [, red = '', green = '', blue = ''] = match;
  const a = Math.min(255, Math.max(0, Math.round(alpha)));
  return `${hex2(a)}${blue}${green}${red}`.toLowerCase();
}

export function findPreset(name: string): string | undefined {
  const wanted = name.trim().toLowerCase();
  const key = Object.keys(COLOR_PRESETS).find((preset) => preset.toLowerCase() === wanted);
  return key === undefined ? undefined : COLOR_PRESETS[key];
}

export function resolveFillColor(options: StyleOptions = {}): string {
  const presetName = options.preset ?? DEFAULT_PRESET;
  const hex = options.fillColor ?? findPreset(presetName);
  if (!hex) {
    throw new Error(`Unknown colour preset '${presetName}'. Choose one of: ${Object.keys(COLOR_PRESETS).join(', ')}`);
  }
  return colorFromHex(hex, options.alpha ?? DEFAULT_ALPHA);
}

function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

function popupValue(value: unknown): string | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? String(value) : undefined;
  }
  if (typeof value === 'string') {
    return value.trim() ? value : undefined;
  }
  return undefined;
}

export function describeFeature(properties: ParcelProperties): string {
  const rows = POPUP_FIELDS.flatMap((field) => {
    const value = popupValue(properties[field]);
    return value === undefined
      ? []
      : [`<tr><th style="text-align:left;padding-right:8px">${field}</th><td>${escapeHtml(value)}</td></tr>`];
  });
  return `<table>${rows.join('')}</table>`;
}

function ringCoordinates(ring: Position[]): string {
  const points = ring.map(([lon = 0, lat = 0]) => `${lon},${lat}`);
  const first = points[0];
  if (first !== undefined && points[points.length - 1] !== first) {
    points.push(first);
  }
  return points.join(' ');
}

function polygonNode(rings: Position[][]) {
  const [outer = [], ...holes] = rings;
  return {
    outerBoundaryIs: { LinearRing: { coordinates: ringCoordinates(outer) } },
    ...(holes.length > 0 ? { innerBoundaryIs: holes.map((hole) => ({ LinearRing: { coordinates: ringCoordinates(hole) } })) } : {}),
  };
}

function styleId(options: StyleOptions, jurisdiction: Jurisdiction): string {
  return options.colorByJurisdiction ? `parcel-${jurisdiction.toLowerCase()}` : 'parcel';
}

function styleNode(id: string, fillColor: string, options: StyleOptions) {
  return {
    '@_id': id,
    LineStyle: { color: options.lineColor ?? DEFAULT_LINE_COLOR, width: options.lineWidth ?? DEFAULT_LINE_WIDTH },
    PolyStyle: { color: fillColor, fill: 1, outline: 1 },
  };
}

function placemarkNode(feature: ParcelFeature, options: StyleOptions) {
  const { geometry, properties } = feature;
  return {
    name: properties.name || properties.id,
    description: { __cdata: describeFeature(properties) },
    styleUrl: `#${styleId(options, properties.jurisdiction)}`,
    ...(geometry.type === 'Polygon'
      ? { Polygon: polygonNode(geometry.coordinates) }
      : { MultiGeometry: { Polygon: geometry.coordinates.map(polygonNode) } }),
  };
}

/**
 * Builds a KML 2.2 document with one shared style per fill colour and one
 * placemark per feature inside a single folder.
 */
export function buildKml(features: readonly ParcelFeature[], options: StyleOptions = {}): string {
  const folderName = formatFolderName(options.folderName ?? '') || DEFAULT_FOLDER_NAME;

  const styles = options.colorByJurisdiction
    ? [...new Set(features.map((feature) => feature.properties.jurisdiction))].map((jurisdiction) =>
        styleNode(styleId(options, jurisdiction), JURISDICTION_COLORS[jurisdiction], options)
      )
    : [styleNode('parcel', resolveFillColor(options), options)];

  const builder = new XMLBuilder({
    ignoreAttributes: false,
    attributeNamePrefix: '@_',
    cdataPropName: '__cdata',
    format: true,
    indentBy: '  ',
    suppressEmptyNode: true,
  });

  const xml: string = builder.build({
    '?xml': { '@_version': '1.0', '@_encoding': 'UTF-8' },
    kml: {
      '@_xmlns': 'http://www.opengis.net/kml/2.2',
      Document: {
        name: folderName,
        Style: styles,
        Folder: {
          name: folderName,
          Placemark: features.map((feature) => placemarkNode(feature, options)),
        },
      },
    },
  });

  return xml;
}

export async function buildKmz(features: readonly ParcelFeature[], options: StyleOptions = {}): Promise<Buffer> {
  const zip = new JSZip();
  zip.file('doc.kml', buildKml(features, options));
  return zip.generateAsync({ type: 'nodebuffer', compression: 'DEFLATE' });
}

export function buildGeoJson(features: readonly ParcelFeature[]): string {
  return JSON.stringify({ type: 'FeatureCollection', features }, null, 2);
}

export async function renderExport(
  features: readonly ParcelFeature[],
  format: ExportFormat,
  options: StyleOptions = {}
): Promise<string | Buffer> {
  switch (format) {
    case 'kml':
      return buildKml(features, options);
    case 'kmz':
      return buildKmz(features, options);
    case 'geojson':
      return buildGeoJson(features);
  }
}
