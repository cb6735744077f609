import type { Feature, MultiPolygon, Polygon } from 'geojson';
import type { ParseError } from './errors';

export type Jurisdiction = 'NSW' | 'QLD' | 'SA';

export const JURISDICTIONS: readonly Jurisdiction[] = ['NSW', 'QLD', 'SA'];

export interface NswIdentifier {
  jurisdiction: 'NSW';
  id: string;
  lot: string;
  section?: string;
  plan: string;
}

export interface QldIdentifier {
  jurisdiction: 'QLD';
  id: string;
  lot: string;
  plan: string;
}

export interface SaParcelIdentifier {
  jurisdiction: 'SA';
  kind: 'parcel';
  id: string;
  lot: string;
  plan: string;
}

export interface SaTitleIdentifier {
  jurisdiction: 'SA';
  kind: 'title';
  id: string;
  volume: string;
  folio: string;
  register?: string;
}

export type SaIdentifier = SaParcelIdentifier | SaTitleIdentifier;

export type ParcelIdentifier = NswIdentifier | QldIdentifier | SaIdentifier;

export type IdentifierFor<J extends Jurisdiction> = Extract<ParcelIdentifier, { jurisdiction: J }>;

// Transient: expanded into NSW identifiers before anything is queried.
export interface LotRange {
  start: number;
  end: number;
  plan: string;
}

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export type ParseOutcome =
  | { ok: true; raw: string; identifier: ParcelIdentifier }
  | { ok: false; raw: string; error: ParseError };

export interface MalformedEntry {
  raw: string;
  error: string;
}

export interface ParseResponse {
  valid: ParcelIdentifier[];
  malformed: MalformedEntry[];
}

export interface ParserOptions {
  /** Largest NSW lot span a single range entry may expand to. */
  maxRangeSize?: number;
}

export type ParcelGeometry = Polygon | MultiPolygon;

export interface ParcelProperties {
  id: string;
  jurisdiction: Jurisdiction;
  name: string;
  source: string;
  area_ha?: number;
  [key: string]: unknown;
}

export type ParcelFeature = Feature<ParcelGeometry, ParcelProperties>;

export interface QueryResult {
  jurisdiction: Jurisdiction;
  features: ParcelFeature[];
  missing: string[];
}

export interface QueryOptions {
  maxRecords?: number;
}

export type ExportFormat = 'kml' | 'kmz' | 'geojson';

export interface StyleOptions {
  /** Fill colour as `#RRGGBB`; wins over the preset. */
  fillColor?: string;
  preset?: string;
  /** Fill opacity, 0–255. */
  alpha?: number;
  lineWidth?: number;
  /** KML `aabbggrr` outline colour. */
  lineColor?: string;
  colorByJurisdiction?: boolean;
  folderName?: string;
}

export interface ExportRequest {
  features: ParcelFeature[];
  styleOptions?: StyleOptions;
}

export interface FeatureSummary {
  count: number;
  totalAreaHa: number;
  byJurisdiction: Partial<Record<Jurisdiction, number>>;
  bbox: [number, number, number, number] | null;
  center: [number, number];
}

export interface DebugEntry {
  timestamp: Date;
  method: string;
  url: string;
  duration?: number;
  status?: number;
  error?: string;
}
