import { area } from '@turf/area';
import { z } from 'zod';
import { arcgisClient, type ArcGisClient, type RawFeature } from '../api';
import { getConfig, type ServiceConfig } from '../config';
import { QueryError } from '../errors';
import { logger } from '../logger';
import type { ParcelFeature, ParcelGeometry, ParcelIdentifier, QueryOptions, QueryResult } from '../types';
import { attributeText, roundTo, unique } from '../utils';

const position = z.array(z.number()).min(2);

const parcelGeometrySchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('Polygon'), coordinates: z.array(z.array(position)) }),
  z.object({ type: z.literal('MultiPolygon'), coordinates: z.array(z.array(z.array(position))) }),
]);

// Attribute names tried, in order, for a parcel's display name.
const NAME_FIELDS = ['lotplan', 'lotidstring', 'planparcel', 'plan'];

export interface AdapterOptions {
  client?: ArcGisClient;
  /** Overrides the configured service for this adapter. */
  service?: ServiceConfig;
}

/**
 * Queries one jurisdiction's cadastre layer. Subclasses describe how
 * identifiers become where clauses and how returned attributes map back to
 * the identifiers that asked for them.
 */
export abstract class CadastreAdapter<I extends ParcelIdentifier> {
  abstract readonly jurisdiction: I['jurisdiction'];

  protected readonly client: ArcGisClient;
  private readonly serviceOverride?: ServiceConfig;

  constructor(options: AdapterOptions = {}) {
    this.client = options.client ?? arcgisClient;
    this.serviceOverride = options.service;
  }

  abstract buildWhere(identifiers: readonly I[]): string[];

  /** Key an identifier is matched on. */
  abstract identifierKey(identifier: I): string;

  /** Keys a returned feature can satisfy. */
  abstract featureKeys(attributes: Record<string, unknown>): string[];

  /** Id for a feature no requested identifier claimed. */
  protected abstract fallbackId(attributes: Record<string, unknown>): string;

  get service(): ServiceConfig {
    return this.serviceOverride ?? getConfig().services[this.jurisdiction];
  }

  async query(identifiers: readonly I[], options: QueryOptions = {}): Promise<QueryResult> {
    const clauses = this.buildWhere(identifiers);
    if (clauses.length === 0) {
      return { jurisdiction: this.jurisdiction, features: [], missing: [] };
    }

    const { url, source } = this.service;
    const maxRecords = options.maxRecords ?? getConfig().maxRecords;

    const byKey = new Map<string, I>();
    for (const identifier of identifiers) {
      const key = this.identifierKey(identifier);
      if (!byKey.has(key)) {
        byKey.set(key, identifier);
      }
    }

    const features: ParcelFeature[] = [];
    const matched = new Set<string>();

    for (const [index, where] of clauses.entries()) {
      logger.debug(`Querying ${this.jurisdiction} cadastre`, { batch: `${index + 1}/${clauses.length}`, where });

      const collection = await this.client.queryFeatures(
        url,
        { where, outFields: '*', returnGeometry: true, resultRecordCount: maxRecords },
        { jurisdiction: this.jurisdiction }
      );

      if (collection.exceededTransferLimit) {
        logger.warn(`${this.jurisdiction} service truncated results at ${maxRecords} records`);
      }

      for (const raw of collection.features) {
        const attributes = raw.properties ?? {};
        const key = this.featureKeys(attributes).find((candidate) => byKey.has(candidate));
        const feature = this.toParcelFeature(raw, attributes, key ? byKey.get(key)?.id : undefined, source);
        if (!feature) {
          continue;
        }
        if (key) {
          matched.add(key);
        }
        features.push(feature);
      }
    }

    const missing = unique(
      identifiers.filter((identifier) => !matched.has(this.identifierKey(identifier))).map((identifier) => identifier.id)
    );

    logger.info(`${this.jurisdiction}: ${features.length} feature(s) returned`, { missing: missing.length });
    return { jurisdiction: this.jurisdiction, features, missing };
  }

  async queryOne(identifier: I, options: QueryOptions = {}): Promise<ParcelFeature> {
    const result = await this.query([identifier], options);
    const feature = result.features[0];
    if (!feature) {
      throw new QueryError(`No ${this.jurisdiction} parcel found for ${identifier.id}`, 'not-found', {
        jurisdiction: this.jurisdiction,
      });
    }
    return feature;
  }

  protected toParcelFeature(
    raw: RawFeature,
    attributes: Record<string, unknown>,
    matchedId: string | undefined,
    source: string
  ): ParcelFeature | null {
    const geometry = parcelGeometrySchema.safeParse(raw.geometry);
    if (!geometry.success) {
      logger.debug(`Skipping ${this.jurisdiction} feature without polygon geometry`, { id: raw.id });
      return null;
    }

    const parcelGeometry: ParcelGeometry = geometry.data;
    const id = matchedId ?? this.fallbackId(attributes);
    const name = NAME_FIELDS.map((field) => attributeText(attributes[field])).find(Boolean) ?? id;

    return {
      type: 'Feature',
      geometry: parcelGeometry,
      properties: {
        ...attributes,
        id,
        jurisdiction: this.jurisdiction,
        name,
        source,
        area_ha: roundTo(area(parcelGeometry) / 10000, 4),
      },
    };
  }
}
