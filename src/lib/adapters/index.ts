import type { ArcGisClient } from '../api';
import { QueryError } from '../errors';
import { logger } from '../logger';
import type {
  Jurisdiction,
  NswIdentifier,
  ParcelFeature,
  ParcelIdentifier,
  QldIdentifier,
  QueryOptions,
  QueryResult,
  SaIdentifier,
} from '../types';
import { NswAdapter } from './nsw';
import { QldAdapter } from './qld';
import { SaAdapter } from './sa';

export { CadastreAdapter, type AdapterOptions } from './base';
export { NswAdapter, nswLotIdString } from './nsw';
export { QldAdapter } from './qld';
export { SaAdapter } from './sa';

export interface AdapterSet {
  NSW: NswAdapter;
  QLD: QldAdapter;
  SA: SaAdapter;
}

export function createAdapters(client?: ArcGisClient): AdapterSet {
  return {
    NSW: new NswAdapter({ client }),
    QLD: new QldAdapter({ client }),
    SA: new SaAdapter({ client }),
  };
}

export interface JurisdictionFailure {
  jurisdiction: Jurisdiction;
  error: QueryError;
}

export interface ParcelQueryResponse {
  results: QueryResult[];
  errors: JurisdictionFailure[];
  features: ParcelFeature[];
  missing: string[];
}

/**
 * Queries every jurisdiction that has identifiers, one service at a time.
 * A service failure is recorded against its jurisdiction and the remaining
 * services are still queried.
 */
export async function queryParcels(
  identifiers: readonly ParcelIdentifier[],
  options: QueryOptions = {},
  adapters: AdapterSet = createAdapters()
): Promise<ParcelQueryResponse> {
  const nsw: NswIdentifier[] = [];
  const qld: QldIdentifier[] = [];
  const sa: SaIdentifier[] = [];

  for (const identifier of identifiers) {
    switch (identifier.jurisdiction) {
      case 'NSW':
        nsw.push(identifier);
        break;
      case 'QLD':
        qld.push(identifier);
        break;
      case 'SA':
        sa.push(identifier);
        break;
    }
  }

  const response: ParcelQueryResponse = { results: [], errors: [], features: [], missing: [] };

  const run = async (jurisdiction: Jurisdiction, count: number, query: () => Promise<QueryResult>) => {
    if (count === 0) return;
    try {
      const result = await query();
      response.results.push(result);
      response.features.push(...result.features);
      response.missing.push(...result.missing);
    } catch (error) {
      if (!(error instanceof QueryError)) {
        throw error;
      }
      logger.error(`${jurisdiction} query failed`, { reason: error.reason, message: error.message });
      response.errors.push({ jurisdiction, error });
    }
  };

  await run('NSW', nsw.length, () => adapters.NSW.query(nsw, options));
  await run('QLD', qld.length, () => adapters.QLD.query(qld, options));
  await run('SA', sa.length, () => adapters.SA.query(sa, options));

  return response;
}
