/**
 * Service diagnostics: checks each configured cadastre layer is reachable
 * and answers queries.
 */

import { arcgisClient, type ArcGisClient } from './api';
import type { ServiceConfig } from './config';
import { errorMessage } from './errors';
import type { Jurisdiction } from './types';
import { isRecord } from './utils';

export interface DiagnosticResult {
  jurisdiction: Jurisdiction;
  test: string;
  status: 'pass' | 'fail' | 'warning';
  message: string;
  details?: string;
}

export function layerUrl(queryUrl: string): string {
  return queryUrl.replace(/\/query\/?$/i, '');
}

export class NetworkDiagnostics {
  constructor(private readonly client: ArcGisClient = arcgisClient) {}

  async runDiagnostics(services: Record<Jurisdiction, ServiceConfig>): Promise<DiagnosticResult[]> {
    const results: DiagnosticResult[] = [];
    for (const jurisdiction of Object.keys(services)) {
      if (jurisdiction === 'NSW' || jurisdiction === 'QLD' || jurisdiction === 'SA') {
        results.push(...(await this.checkService(jurisdiction, services[jurisdiction])));
      }
    }
    return results;
  }

  async checkService(jurisdiction: Jurisdiction, service: ServiceConfig): Promise<DiagnosticResult[]> {
    const results: DiagnosticResult[] = [];

    // Test 1: URL validation
    try {
      const url = new URL(service.url);
      if (!/\/query\/?$/i.test(url.pathname)) {
        results.push({
          jurisdiction,
          test: 'URL Validation',
          status: 'warning',
          message: 'Service URL does not end in /query',
          details: `URL: ${service.url}`,
        });
      } else {
        results.push({ jurisdiction, test: 'URL Validation', status: 'pass', message: 'Service URL is properly formatted' });
      }
    } catch {
      results.push({
        jurisdiction,
        test: 'URL Validation',
        status: 'fail',
        message: 'Invalid service URL format',
        details: `URL: ${service.url}`,
      });
      return results; // Can't continue with invalid URL
    }

    // Test 2: layer metadata
    try {
      const metadata = await this.client.getJson(layerUrl(service.url), { f: 'json' }, { jurisdiction });
      const name = isRecord(metadata) && typeof metadata.name === 'string' ? metadata.name : undefined;
      const geometryType = isRecord(metadata) && typeof metadata.geometryType === 'string' ? metadata.geometryType : undefined;

      if (geometryType && geometryType !== 'esriGeometryPolygon') {
        results.push({
          jurisdiction,
          test: 'Layer Metadata',
          status: 'warning',
          message: `Layer ${name ?? ''} is not a polygon layer`.replace(/\s+/g, ' '),
          details: `Geometry type: ${geometryType}`,
        });
      } else {
        results.push({
          jurisdiction,
          test: 'Layer Metadata',
          status: 'pass',
          message: name ? `Layer '${name}' is reachable` : 'Layer is reachable',
        });
      }
    } catch (error) {
      results.push({
        jurisdiction,
        test: 'Layer Metadata',
        status: 'fail',
        message: 'Cannot read layer metadata',
        details: errorMessage(error),
      });
      return results;
    }

    // Test 3: empty query round trip
    try {
      await this.client.queryFeatures(
        service.url,
        { where: '1=2', outFields: '*', returnGeometry: false },
        { jurisdiction }
      );
      results.push({ jurisdiction, test: 'Query', status: 'pass', message: 'Layer answers GeoJSON queries' });
    } catch (error) {
      results.push({
        jurisdiction,
        test: 'Query',
        status: 'fail',
        message: 'Query request failed',
        details: errorMessage(error),
      });
    }

    return results;
  }
}
