import { beforeEach, describe, it, expect, vi } from 'vitest';
import { featureCollection, jsonResponse, rawParcel, requestUrl, type FetchInput } from '../__tests__/fixtures';
import { ArcGisClient } from './api';
import { resetConfig } from './config';
import { ConfigError, QueryError } from './errors';
import type { DebugEntry } from './types';

const LAYER_URL = 'https://example.test/arcgis/rest/services/Cadastre/MapServer/0/query';

function stubFetch(handler: (input: FetchInput, init?: RequestInit) => Promise<Response>) {
  const fetchMock = vi.fn(handler);
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

describe('ArcGisClient', () => {
  let client: ArcGisClient;

  beforeEach(() => {
    client = new ArcGisClient({ timeoutMs: 1000 });
  });

  describe('requests', () => {
    it('should send params as query string and record a debug entry', async () => {
      const fetchMock = stubFetch(async () => jsonResponse({ name: 'Lots' }));

      const body = await client.getJson(LAYER_URL, { f: 'json', returnGeometry: false });

      expect(body).toEqual({ name: 'Lots' });
      const url = requestUrl(fetchMock.mock.calls[0]?.[0] ?? '');
      expect(url.searchParams.get('f')).toBe('json');
      expect(url.searchParams.get('returnGeometry')).toBe('false');
      expect(fetchMock.mock.calls[0]?.[1]?.headers).toEqual({ Accept: 'application/json' });

      const [entry] = client.getDebugEntries();
      expect(entry?.method).toBe('GET');
      expect(entry?.status).toBe(200);
      expect(entry?.url).toBe(`${LAYER_URL}?f=json&returnGeometry=false`);
      expect(entry?.error).toBeUndefined();
    });

    it('should fall back to the configured timeout', async () => {
      resetConfig();
      stubFetch(async () => jsonResponse({}));

      await expect(new ArcGisClient().getJson(LAYER_URL)).rejects.toBeInstanceOf(ConfigError);
    });
  });

  describe('error mapping', () => {
    it('should map non-2xx responses to http errors', async () => {
      stubFetch(async () => new Response('missing', { status: 404, statusText: 'Not Found' }));

      const error = await client.getJson(LAYER_URL).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(QueryError);
      expect(error).toMatchObject({ reason: 'http', status: 404, message: 'Service error (404): Not Found' });
      expect(client.getDebugEntries()[0]?.error).toBe('Service error (404): Not Found');
    });

    it('should map ArcGIS error bodies to service errors', async () => {
      stubFetch(async () => jsonResponse({ error: { code: 400, message: 'Invalid query', details: ['bad where'] } }));

      await expect(client.getJson(LAYER_URL, {}, { jurisdiction: 'NSW' })).rejects.toMatchObject({
        reason: 'service',
        jurisdiction: 'NSW',
        message: 'ArcGIS error 400: Invalid query - bad where',
      });
    });

    it('should reject bodies that are not JSON', async () => {
      stubFetch(async () => new Response('<html></html>', { status: 200 }));

      await expect(client.getJson(LAYER_URL)).rejects.toMatchObject({
        reason: 'invalid-response',
        message: 'Service returned a response that is not JSON',
      });
    });

    it('should map aborted requests to timeouts', async () => {
      const fastClient = new ArcGisClient({ timeoutMs: 10 });
      stubFetch(
        (_input, init) =>
          new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener('abort', () => reject(new DOMException('aborted', 'AbortError')));
          })
      );

      await expect(fastClient.getJson(LAYER_URL)).rejects.toMatchObject({
        reason: 'timeout',
        message: 'Request timeout - example.test took longer than 10ms to respond',
      });
    });

    it('should map fetch failures to network errors', async () => {
      stubFetch(async () => {
        throw new TypeError('fetch failed', { cause: new Error('getaddrinfo ENOTFOUND example.test') });
      });

      await expect(client.getJson(LAYER_URL)).rejects.toMatchObject({
        reason: 'network',
        message: 'Network error - cannot reach example.test: fetch failed (getaddrinfo ENOTFOUND example.test)',
      });
    });
  });

  describe('queryFeatures', () => {
    it('should request GeoJSON and return the features', async () => {
      const fetchMock = stubFetch(async () => jsonResponse(featureCollection([rawParcel({ lotidstring: '1//DP1' })])));

      const result = await client.queryFeatures(LAYER_URL, { where: '1=1' });

      expect(requestUrl(fetchMock.mock.calls[0]?.[0] ?? '').searchParams.get('f')).toBe('geojson');
      expect(result.features).toHaveLength(1);
      expect(result.features[0]?.properties).toEqual({ lotidstring: '1//DP1' });
      expect(result.exceededTransferLimit).toBe(false);
    });

    it('should report a truncated result', async () => {
      stubFetch(async () => jsonResponse(featureCollection([], { properties: { exceededTransferLimit: true } })));

      expect((await client.queryFeatures(LAYER_URL, { where: '1=1' })).exceededTransferLimit).toBe(true);
    });

    it('should reject bodies that are not feature collections', async () => {
      stubFetch(async () => jsonResponse({ features: 'none' }));

      await expect(client.queryFeatures(LAYER_URL, { where: '1=1' }, { jurisdiction: 'SA' })).rejects.toMatchObject({
        reason: 'invalid-response',
        jurisdiction: 'SA',
        message: 'Service response is not a GeoJSON FeatureCollection',
      });
    });
  });

  describe('debug log', () => {
    it('should notify listeners until they unsubscribe', async () => {
      stubFetch(async () => jsonResponse({}));
      const seen: DebugEntry[][] = [];
      const unsubscribe = client.onDebugUpdate((entries) => seen.push(entries));

      await client.getJson(LAYER_URL);
      unsubscribe();
      await client.getJson(LAYER_URL);

      expect(seen).toHaveLength(1);
      expect(seen[0]).toHaveLength(1);
      expect(client.getDebugEntries()).toHaveLength(2);
    });

    it('should clear entries', async () => {
      stubFetch(async () => jsonResponse({}));
      await client.getJson(LAYER_URL);

      client.clearDebugEntries();

      expect(client.getDebugEntries()).toEqual([]);
    });
  });
});
