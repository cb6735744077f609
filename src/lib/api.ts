import { z } from 'zod';
import { getConfig } from './config';
import { QueryError } from './errors';
import { logger } from './logger';
import type { DebugEntry, Jurisdiction } from './types';

export type QueryParams = Record<string, string | number | boolean>;

export interface RequestContext {
  jurisdiction?: Jurisdiction;
}

export interface ArcGisClientOptions {
  /** Falls back to `requestTimeoutMs` from the loaded config. */
  timeoutMs?: number;
}

const arcgisErrorSchema = z.object({
  error: z.object({
    code: z.number().optional(),
    message: z.string().optional(),
    details: z.array(z.string()).optional(),
  }),
});

const rawFeatureSchema = z.object({
  type: z.literal('Feature'),
  id: z.union([z.string(), z.number()]).optional(),
  geometry: z.unknown(),
  properties: z.record(z.unknown()).nullable().optional(),
});

const featureCollectionSchema = z.object({
  type: z.literal('FeatureCollection'),
  features: z.array(rawFeatureSchema),
  exceededTransferLimit: z.boolean().optional(),
  properties: z.object({ exceededTransferLimit: z.boolean().optional() }).passthrough().optional(),
});

export type RawFeature = z.infer<typeof rawFeatureSchema>;

export interface RawFeatureCollection {
  features: RawFeature[];
  exceededTransferLimit: boolean;
}

function isAbortError(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'name' in error && error.name === 'AbortError';
}

function describeCause(error: Error): string {
  const cause: unknown = error.cause;
  return cause instanceof Error ? `${error.message} (${cause.message})` : error.message;
}

/**
 * Thin client for ArcGIS REST `query` endpoints. Every request is recorded as
 * a DebugEntry so callers can show a request log.
 */
export class ArcGisClient {
  private debugEntries: DebugEntry[] = [];
  private debugListeners: Array<(entries: DebugEntry[]) => void> = [];

  constructor(private readonly options: ArcGisClientOptions = {}) {}

  private async makeRequest(url: string, params: QueryParams, context: RequestContext): Promise<unknown> {
    const timeoutMs = this.options.timeoutMs ?? getConfig().requestTimeoutMs;
    const requestUrl = new URL(url);
    for (const [key, value] of Object.entries(params)) {
      requestUrl.searchParams.set(key, String(value));
    }

    const debugEntry: DebugEntry = {
      timestamp: new Date(),
      method: 'GET',
      url: requestUrl.toString(),
    };
    const details = { jurisdiction: context.jurisdiction, url: requestUrl.origin + requestUrl.pathname };

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const startTime = Date.now();

      const response = await fetch(requestUrl, {
        method: 'GET',
        headers: { Accept: 'application/json' },
        signal: controller.signal,
      });

      debugEntry.duration = Date.now() - startTime;
      debugEntry.status = response.status;

      if (!response.ok) {
        throw new QueryError(
          `Service error (${response.status}): ${response.statusText || 'request failed'}`,
          'http',
          { ...details, status: response.status }
        );
      }

      let body: unknown;
      try {
        body = await response.json();
      } catch {
        throw new QueryError('Service returned a response that is not JSON', 'invalid-response', details);
      }

      // ArcGIS reports query failures as HTTP 200 with an error body.
      const serviceError = arcgisErrorSchema.safeParse(body);
      if (serviceError.success) {
        const { code, message, details: reasons } = serviceError.data.error;
        const extra = reasons && reasons.length > 0 ? ` - ${reasons.join('; ')}` : '';
        throw new QueryError(
          `ArcGIS error${code === undefined ? '' : ` ${code}`}: ${message ?? 'unknown error'}${extra}`,
          'service',
          { ...details, status: code }
        );
      }

      return body;
    } catch (error) {
      let queryError: QueryError;

      if (error instanceof QueryError) {
        queryError = error;
      } else if (isAbortError(error)) {
        queryError = new QueryError(
          `Request timeout - ${requestUrl.host} took longer than ${timeoutMs}ms to respond`,
          'timeout',
          details
        );
      } else if (error instanceof Error) {
        queryError = new QueryError(`Network error - cannot reach ${requestUrl.host}: ${describeCause(error)}`, 'network', details);
      } else {
        queryError = new QueryError(`Network error - cannot reach ${requestUrl.host}`, 'network', details);
      }

      debugEntry.error = queryError.message;
      throw queryError;
    } finally {
      clearTimeout(timeout);
      this.debugEntries.push(debugEntry);
      this.notifyDebugListeners();
    }
  }

  async getJson(url: string, params: QueryParams = {}, context: RequestContext = {}): Promise<unknown> {
    return this.makeRequest(url, params, context);
  }

  async queryFeatures(url: string, params: QueryParams, context: RequestContext = {}): Promise<RawFeatureCollection> {
    const body = await this.makeRequest(url, { f: 'geojson', ...params }, context);
    const parsed = featureCollectionSchema.safeParse(body);
    if (!parsed.success) {
      logger.debug('Unexpected query response', { issues: parsed.error.issues.slice(0, 3) });
      throw new QueryError('Service response is not a GeoJSON FeatureCollection', 'invalid-response', {
        jurisdiction: context.jurisdiction,
        url,
      });
    }

    const { features, exceededTransferLimit, properties } = parsed.data;
    return {
      features,
      exceededTransferLimit: Boolean(exceededTransferLimit ?? properties?.exceededTransferLimit),
    };
  }

  getDebugEntries(): DebugEntry[] {
    return [...this.debugEntries];
  }

  onDebugUpdate(callback: (entries: DebugEntry[]) => void): () => void {
    this.debugListeners.push(callback);
    return () => {
      const index = this.debugListeners.indexOf(callback);
      if (index > -1) {
        this.debugListeners.splice(index, 1);
      }
    };
  }

  clearDebugEntries(): void {
    this.debugEntries = [];
    this.notifyDebugListeners();
  }

  private notifyDebugListeners(): void {
    this.debugListeners.forEach((callback) => callback([...this.debugEntries]));
  }
}

export const arcgisClient = new ArcGisClient();
