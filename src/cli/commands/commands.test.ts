import { mkdtemp, readdir, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, it, expect, vi, type MockInstance } from 'vitest';
import { z } from 'zod';
import { featureCollection, jsonResponse, rawParcel, requestUrl, type FetchInput } from '../../__tests__/fixtures';
import { ArcGisClient } from '../../lib/api';
import { DEFAULT_CONFIG, setConfig } from '../../lib/config';
import { logger } from '../../lib/logger';
import { executeDoctor } from './doctor';
import { runInteractive, type Prompt } from './interactive';
import { executeParse } from './parse';
import { executeQuery } from './query';

const parseOutputSchema = z.object({
  valid: z.array(z.object({ id: z.string() })),
  malformed: z.array(z.object({ raw: z.string() })),
});

const queryOutputSchema = z.object({
  summary: z.object({ count: z.number() }),
  missing: z.array(z.string()),
  exports: z.array(z.object({ path: z.string(), bytes: z.number() })),
  features: z.array(z.object({ properties: z.object({ id: z.string() }) })),
});

function scriptedPrompt(answers: string[]): Prompt & { questions: string[] } {
  const questions: string[] = [];
  return {
    questions,
    async question(query) {
      questions.push(query);
      const answer = answers.shift();
      if (answer === undefined) {
        throw new Error(`No scripted answer for '${query}'`);
      }
      return answer;
    },
  };
}

function loggedJson(log: { mock: { calls: unknown[][] } }): unknown {
  return JSON.parse(String(log.mock.calls[0]?.[0]));
}

describe('commands', () => {
  let dir: string;
  let log: MockInstance<typeof console.log>;

  beforeEach(async () => {
    setConfig(DEFAULT_CONFIG);
    logger.configure({ level: 'error' });
    vi.spyOn(console, 'error').mockImplementation(() => {});
    log = vi.spyOn(console, 'log').mockImplementation(() => {});
    dir = await mkdtemp(join(tmpdir(), 'lotplan-kml-commands-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe('executeParse', () => {
    it('should print the parsed identifiers as JSON', async () => {
      const code = await executeParse(['1-2//DP5', 'foo'], { state: 'NSW', json: true });

      const output = parseOutputSchema.parse(loggedJson(log));
      expect(code).toBe(0);
      expect(output.valid.map((identifier) => identifier.id)).toEqual(['1//DP5', '2//DP5']);
      expect(output.malformed.map((entry) => entry.raw)).toEqual(['foo']);
    });

    it('should exit 1 when nothing parses', async () => {
      expect(await executeParse(['foo'], { state: 'NSW' })).toBe(1);
    });
  });

  describe('executeQuery', () => {
    const client = () => new ArcGisClient({ timeoutMs: 1000 });

    it('should query, report and export', async () => {
      vi.stubGlobal(
        'fetch',
        vi.fn(async () => jsonResponse(featureCollection([rawParcel({ lotidstring: '13//DP1' })])))
      );
      const target = join(dir, 'out.geojson');

      const code = await executeQuery(['13//DP1', '14//DP1'], { state: 'NSW', json: true, geojson: target }, client());

      const output = queryOutputSchema.parse(loggedJson(log));
      expect(code).toBe(0);
      expect(output.summary.count).toBe(1);
      expect(output.features.map((feature) => feature.properties.id)).toEqual(['13//DP1']);
      expect(output.missing).toEqual(['14//DP1']);
      expect(output.exports.map((written) => written.path)).toEqual([target]);
      expect(await readdir(dir)).toEqual(['out.geojson']);
    });

    it('should exit 1 when the service fails', async () => {
      vi.stubGlobal('fetch', vi.fn(async () => new Response('', { status: 503, statusText: 'Service Unavailable' })));

      expect(await executeQuery(['13//DP1'], { state: 'NSW' }, client())).toBe(1);
    });

    it('should refuse input with no valid identifiers', async () => {
      const fetchMock = vi.fn(async (_input: FetchInput) => jsonResponse(featureCollection([])));
      vi.stubGlobal('fetch', fetchMock);

      await expect(executeQuery(['foo'], { state: 'QLD' }, client())).rejects.toThrow(
        'No valid parcel identifiers to query'
      );
      expect(fetchMock).not.toHaveBeenCalled();
    });

    it('should reject an unknown colour preset before querying', async () => {
      const fetchMock = vi.fn(async (_input: FetchInput) => jsonResponse(featureCollection([])));
      vi.stubGlobal('fetch', fetchMock);

      await expect(executeQuery(['13//DP1'], { state: 'NSW', preset: 'Teal' }, client())).rejects.toThrow();
      expect(fetchMock).not.toHaveBeenCalled();
    });
  });

  describe('executeDoctor', () => {
    function stubServices(failingHost?: string) {
      vi.stubGlobal(
        'fetch',
        vi.fn(async (input: FetchInput) => {
          const url = requestUrl(input);
          if (url.host === failingHost) {
            return new Response('', { status: 500, statusText: 'Internal Server Error' });
          }
          return url.searchParams.get('f') === 'geojson'
            ? jsonResponse(featureCollection([]))
            : jsonResponse({ name: 'Lots', geometryType: 'esriGeometryPolygon' });
        })
      );
    }

    it('should exit 0 when every service answers', async () => {
      stubServices();

      expect(await executeDoctor({}, new ArcGisClient({ timeoutMs: 1000 }))).toBe(0);
    });

    it('should exit 1 when a service fails', async () => {
      stubServices('maps.six.nsw.gov.au');

      expect(await executeDoctor({ json: true }, new ArcGisClient({ timeoutMs: 1000 }))).toBe(1);
      const results = z.array(z.object({ jurisdiction: z.string(), status: z.string() })).parse(loggedJson(log));
      expect(results.filter((result) => result.status === 'fail').map((result) => result.jurisdiction)).toEqual(['NSW']);
    });
  });

  describe('runInteractive', () => {
    it('should walk from state selection to a saved export', async () => {
      vi.stubGlobal(
        'fetch',
        vi.fn(async () => jsonResponse(featureCollection([rawParcel({ lot: '1', plan: 'RP912949' })])))
      );
      const prompt = scriptedPrompt(['vic', 'qld', '1RP912949', '', '', 'geojson', '', '', dir]);
      const lines: string[] = [];

      const code = await runInteractive(prompt, new ArcGisClient({ timeoutMs: 1000 }), (line) => lines.push(line));

      expect(code).toBe(0);
      expect(lines[0]).toBe("Unknown state 'vic'. Use one of: NSW, QLD, SA");
      expect(lines[1]).toBe('Paste QLD identifiers, one per line. Finish with a blank line. For example:');
      expect(prompt.questions.slice(0, 2)).toEqual(['State [NSW/QLD/SA] (NSW): ', 'State [NSW/QLD/SA] (NSW): ']);
      const files = await readdir(dir);
      expect(files).toHaveLength(1);
      expect(files[0]).toMatch(/^cadastral-parcels-1-\d{4}-\d{2}-\d{2}\.geojson$/);
      expect(lines[lines.length - 1]).toBe(`Saved ${join(dir, files[0] ?? '')}`);
    });

    it('should stop when nothing parses', async () => {
      const fetchMock = vi.fn(async (_input: FetchInput) => jsonResponse(featureCollection([])));
      vi.stubGlobal('fetch', fetchMock);
      const lines: string[] = [];

      const code = await runInteractive(scriptedPrompt(['', 'foo', '']), new ArcGisClient({ timeoutMs: 1000 }), (line) =>
        lines.push(line)
      );

      expect(code).toBe(1);
      expect(lines[lines.length - 1]).toBe('Nothing to query.');
      expect(fetchMock).not.toHaveBeenCalled();
    });

    it('should stop when no parcel is found', async () => {
      vi.stubGlobal('fetch', vi.fn(async () => jsonResponse(featureCollection([]))));
      const lines: string[] = [];

      const code = await runInteractive(
        scriptedPrompt(['SA', '101//D12345', '']),
        new ArcGisClient({ timeoutMs: 1000 }),
        (line) => lines.push(line)
      );

      expect(code).toBe(1);
      expect(lines.slice(-2)).toEqual(['No parcels found.', 'Not found (1): 101//D12345']);
    });
  });
});
