import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { parcelFeature } from '../../__tests__/fixtures';
import { buildGeoJson } from '../../lib/kml';
import { logger } from '../../lib/logger';
import { resolveExportPath, writeExport } from './export';

describe('export files', () => {
  let dir: string;

  beforeEach(async () => {
    logger.configure({ level: 'error' });
    dir = await mkdtemp(join(tmpdir(), 'lotplan-kml-export-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should name files written into a directory', async () => {
    const date = new Date('2024-05-06T10:00:00Z');

    expect(await resolveExportPath(dir, 2, 'kmz', date)).toBe(join(dir, 'cadastral-parcels-2-2024-05-06.kmz'));
    expect(await resolveExportPath(join(dir, 'out.kml'), 2, 'kml', date)).toBe(join(dir, 'out.kml'));
  });

  it('should write the rendered export', async () => {
    const features = [parcelFeature('13//DP1', 'NSW')];
    const target = join(dir, 'parcels.geojson');

    const written = await writeExport(features, 'geojson', target, {});

    const content = await readFile(target, 'utf8');
    expect(content).toBe(buildGeoJson(features));
    expect(written).toEqual({ path: target, bytes: Buffer.byteLength(content, 'utf8') });
  });

  it('should refuse to write an empty export', async () => {
    await expect(writeExport([], 'kml', join(dir, 'empty.kml'), {})).rejects.toThrow(
      'Nothing to export: no parcels selected'
    );
  });
});
