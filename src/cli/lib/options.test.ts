import { describe, it, expect } from 'vitest';
import { InvalidArgumentError } from 'commander';
import { DEFAULT_CONFIG } from '../../lib/config';
import { exportTargets, integerOption, parseHexColor, parseJurisdiction, parsePreset, styleFromFlags } from './options';

describe('parseJurisdiction', () => {
  it('should accept any case', () => {
    expect(parseJurisdiction('qld')).toBe('QLD');
    expect(parseJurisdiction(' SA ')).toBe('SA');
  });

  it('should reject unknown states', () => {
    expect(() => parseJurisdiction('VIC')).toThrow(InvalidArgumentError);
    expect(() => parseJurisdiction('VIC')).toThrow("Unknown state 'VIC'. Use one of: NSW, QLD, SA");
  });
});

describe('integerOption', () => {
  it('should parse integers inside the bounds', () => {
    expect(integerOption(0, 255)('125')).toBe(125);
  });

  it('should reject values outside the bounds', () => {
    expect(() => integerOption(0, 255)('256')).toThrow('Expected an integer from 0 to 255');
    expect(() => integerOption(1)('0')).toThrow('Expected an integer >= 1');
    expect(() => integerOption(1)('2.5')).toThrow('Expected an integer >= 1');
  });
});

describe('colour options', () => {
  it('should accept known presets', () => {
    expect(parsePreset('for sales')).toBe('for sales');
    expect(() => parsePreset('Teal')).toThrow("Unknown preset 'Teal'. Use one of: Subjects, Quotes, Sales, For Sales");
  });

  it('should normalize hex colours', () => {
    expect(parseHexColor('a23f97')).toBe('#a23f97');
    expect(parseHexColor('#A23F97')).toBe('#A23F97');
    expect(() => parseHexColor('#xyz')).toThrow("Invalid colour '#xyz'. Expected #RRGGBB");
  });
});

describe('styleFromFlags', () => {
  it('should fall back to the configured export settings', () => {
    expect(styleFromFlags({}, DEFAULT_CONFIG)).toEqual({
      preset: 'Subjects',
      fillColor: undefined,
      alpha: 125,
      lineWidth: 2,
      folderName: 'parcels_export',
      colorByJurisdiction: false,
    });
  });

  it('should prefer flags', () => {
    expect(
      styleFromFlags({ preset: 'Sales', color: '#000000', opacity: 10, lineWidth: 4, folder: 'Job', colorByState: true }, DEFAULT_CONFIG)
    ).toEqual({
      preset: 'Sales',
      fillColor: '#000000',
      alpha: 10,
      lineWidth: 4,
      folderName: 'Job',
      colorByJurisdiction: true,
    });
  });
});

describe('exportTargets', () => {
  it('should list requested formats in a fixed order', () => {
    expect(exportTargets({ geojson: 'out.geojson', kml: 'out.kml' })).toEqual([
      { format: 'kml', path: 'out.kml' },
      { format: 'geojson', path: 'out.geojson' },
    ]);
    expect(exportTargets({})).toEqual([]);
  });
});
