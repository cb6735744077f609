import type { ExportFormat } from './types';

const STATE_CODES = new Set(['NSW', 'QLD', 'VIC', 'SA', 'WA', 'TAS', 'NT', 'ACT']);

const STREET_TYPES = new Set([
  'RD', 'ROAD', 'ST', 'STREET', 'AVE', 'AVENUE', 'DR', 'DRIVE', 'CT', 'COURT', 'CRES', 'CRESCENT',
  'HWY', 'HIGHWAY', 'WAY', 'CIRCUIT', 'PL', 'PLACE', 'LN', 'LANE', 'TCE', 'TERRACE', 'BLVD',
  'BOULEVARD', 'PDE', 'PARADE', 'CLOSE', 'GROVE', 'TRACK',
]);

const LOWERCASE_WORDS = new Set(['and', 'of', 'the', 'for', 'at', 'on', 'to', 'in']);

function titleCaseWord(word: string, index: number): string {
  const upper = word.toUpperCase();

  // Plan numbers, lot ids and state codes stay upper case.
  if (STATE_CODES.has(upper) || /\d/.test(word) || word.includes('/')) {
    return upper;
  }

  const lower = word.toLowerCase();
  if (index > 0 && LOWERCASE_WORDS.has(lower)) {
    return lower;
  }

  return lower.replace(/(^|[-'])([a-z])/g, (_, separator: string, letter: string) => `${separator}${letter.toUpperCase()}`);
}

function titleCase(tokens: string[]): string {
  return tokens.map(titleCaseWord).join(' ');
}

function stateIndex(tokens: string[]): number {
  return tokens.findIndex((token) => STATE_CODES.has(token.toUpperCase().replace(/[^A-Z]/g, '')));
}

/**
 * Tidies a KML folder name. Address-like names get a comma before the
 * suburb: `12 smith st dubbo nsw 2830` → `12 Smith St, Dubbo NSW 2830`.
 */
export function formatFolderName(raw: string): string {
  const spaced = raw.replace(/\s+/g, ' ').replace(/\s*,\s*/g, ', ').trim();
  if (!spaced) {
    return '';
  }

  const tokens = spaced.replace(/,/g, ' ').split(' ').filter(Boolean);
  const stateAt = stateIndex(tokens);

  if (stateAt <= 0) {
    return spaced
      .split(', ')
      .map((segment) => titleCase(segment.split(' ').filter(Boolean)))
      .join(', ');
  }

  const prior = tokens.slice(0, stateAt);
  const state = tokens[stateAt]?.toUpperCase().replace(/[^A-Z]/g, '') ?? '';
  const postcode = tokens.slice(stateAt + 1).join(' ');

  let streetEnd = -1;
  for (let i = prior.length - 1; i >= 0; i -= 1) {
    if (STREET_TYPES.has((prior[i] ?? '').toUpperCase().replace(/[^A-Z]/g, ''))) {
      streetEnd = i;
      break;
    }
  }
  if (streetEnd === -1) {
    streetEnd = Math.max(0, prior.length - 2);
  }

  const street = titleCase(prior.slice(0, streetEnd + 1));
  const suburb = titleCase(prior.slice(streetEnd + 1));

  return [suburb ? `${street}, ${suburb} ${state}` : `${street}, ${state}`, postcode].filter(Boolean).join(' ');
}

export function formatArea(hectares: number): string {
  return `${hectares.toFixed(2)} ha`;
}

export function exportFileName(count: number, format: ExportFormat, date: Date = new Date()): string {
  const timestamp = date.toISOString().split('T')[0];
  return `cadastral-parcels-${count}-${timestamp}.${format}`;
}
