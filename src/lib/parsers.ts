import { InvalidRangeError, MalformedIdentifierError, type ParseError } from './errors';
import type {
  Jurisdiction,
  LotRange,
  NswIdentifier,
  ParcelIdentifier,
  ParseOutcome,
  ParseResponse,
  ParserOptions,
  QldIdentifier,
  Result,
  SaIdentifier,
} from './types';

const ENTRY_SEPARATORS = /[\r\n,;]+/;

const LOT_PATTERN = /^[A-Z0-9]+$/i;
const PLAN_PATTERN = /^[A-Z]+\d+$/i;

// One or more lots or START-END ranges, separated by spaces, before a double slash.
const NSW_LOT_LIST_PATTERN =
  /^(?<lots>[A-Z0-9]+(?:\s*-\s*[A-Z0-9]+)?(?:\s+[A-Z0-9]+(?:\s*-\s*[A-Z0-9]+)?)*)\s*\/\/\s*(?<plan>.+)$/i;
const NSW_LOT_RANGE_PATTERN = /^(?<start>\d+)-(?<end>\d+)$/;
// Also takes the service's own lotidstring, which uses a single slash before the plan.
const NSW_SECTION_PATTERN = /^(?<lot>[A-Z0-9]+)\s*\/\s*(?<section>[A-Z0-9]+)\s*\/\/?\s*(?<plan>[A-Z]+\s*\d+)$/i;
const NSW_TEXT_PATTERN =
  /^LOT\s+(?<lot>[A-Z0-9]+)(?:\s+(?:SECTION|SECT|SEC)\s+(?<section>[A-Z0-9]+))?\s+(?:(?:ON|IN|OF)\s+)?(?:PLAN\s+)?(?<plan>[A-Z]+\s*\d+)$/i;
// "13 DP1242624" and "13/DP1242624"
const NSW_BARE_PATTERN = /^(?!LOTS?\s)(?<lot>[A-Z0-9]+)(?:\s+|\s*\/\s*)(?<plan>[A-Z]+\s*\d+)$/i;
const NSW_NOISE_TOKENS = new Set(['LOT', 'LOTS']);

const QLD_LOTPLAN_PATTERN = /^(?<lot>\d+)(?<plan>[A-Z]{2}\d+)$/i;

const SA_PARCEL_PATTERN = /^(?<lot>[A-Z0-9]+)\s*\/\/\s*(?<plan>[A-Z]+\s*\d+)$/i;
const SA_TITLE_PATTERN = /^(?<register>[A-Z]{1,3})?\s*(?<volume>\d+)\s*\/\s*(?<folio>\d+)$/i;

const NSW_FORMAT_HINT = 'Invalid NSW format. Expected LOT//PLAN, LOT/SECTION//PLAN, START-END//PLAN or LOT 13 DP1242624';
const QLD_FORMAT_HINT = 'Invalid QLD format. Expected lot and plan joined like 1RP912949 or 13SP12345';
const SA_FORMAT_HINT = 'Invalid SA format. Expected PARCEL//PLAN or VOLUME/FOLIO';

function ok<T>(value: T): Result<T, ParseError> {
  return { ok: true, value };
}

function fail<T>(error: ParseError): Result<T, ParseError> {
  return { ok: false, error };
}

function normalizeEntry(raw: string): string {
  return raw.trim().replace(/\\/g, '/').replace(/\s+/g, ' ');
}

function normalizePlan(value: string): string | null {
  const cleaned = value.replace(/\s+/g, '');
  return PLAN_PATTERN.test(cleaned) ? cleaned.toUpperCase() : null;
}

function normalizeLot(value: string): string | null {
  const cleaned = value.trim();
  return LOT_PATTERN.test(cleaned) ? cleaned.toUpperCase() : null;
}

export function splitEntries(raw: string): string[] {
  return raw
    .split(ENTRY_SEPARATORS)
    .map((entry) => entry.trim())
    .filter(Boolean);
}

function nswIdentifier(lot: string, plan: string, section?: string): NswIdentifier {
  const id = section ? `${lot}/${section}//${plan}` : `${lot}//${plan}`;
  return section
    ? { jurisdiction: 'NSW', id, lot, section, plan }
    : { jurisdiction: 'NSW', id, lot, plan };
}

export function expandLotRange(range: LotRange): NswIdentifier[] {
  const identifiers: NswIdentifier[] = [];
  for (let lot = range.start; lot <= range.end; lot += 1) {
    identifiers.push(nswIdentifier(String(lot), range.plan));
  }
  return identifiers;
}

function parseNSWRange(
  raw: string,
  match: RegExpExecArray,
  plan: string,
  options: ParserOptions
): Result<NswIdentifier[], ParseError> {
  const startText = match.groups?.start ?? '';
  const endText = match.groups?.end ?? '';
  const start = Number.parseInt(startText, 10);
  const end = Number.parseInt(endText, 10);
  if (!Number.isSafeInteger(start) || !Number.isSafeInteger(end)) {
    return fail(new InvalidRangeError(raw, `Range ${startText}-${endText} exceeds the largest lot number`));
  }
  if (start > end) {
    return fail(new InvalidRangeError(raw, `Range start ${start} is greater than end ${end}`));
  }

  const span = end - start + 1;
  if (options.maxRangeSize !== undefined && span > options.maxRangeSize) {
    return fail(new InvalidRangeError(raw, `Range covers ${span} lots (max ${options.maxRangeSize})`));
  }

  return ok(expandLotRange({ start, end, plan }));
}

function parseNSWLotList(raw: string, match: RegExpExecArray, options: ParserOptions): Result<NswIdentifier[], ParseError> {
  const groups = match.groups ?? {};
  const tokens = (groups.lots ?? '')
    .replace(/\s*-\s*/g, '-')
    .split(' ')
    .filter((token) => token && !NSW_NOISE_TOKENS.has(token.toUpperCase()));

  const plan = normalizePlan(groups.plan ?? '');
  if (!plan) {
    return fail(
      new MalformedIdentifierError(
        raw,
        tokens.some((token) => token.includes('-')) ? `Invalid NSW plan '${(groups.plan ?? '').trim()}'` : NSW_FORMAT_HINT
      )
    );
  }
  if (tokens.length === 0) {
    return fail(new MalformedIdentifierError(raw, NSW_FORMAT_HINT));
  }

  const identifiers: NswIdentifier[] = [];
  for (const token of tokens) {
    const rangeMatch = NSW_LOT_RANGE_PATTERN.exec(token);
    if (rangeMatch) {
      const result = parseNSWRange(raw, rangeMatch, plan, options);
      if (!result.ok) {
        return result;
      }
      identifiers.push(...result.value);
      continue;
    }

    const lot = normalizeLot(token);
    if (!lot) {
      return fail(new MalformedIdentifierError(raw, NSW_FORMAT_HINT));
    }
    identifiers.push(nswIdentifier(lot, plan));
  }

  return ok(identifiers);
}

// NSW Parser - LOT//PLAN with lot lists and ranges, LOT/SECTION//PLAN, "LOT 13 DP1242624" and "13 DP1242624"
export function parseNSW(entry: string, options: ParserOptions = {}): Result<NswIdentifier[], ParseError> {
  const raw = entry.trim();
  if (!raw) {
    return fail(new MalformedIdentifierError(entry, 'Empty parcel entry'));
  }

  const token = normalizeEntry(raw);

  const listMatch = NSW_LOT_LIST_PATTERN.exec(token);
  if (listMatch) {
    return parseNSWLotList(raw, listMatch, options);
  }

  const match = NSW_SECTION_PATTERN.exec(token) ?? NSW_TEXT_PATTERN.exec(token) ?? NSW_BARE_PATTERN.exec(token);
  const groups = match?.groups;
  if (!groups) {
    return fail(new MalformedIdentifierError(raw, NSW_FORMAT_HINT));
  }

  const lot = normalizeLot(groups.lot ?? '');
  const plan = normalizePlan(groups.plan ?? '');
  const section = groups.section === undefined ? undefined : normalizeLot(groups.section);
  if (!lot || !plan || section === null) {
    return fail(new MalformedIdentifierError(raw, NSW_FORMAT_HINT));
  }

  return ok([nswIdentifier(lot, plan, section)]);
}

// QLD Parser - lotidstring only (e.g., 1RP912949, 13SP12345)
export function parseQLD(entry: string): Result<QldIdentifier, ParseError> {
  const raw = entry.trim();
  if (!raw) {
    return fail(new MalformedIdentifierError(entry, 'Empty parcel entry'));
  }

  const groups = QLD_LOTPLAN_PATTERN.exec(raw)?.groups;
  if (!groups?.lot || !groups.plan) {
    return fail(new MalformedIdentifierError(raw, QLD_FORMAT_HINT));
  }

  const lot = groups.lot;
  const plan = groups.plan.toUpperCase();
  return ok({ jurisdiction: 'QLD', id: `${lot}${plan}`, lot, plan });
}

// SA Parser - PARCEL//PLAN or VOLUME/FOLIO; a '//' always selects parcel/plan
export function parseSA(entry: string): Result<SaIdentifier, ParseError> {
  const raw = entry.trim();
  if (!raw) {
    return fail(new MalformedIdentifierError(entry, 'Empty parcel entry'));
  }

  const token = normalizeEntry(raw);

  if (token.includes('//')) {
    const groups = SA_PARCEL_PATTERN.exec(token)?.groups;
    const lot = normalizeLot(groups?.lot ?? '');
    const plan = normalizePlan(groups?.plan ?? '');
    if (!lot || !plan) {
      return fail(new MalformedIdentifierError(raw, 'Invalid SA parcel. Expected PARCEL//PLAN like 101//D12345'));
    }
    return ok({ jurisdiction: 'SA', kind: 'parcel', id: `${lot}//${plan}`, lot, plan });
  }

  if (token.split('/').length === 2) {
    const groups = SA_TITLE_PATTERN.exec(token)?.groups;
    if (!groups?.volume || !groups.folio) {
      return fail(new MalformedIdentifierError(raw, 'Invalid SA title reference. Expected VOLUME/FOLIO like 5213/925'));
    }
    const { volume, folio } = groups;
    const register = groups.register?.toUpperCase();
    const id = `${register ?? ''}${volume}/${folio}`;
    return ok(
      register
        ? { jurisdiction: 'SA', kind: 'title', id, volume, folio, register }
        : { jurisdiction: 'SA', kind: 'title', id, volume, folio }
    );
  }

  return fail(new MalformedIdentifierError(raw, SA_FORMAT_HINT));
}

export function parseEntry(
  jurisdiction: Jurisdiction,
  entry: string,
  options: ParserOptions = {}
): Result<ParcelIdentifier[], ParseError> {
  switch (jurisdiction) {
    case 'NSW':
      return parseNSW(entry, options);
    case 'QLD': {
      const result = parseQLD(entry);
      return result.ok ? ok([result.value]) : result;
    }
    case 'SA': {
      const result = parseSA(entry);
      return result.ok ? ok([result.value]) : result;
    }
  }
}

/**
 * Parses every entry independently. Range entries contribute one outcome per
 * lot; a failing entry contributes one error outcome and processing carries on.
 */
export function parseBulk(
  raw: string | readonly string[],
  jurisdiction: Jurisdiction,
  options: ParserOptions = {}
): ParseOutcome[] {
  const entries = typeof raw === 'string' ? splitEntries(raw) : raw.flatMap(splitEntries);
  const outcomes: ParseOutcome[] = [];

  for (const entry of entries) {
    const result = parseEntry(jurisdiction, entry, options);
    if (result.ok) {
      for (const identifier of result.value) {
        outcomes.push({ ok: true, raw: entry, identifier });
      }
    } else {
      outcomes.push({ ok: false, raw: entry, error: result.error });
    }
  }

  return outcomes;
}

export function parseParcelInput(
  jurisdiction: Jurisdiction,
  rawText: string,
  options: ParserOptions = {}
): ParseResponse {
  const response: ParseResponse = { valid: [], malformed: [] };

  for (const outcome of parseBulk(rawText, jurisdiction, options)) {
    if (outcome.ok) {
      response.valid.push(outcome.identifier);
    } else {
      response.malformed.push({ raw: outcome.raw, error: outcome.error.reason });
    }
  }

  return response;
}

export function formatIdentifier(identifier: ParcelIdentifier): string {
  switch (identifier.jurisdiction) {
    case 'NSW':
      return nswIdentifier(identifier.lot, identifier.plan, identifier.section).id;
    case 'QLD':
      return `${identifier.lot}${identifier.plan}`;
    case 'SA':
      return identifier.kind === 'parcel'
        ? `${identifier.lot}//${identifier.plan}`
        : `${identifier.register ?? ''}${identifier.volume}/${identifier.folio}`;
  }
}
