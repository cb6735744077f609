import { parseParcelInput } from './parsers';
import type { Jurisdiction, MalformedEntry, ParcelIdentifier, ParserOptions } from './types';

export interface ParcelInputState {
  rawInput: string;
  selectedState: Jurisdiction;
  validParcels: ParcelIdentifier[];
  malformedEntries: MalformedEntry[];
  isValid: boolean;
}

// Example input shown for each jurisdiction.
export const EXAMPLE_INPUT: Record<Jurisdiction, string> = {
  NSW: ['1//DP131118', '2//DP131118', 'LOT 13 DP1242624', '1-3//DP555123', '101/1//DP12345'].join('\n'),
  QLD: ['1RP912949', '13SP12345', '2SP654321'].join('\n'),
  SA: ['101//D12345', '102//F23456', '5213/925'].join('\n'),
};

export function createParcelInputState(selectedState: Jurisdiction = 'NSW'): ParcelInputState {
  return {
    rawInput: '',
    selectedState,
    validParcels: [],
    malformedEntries: [],
    isValid: false,
  };
}

function reparse(
  prev: ParcelInputState,
  rawInput: string,
  selectedState: Jurisdiction,
  options: ParserOptions
): ParcelInputState {
  if (!rawInput.trim()) {
    return { ...prev, rawInput, selectedState, validParcels: [], malformedEntries: [], isValid: false };
  }

  const { valid, malformed } = parseParcelInput(selectedState, rawInput, options);

  return {
    ...prev,
    rawInput,
    selectedState,
    validParcels: valid,
    malformedEntries: malformed,
    isValid: valid.length > 0,
  };
}

export function updateRawInput(prev: ParcelInputState, rawInput: string, options: ParserOptions = {}): ParcelInputState {
  if (rawInput === prev.rawInput) return prev;
  return reparse(prev, rawInput, prev.selectedState, options);
}

export function updateSelectedState(
  prev: ParcelInputState,
  selectedState: Jurisdiction,
  options: ParserOptions = {}
): ParcelInputState {
  if (selectedState === prev.selectedState) return prev;
  return reparse(prev, prev.rawInput, selectedState, options);
}

export function clearInput(prev: ParcelInputState): ParcelInputState {
  return {
    ...prev,
    rawInput: '',
    validParcels: [],
    malformedEntries: [],
    isValid: false,
  };
}
