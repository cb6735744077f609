import { describe, it, expect } from 'vitest';
import { clearInput, createParcelInputState, updateRawInput, updateSelectedState } from './parcelInput';

describe('parcel input state', () => {
  it('should start empty on NSW', () => {
    expect(createParcelInputState()).toEqual({
      rawInput: '',
      selectedState: 'NSW',
      validParcels: [],
      malformedEntries: [],
      isValid: false,
    });
  });

  it('should parse raw input for the selected state', () => {
    const state = updateRawInput(createParcelInputState(), '13//DP1\nbad');

    expect(state.validParcels.map((parcel) => parcel.id)).toEqual(['13//DP1']);
    expect(state.malformedEntries.map((entry) => entry.raw)).toEqual(['bad']);
    expect(state.isValid).toBe(true);
  });

  it('should return the same state for unchanged input', () => {
    const state = updateRawInput(createParcelInputState(), '13//DP1');

    expect(updateRawInput(state, '13//DP1')).toBe(state);
    expect(updateSelectedState(state, 'NSW')).toBe(state);
  });

  it('should reset results for blank input', () => {
    const state = updateRawInput(updateRawInput(createParcelInputState(), '13//DP1'), '   ');

    expect(state).toEqual({ ...createParcelInputState(), rawInput: '   ' });
  });

  it('should re-parse when the state changes', () => {
    const nsw = updateRawInput(createParcelInputState(), '1RP912949');
    expect(nsw.isValid).toBe(false);

    const qld = updateSelectedState(nsw, 'QLD');
    expect(qld.selectedState).toBe('QLD');
    expect(qld.validParcels.map((parcel) => parcel.id)).toEqual(['1RP912949']);
    expect(qld.malformedEntries).toEqual([]);
    expect(qld.isValid).toBe(true);
  });

  it('should pass parser options through', () => {
    const state = updateRawInput(createParcelInputState(), '1-9//DP5', { maxRangeSize: 5 });

    expect(state.validParcels).toEqual([]);
    expect(state.malformedEntries).toEqual([{ raw: '1-9//DP5', error: 'Range covers 9 lots (max 5)' }]);
  });

  it('should clear input but keep the state', () => {
    const state = clearInput(updateSelectedState(updateRawInput(createParcelInputState(), '101//D1'), 'SA'));

    expect(state).toEqual({ ...createParcelInputState('SA') });
  });
});
