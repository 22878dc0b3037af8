import type { UnitLabel } from '../types.js';

const INTENSITY: UnitLabel = ['Intensity I', ' in ', 'a.u.'];
const EXTINCTION: UnitLabel = ['Extinction E', '', ''];
const TRANSMISSION: UnitLabel = ['Transmission', ' in ', '%'];

const UNIT_TABLE: ReadonlyMap<string, UnitLabel> = new Map([
  ['INTENSITY', INTENSITY],
  ['A', EXTINCTION],
  ['E', EXTINCTION],
  ['%T', TRANSMISSION],
]);

/**
 * Map a mode code to its display unit. Unknown codes pass through as the
 * unit symbol with an empty quantity.
 */
export function resolveUnitLabel(modeCode: string): UnitLabel {
  return UNIT_TABLE.get(modeCode) ?? ['', '', modeCode];
}

export function formatUnitLabel(unit: UnitLabel): string {
  return unit.join('');
}
