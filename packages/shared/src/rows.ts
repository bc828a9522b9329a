import type { TraitCategory, TraitRow, TraitValue } from './index.js'

/**
 * Long-format rows for one trait of one species.
 *
 * A list value gives one `"+"` row per distinct entry, keyed by the entry itself (`setId`
 * is unused). A string value gives exactly one row keyed by `setId`, the "not reported"
 * sentinel included.
 */
export function buildRows(
  species: string,
  setType: TraitCategory,
  setId: string,
  value: TraitValue
): TraitRow[] {
  if (typeof value === 'string') {
    return [{ species, set_type: setType, set_id: setId, value }]
  }
  return Array.from(new Set(value)).map(id => ({
    species,
    set_type: setType,
    set_id: id,
    value: '+',
  }))
}
