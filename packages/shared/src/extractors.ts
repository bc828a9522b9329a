import type { BacRecord, TraitMap } from './index.js'
import { NOT_REPORTED, SECTIONS } from './constants.js'
import { asEntrySequence, fieldText, navigate, nodeText } from './record.js'

const uniq = <T>(arr: T[]) => Array.from(new Set(arr))

const joinOrNotReported = (values: string[]) =>
  values.length ? uniq(values).join('; ') : NOT_REPORTED

function entriesAt(record: BacRecord, path: readonly string[], field: string): readonly TraitMap[] {
  return asEntrySequence(navigate(record, path), field)
}

// "gram stain", "cell shape", "motility", ... from Morphology > cell morphology
export function extractMorphologyTrait(record: BacRecord, traitName: string): string {
  const values: string[] = []
  for (const entry of entriesAt(record, [SECTIONS.morphology, 'cell morphology'], traitName)) {
    for (const text of fieldText(entry, traitName)) {
      const v = text.trim()
      if (v) values.push(v)
    }
  }
  return joinOrNotReported(values)
}

export function extractOxygenTolerance(record: BacRecord): string {
  const field = 'oxygen tolerance'
  const values: string[] = []
  for (const entry of entriesAt(record, [SECTIONS.physiology, 'oxygen tolerance'], field)) {
    for (const text of fieldText(entry, field)) {
      const v = text.trim().toLowerCase()
      if (v) values.push(v)
    }
  }
  return joinOrNotReported(values)
}

/**
 * Names from entries whose `flagField` is exactly "+".
 * Empty list when nothing matches; never NOT_REPORTED.
 */
function positiveNames(
  entries: readonly TraitMap[],
  flagField: string,
  nameField: string
): string[] {
  const names: string[] = []
  for (const entry of entries) {
    if (entry[flagField] !== '+') continue
    for (const text of fieldText(entry, nameField)) {
      const v = text.trim()
      if (v) names.push(v)
    }
  }
  return uniq(names)
}

export function extractPositiveMetabolites(record: BacRecord): string[] {
  const entries = entriesAt(record, [SECTIONS.physiology, 'metabolite utilization'], 'metabolite')
  return positiveNames(entries, 'utilization activity', 'metabolite')
}

// BacDive keeps the enzyme name under "value"
export function extractPositiveEnzymes(record: BacRecord): string[] {
  const entries = entriesAt(record, [SECTIONS.physiology, 'enzymes'], 'value')
  return positiveNames(entries, 'activity', 'value')
}

export function extractStrainDesignation(record: BacRecord): string {
  const values = nodeText(navigate(record, [SECTIONS.taxonomy, 'strain designation']))
    .map(v => v.trim())
    .filter(Boolean)
  return values.length ? values.join('; ') : NOT_REPORTED
}
