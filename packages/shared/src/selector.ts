import type { BacRecord } from './index.js'
import { SECTIONS } from './constants.js'
import { navigate } from './record.js'

function isTypeStrain(record: BacRecord): boolean {
  const val = navigate(record, [SECTIONS.taxonomy, 'type strain'])
  return typeof val === 'string' && val.toLowerCase() === 'yes'
}

export function findTypeStrainIndices(candidates: readonly BacRecord[]): number[] {
  const out: number[] = []
  candidates.forEach((record, i) => {
    if (isTypeStrain(record)) out.push(i)
  })
  return out
}

// First type strain in input order, else the first record; undefined for an empty set
export function selectPreferred(candidates: readonly BacRecord[]): BacRecord | undefined {
  const [first] = findTypeStrainIndices(candidates)
  return candidates[first ?? 0]
}
