export type TraitScalar = string | number | boolean | null
export type TraitNode = TraitScalar | TraitNode[] | TraitMap
export interface TraitMap {
  [key: string]: TraitNode
}

// One BacDive strain record, addressed by section name ("Morphology", "Physiology and metabolism", ...)
export type BacRecord = TraitMap

export type TraitCategory =
  | 'metabolite' | 'enzyme' | 'oxygen'
  | 'gram_stain' | 'cell_shape' | 'motility'

// Single-valued traits are a joined string (or NOT_REPORTED), multi-valued ones a list of names
export type TraitValue = string | readonly string[]

export interface TraitRow {
  species: string
  set_type: TraitCategory
  set_id: string
  value: string
}

export interface TraitProfile {
  gramStain: string
  cellShape: string
  motility: string
  oxygenTolerance: string
  metabolites: string[]
  enzymes: string[]
}

export type QueryResult =
  | { ok: true; records: BacRecord[] }
  | { ok: false; reason: string }

export type SpeciesQuery = (species: string) => Promise<readonly BacRecord[]>

export type SpeciesOutcome =
  | { status: 'skipped'; species: string; reason: string }
  | {
      status: 'extracted'
      species: string
      typeStrain: boolean
      strainDesignation: string
      traits: TraitProfile
      rows: TraitRow[]
    }

export interface ExtractionResult {
  outcomes: SpeciesOutcome[]
  rows: TraitRow[]
  total: number
  gramStainCount: number
  coverage: string
}

export { NOT_REPORTED, TRAIT_TABLE_COLUMNS, SECTIONS } from './constants.js'
export { navigate, asEntrySequence, isTraitMap, fieldText, nodeText } from './record.js'
export {
  extractMorphologyTrait,
  extractOxygenTolerance,
  extractPositiveMetabolites,
  extractPositiveEnzymes,
  extractStrainDesignation,
} from './extractors.js'
export { findTypeStrainIndices, selectPreferred } from './selector.js'
export { buildRows } from './rows.js'
export type { ExtractTraitsOptions } from './extraction.js'
export { queryCandidates, processSpecies, extractTraits, formatCoverage } from './extraction.js'
export { parseSpeciesNames } from './species-names.js'
