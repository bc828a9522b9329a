import type {
  ExtractionResult,
  QueryResult,
  SpeciesOutcome,
  SpeciesQuery,
  TraitProfile,
  TraitRow,
} from './index.js'
import { NOT_REPORTED } from './constants.js'
import {
  extractMorphologyTrait,
  extractOxygenTolerance,
  extractPositiveEnzymes,
  extractPositiveMetabolites,
  extractStrainDesignation,
} from './extractors.js'
import { findTypeStrainIndices, selectPreferred } from './selector.js'
import { buildRows } from './rows.js'

export async function queryCandidates(query: SpeciesQuery, species: string): Promise<QueryResult> {
  try {
    const records = await query(species)
    return { ok: true, records: [...records] }
  } catch (error) {
    return { ok: false, reason: error instanceof Error ? error.message : String(error) }
  }
}

export function processSpecies(species: string, result: QueryResult): SpeciesOutcome {
  if (!result.ok) return { status: 'skipped', species, reason: result.reason }

  const preferred = selectPreferred(result.records)
  if (!preferred) return { status: 'skipped', species, reason: 'no records found' }

  const traits: TraitProfile = {
    gramStain: extractMorphologyTrait(preferred, 'gram stain'),
    cellShape: extractMorphologyTrait(preferred, 'cell shape'),
    motility: extractMorphologyTrait(preferred, 'motility'),
    oxygenTolerance: extractOxygenTolerance(preferred),
    metabolites: extractPositiveMetabolites(preferred),
    enzymes: extractPositiveEnzymes(preferred),
  }

  const rows: TraitRow[] = [
    ...buildRows(species, 'metabolite', 'metabolite', traits.metabolites),
    ...buildRows(species, 'enzyme', 'enzyme', traits.enzymes),
    ...buildRows(species, 'oxygen', 'oxygen_tolerance', traits.oxygenTolerance),
    ...buildRows(species, 'gram_stain', 'gram_stain', traits.gramStain),
    ...buildRows(species, 'cell_shape', 'cell_shape', traits.cellShape),
    ...buildRows(species, 'motility', 'motility', traits.motility),
  ]

  return {
    status: 'extracted',
    species,
    typeStrain: findTypeStrainIndices(result.records).length > 0,
    strainDesignation: extractStrainDesignation(preferred),
    traits,
    rows,
  }
}

// Two decimals, exact ties to even: 1/32 -> 3.125 -> 3.12
function roundHalfEven2(x: number): number {
  const scaled = x * 100
  const floor = Math.floor(scaled)
  if (scaled - floor !== 0.5) return Math.round(scaled) / 100
  return (floor % 2 === 0 ? floor : floor + 1) / 100
}

// "66.67%", "50%", "0%" for an empty run
export function formatCoverage(count: number, total: number): string {
  const pct = total > 0 ? roundHalfEven2((count / total) * 100) : 0
  return `${pct}%`
}

export interface ExtractTraitsOptions {
  onOutcome?: (outcome: SpeciesOutcome, index: number) => void
  // called before each query, e.g. to update a spinner
  onStart?: (species: string, index: number) => void
}

/**
 * Query and process each species in order, folding rows and the gram-stain count.
 * A failing query only skips its own species.
 */
export async function extractTraits(
  names: readonly string[],
  query: SpeciesQuery,
  options: ExtractTraitsOptions = {}
): Promise<ExtractionResult> {
  const outcomes: SpeciesOutcome[] = []

  for (const [i, species] of names.entries()) {
    options.onStart?.(species, i)
    const outcome = processSpecies(species, await queryCandidates(query, species))
    outcomes.push(outcome)
    options.onOutcome?.(outcome, i)
  }

  const rows = outcomes.flatMap(o => (o.status === 'extracted' ? o.rows : []))
  const gramStainCount = outcomes.filter(
    o => o.status === 'extracted' && o.traits.gramStain !== NOT_REPORTED
  ).length

  return {
    outcomes,
    rows,
    total: names.length,
    gramStainCount,
    coverage: formatCoverage(gramStainCount, names.length),
  }
}
