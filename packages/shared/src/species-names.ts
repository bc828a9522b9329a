const uniq = <T>(arr: T[]) => Array.from(new Set(arr))

// Kingdom|Phylum|Class|Order|Family|Genus|Species
const SPECIES_RANK_INDEX = 6

/**
 * Turn MetaPhlAn-style taxonomy labels ("k__Bacteria|...|s__Bacteroides_fragilis")
 * into query names ("Bacteroides fragilis"). Co-abundance groups (`_CAG_`) and
 * unnamed species (`_sp_`) are dropped.
 */
export function parseSpeciesNames(labels: readonly string[]): string[] {
  const speciesLabels = uniq(labels.filter(l => l.includes('s__')))

  const names: string[] = []
  for (const label of speciesLabels) {
    const segment = label.split('|')[SPECIES_RANK_INDEX]
    if (segment === undefined) continue
    names.push(segment.replaceAll('s__', ''))
  }

  return uniq(names)
    .filter(n => !n.includes('_CAG_') && !n.includes('_sp_'))
    .map(n => n.replaceAll('_', ' '))
}
