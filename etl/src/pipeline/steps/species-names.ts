import fs from 'node:fs'
import { parseSpeciesNames } from '@bactraits/shared'

/**
 * First column of every data line in a tab-separated relative-abundance table.
 * Quoted row names (as written by R or pandas) are unquoted; comment lines are skipped.
 */
export function readAbundanceLabels(file: string): string[] {
  if (!fs.existsSync(file)) {
    throw new Error(`Abundance table not found: ${file}`)
  }

  const labels: string[] = []
  for (const line of fs.readFileSync(file, 'utf8').split(/\r?\n/)) {
    if (!line.trim() || line.startsWith('#')) continue
    const label = line.split('\t')[0].trim().replace(/^"(.*)"$/, '$1')
    if (label) labels.push(label)
  }
  return labels
}

export function loadSpeciesNames(file: string): string[] {
  return parseSpeciesNames(readAbundanceLabels(file))
}
