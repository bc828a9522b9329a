import type { TraitMap, TraitNode } from './index.js'

export function isTraitMap(node: TraitNode | undefined): node is TraitMap {
  return typeof node === 'object' && node !== null && !Array.isArray(node)
}

/**
 * Walk `path` one section name at a time. Returns undefined as soon as a segment is
 * missing or the current level is not a keyed node.
 */
export function navigate(node: TraitNode | undefined, path: readonly string[]): TraitNode | undefined {
  let current = node
  for (const segment of path) {
    if (!isTraitMap(current) || !Object.hasOwn(current, segment)) return undefined
    current = current[segment]
  }
  return current
}

/**
 * BacDive stores a block either as one flat entry or as a list of entries.
 * Both come back as a list; any other shape reads as absent.
 */
export function asEntrySequence(node: TraitNode | undefined, field: string): readonly TraitMap[] {
  if (node === undefined) return []
  if (isTraitMap(node)) return Object.hasOwn(node, field) ? [node] : []
  if (Array.isArray(node) && node.every(isTraitMap)) return node
  return []
}

function scalarText(node: TraitNode): string | undefined {
  if (typeof node === 'string') return node
  if (typeof node === 'number' || typeof node === 'boolean') return String(node)
  return undefined
}

// Text of a scalar, or of each scalar in a list; untrimmed
export function nodeText(node: TraitNode | undefined): string[] {
  if (node === undefined) return []
  const items = Array.isArray(node) ? node : [node]
  const out: string[] = []
  for (const item of items) {
    const text = scalarText(item)
    if (text !== undefined) out.push(text)
  }
  return out
}

export function fieldText(entry: TraitMap, field: string): string[] {
  return Object.hasOwn(entry, field) ? nodeText(entry[field]) : []
}
