import { describe, it, expect } from 'vitest'
import { asEntrySequence, fieldText, navigate } from './record.js'
import type { TraitMap } from './index.js'

const record: TraitMap = {
  Morphology: {
    'cell morphology': { 'gram stain': 'negative', 'cell shape': 'rod-shaped' },
  },
  'Physiology and metabolism': {
    enzymes: [
      { value: 'catalase', activity: '+' },
      { value: 'oxidase', activity: '-' },
    ],
  },
}

describe('navigate', () => {
  it('should return the sub-structure at a path', () => {
    expect(navigate(record, ['Morphology', 'cell morphology'])).toEqual({
      'gram stain': 'negative',
      'cell shape': 'rod-shaped',
    })
  })

  it('should return the node itself for an empty path', () => {
    expect(navigate(record, [])).toBe(record)
  })

  it('should return undefined when a segment is missing', () => {
    expect(navigate(record, ['Morphology', 'colony morphology'])).toBeUndefined()
    expect(navigate(record, ['Culture and growth conditions', 'culture medium'])).toBeUndefined()
  })

  it('should return undefined when stepping into a list or scalar', () => {
    expect(navigate(record, ['Physiology and metabolism', 'enzymes', 'value'])).toBeUndefined()
    expect(navigate(record, ['Morphology', 'cell morphology', 'gram stain', 'x'])).toBeUndefined()
    expect(navigate(null, ['Morphology'])).toBeUndefined()
  })

  it('should not treat inherited properties as keys', () => {
    expect(navigate(record, ['toString'])).toBeUndefined()
  })
})

describe('asEntrySequence', () => {
  it('should return an empty list for an absent block', () => {
    expect(asEntrySequence(undefined, 'gram stain')).toEqual([])
  })

  it('should wrap a flat entry that holds the field', () => {
    const block = { 'gram stain': 'positive' }
    expect(asEntrySequence(block, 'gram stain')).toEqual([block])
  })

  it('should return a list of keyed entries unchanged', () => {
    const entries: TraitMap[] = [{ 'gram stain': 'positive' }, { motility: 'no' }]
    expect(asEntrySequence(entries, 'gram stain')).toBe(entries)
  })

  it('should be idempotent on an already normalized list', () => {
    const entries: TraitMap[] = [{ 'cell shape': 'rod-shaped' }]
    const once = asEntrySequence(entries, 'cell shape')
    expect(asEntrySequence([...once], 'cell shape')).toEqual(once)
  })

  it('should treat a keyed block without the field as absent', () => {
    expect(asEntrySequence({ motility: 'yes' }, 'gram stain')).toEqual([])
  })

  it('should treat lists of scalars and mixed lists as absent', () => {
    expect(asEntrySequence(['rod', 'coccus'], 'cell shape')).toEqual([])
    expect(asEntrySequence([{ 'cell shape': 'rod' }, 'coccus'], 'cell shape')).toEqual([])
    expect(asEntrySequence('rod', 'cell shape')).toEqual([])
    expect(asEntrySequence(null, 'cell shape')).toEqual([])
  })
})

describe('fieldText', () => {
  it('should read scalar and list-of-scalar fields', () => {
    expect(fieldText({ a: ' rod ' }, 'a')).toEqual([' rod '])
    expect(fieldText({ a: 12 }, 'a')).toEqual(['12'])
    expect(fieldText({ a: ['x', true, { b: 'y' }] }, 'a')).toEqual(['x', 'true'])
  })

  it('should return nothing for a missing, null or keyed field', () => {
    expect(fieldText({}, 'a')).toEqual([])
    expect(fieldText({ a: null }, 'a')).toEqual([])
    expect(fieldText({ a: { b: 'c' } }, 'a')).toEqual([])
  })
})
