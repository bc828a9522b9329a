import { describe, it, expect } from 'vitest'
import { buildRows } from './rows.js'

describe('buildRows', () => {
  it('should emit one presence row per distinct list value', () => {
    const rows = buildRows('E. coli', 'enzyme', 'enzyme', ['catalase', 'oxidase', 'catalase'])
    expect(rows).toHaveLength(2)
    expect(rows).toEqual(
      expect.arrayContaining([
        { species: 'E. coli', set_type: 'enzyme', set_id: 'catalase', value: '+' },
        { species: 'E. coli', set_type: 'enzyme', set_id: 'oxidase', value: '+' },
      ])
    )
  })

  it('should emit a single row for a scalar trait, sentinel included', () => {
    expect(buildRows('E. coli', 'gram_stain', 'gram_stain', 'not reported')).toEqual([
      { species: 'E. coli', set_type: 'gram_stain', set_id: 'gram_stain', value: 'not reported' },
    ])
    expect(buildRows('E. coli', 'oxygen', 'oxygen_tolerance', 'facultative anaerobe')).toEqual([
      { species: 'E. coli', set_type: 'oxygen', set_id: 'oxygen_tolerance', value: 'facultative anaerobe' },
    ])
  })

  it('should emit nothing for an empty list', () => {
    expect(buildRows('E. coli', 'metabolite', 'metabolite', [])).toEqual([])
  })
})
