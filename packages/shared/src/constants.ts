export const NOT_REPORTED = 'not reported'

export const TRAIT_TABLE_COLUMNS = ['species', 'set_type', 'set_id', 'value'] as const

export const SECTIONS = {
  taxonomy: 'Name and taxonomic classification',
  morphology: 'Morphology',
  physiology: 'Physiology and metabolism',
} as const
