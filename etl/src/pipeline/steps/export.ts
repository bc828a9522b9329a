import fs from 'node:fs'
import path from 'node:path'
import { TRAIT_TABLE_COLUMNS, type TraitRow } from '@bactraits/shared'
import type { RunReport } from '../types.js'

const cell = (v: string) => v.replace(/[\t\r\n]+/g, ' ')

export function formatTraitTable(rows: readonly TraitRow[]): string {
  const lines = [TRAIT_TABLE_COLUMNS.join('\t')]
  for (const row of rows) {
    lines.push(TRAIT_TABLE_COLUMNS.map(col => cell(row[col])).join('\t'))
  }
  return lines.join('\n') + '\n'
}

export function writeTraitTable(rows: readonly TraitRow[], file: string): void {
  fs.mkdirSync(path.dirname(file), { recursive: true })
  fs.writeFileSync(file, formatTraitTable(rows))
}

export function writeRunReport(report: RunReport, file: string): void {
  fs.mkdirSync(path.dirname(file), { recursive: true })
  fs.writeFileSync(file, JSON.stringify(report, null, 2))
}
