import chalk from 'chalk'
import ora from 'ora'
import path from 'node:path'
import {
  extractTraits,
  type SpeciesOutcome,
  type SpeciesQuery,
} from '@bactraits/shared'
import { pipelineConfig } from './config.js'
import { loadSpeciesNames } from './steps/species-names.js'
import { writeRunReport, writeTraitTable } from './steps/export.js'
import type { PipelineConfig, RunOptions, RunReport } from './types.js'

export class TraitPipelineRunner {
  private startTime = Date.now()

  constructor(
    private query: SpeciesQuery,
    private config: PipelineConfig = pipelineConfig
  ) {}

  async run(options: RunOptions = {}): Promise<RunReport> {
    this.startTime = Date.now()
    const input = options.input ? path.resolve(options.input) : this.config.inputs.abundanceTable
    const traitTable = options.out ? path.resolve(options.out) : this.config.outputs.traitTable
    const runReport = options.report ? path.resolve(options.report) : this.config.outputs.runReport

    console.log(chalk.cyan('🦠 BacDive Trait Extraction'))
    console.log(chalk.cyan('='.repeat(50)))
    console.log()

    let names = options.species?.length ? options.species : loadSpeciesNames(input)
    if (options.limit !== undefined) names = names.slice(0, options.limit)
    console.log(`🔎 Species to query: ${names.length}`)

    const spinner = ora({ text: '', color: 'cyan' })
    const result = await extractTraits(names, this.query, {
      onStart: (species, i) => {
        spinner.start(`Species ${i + 1}/${names.length}: ${species}`)
      },
      onOutcome: (outcome, i) => {
        const label = `${i + 1}/${names.length} ${outcome.species}`
        if (outcome.status === 'skipped') {
          spinner.warn(chalk.yellow(`❌ ${label}: ${outcome.reason}`))
          return
        }
        spinner.succeed(chalk.green(`✅ ${label} (${outcome.rows.length} rows)`))
        if (options.verbose) this.printOutcome(outcome)
      },
    })

    writeTraitTable(result.rows, traitTable)

    const extracted = result.outcomes.filter(o => o.status === 'extracted')
    const report: RunReport = {
      success: true,
      startedAt: new Date(this.startTime).toISOString(),
      duration: Date.now() - this.startTime,
      input: options.species?.length ? 'cli' : input,
      outputs: { traitTable, runReport },
      summary: {
        species: result.total,
        extracted: extracted.length,
        skipped: result.total - extracted.length,
        typeStrains: extracted.filter(o => o.status === 'extracted' && o.typeStrain).length,
        rows: result.rows.length,
        gramStainCount: result.gramStainCount,
        coverage: result.coverage,
      },
      skipped: result.outcomes.flatMap(o =>
        o.status === 'skipped' ? [{ species: o.species, reason: o.reason }] : []
      ),
    }
    writeRunReport(report, runReport)

    console.log()
    console.log(chalk.cyan('📊 EXTRACTION SUMMARY'))
    console.log(chalk.cyan('='.repeat(50)))
    console.log(`🧫 Species with records: ${report.summary.extracted}/${report.summary.species}`)
    console.log(`🏷️  Type strains selected: ${report.summary.typeStrains}`)
    console.log(`📄 Trait rows: ${report.summary.rows} -> ${traitTable}`)
    console.log(`⏱️  Execution time: ${(report.duration / 1000).toFixed(2)}s`)
    console.log(chalk.green(`Found result for  ${result.coverage}`))

    return report
  }

  private printOutcome(outcome: Extract<SpeciesOutcome, { status: 'extracted' }>) {
    const { traits } = outcome
    console.log(`   • Type strain found? ${outcome.typeStrain ? '✅ YES' : '❌ NO'}`)
    console.log(`   • Selected strain:   ${outcome.strainDesignation}`)
    console.log(`   • Gram stain:        ${traits.gramStain}`)
    console.log(`   • Cell shape:        ${traits.cellShape}`)
    console.log(`   • Motility:          ${traits.motility}`)
    console.log(`   • Oxygen tolerance:  ${traits.oxygenTolerance}`)
    console.log(`   • Positive metabolites: ${traits.metabolites.join(', ') || '-'}`)
    console.log(`   • Positive enzymes:     ${traits.enzymes.join(', ') || '-'}`)
  }
}
