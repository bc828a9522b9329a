#!/usr/bin/env tsx
import 'dotenv/config'
import fs from 'node:fs'
import path from 'node:path'
import { Command } from 'commander'
import chalk from 'chalk'
import { BacDiveClient } from '../bacdive/client.js'
import { TraitPipelineRunner } from './runner.js'
import { pipelineConfig as config } from './config.js'
import { loadSpeciesNames } from './steps/species-names.js'
import { isMainModule } from './entry.js'

const errorMessage = (error: unknown) => (error instanceof Error ? error.message : String(error))

const parseLimit = (value: string) => {
  const n = Number.parseInt(value, 10)
  if (!Number.isInteger(n) || n < 0) throw new Error(`--limit must be a non-negative integer, got "${value}"`)
  return n
}

interface ExtractCommandOptions {
  input?: string
  species?: string[]
  out?: string
  report?: string
  limit?: number
  verbose?: boolean
}

export const program = new Command()

program
  .name('bactraits')
  .description('Extract BacDive phenotypic traits into a long-format table')
  .version('1.0.0')

program
  .command('extract')
  .description('Query BacDive for every species and write the trait table')
  .option('-i, --input <file>', 'Relative-abundance table with taxonomy labels')
  .option('-s, --species <names>', 'Comma-separated species names (skips the input table)', (value) =>
    value.split(',').map(s => s.trim()).filter(Boolean)
  )
  .option('-o, --out <file>', 'Output TSV path')
  .option('--report <file>', 'Run report JSON path')
  .option('--limit <n>', 'Only query the first n species', parseLimit)
  .option('--verbose', 'Print the extracted traits of each species')
  .action(async (options: ExtractCommandOptions) => {
    const client = new BacDiveClient(config.bacdive)
    const runner = new TraitPipelineRunner(name => client.query(name))

    try {
      await client.login()
      await runner.run(options)
    } catch (error) {
      console.error(chalk.red(`\n❌ Extraction failed: ${errorMessage(error)}`))
      process.exit(1)
    }
  })

program
  .command('names')
  .description('Print the cleaned species names from the input table')
  .option('-i, --input <file>', 'Relative-abundance table with taxonomy labels')
  .action((options: { input?: string }) => {
    const input = options.input ? path.resolve(options.input) : config.inputs.abundanceTable
    try {
      for (const name of loadSpeciesNames(input)) console.log(name)
    } catch (error) {
      console.error(chalk.red(`❌ ${errorMessage(error)}`))
      process.exit(1)
    }
  })

program
  .command('clean')
  .description('Remove extraction outputs')
  .action(() => {
    console.log(chalk.yellow('🧹 Cleaning extraction outputs...'))
    for (const file of Object.values(config.outputs)) {
      fs.rmSync(file, { force: true })
    }
    console.log(chalk.green('✅ Clean completed'))
  })

// Handle direct execution
if (isMainModule(import.meta.url, process.argv[1])) {
  program.parseAsync().catch((error: unknown) => {
    console.error(chalk.red(errorMessage(error)))
    process.exit(1)
  })
}
