import path from 'path'
import { fileURLToPath } from 'url'
import { readFileSync, existsSync } from 'fs'

// Find workspace root by looking for a package.json with a "workspaces" field
export const findWorkspaceRoot = (startDir: string): string => {
  let current = startDir
  while (current !== '/' && current !== '') {
    const packageJsonPath = path.join(current, 'package.json')
    if (existsSync(packageJsonPath)) {
      try {
        const pkg: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf8'))
        if (typeof pkg === 'object' && pkg !== null && 'workspaces' in pkg) {
          return current
        }
      } catch {
        // Continue searching
      }
    }

    const parent = path.dirname(current)
    if (parent === current) break // Reached root
    current = parent
  }
  throw new Error('Workspace root not found')
}

const __dirname = path.dirname(fileURLToPath(import.meta.url))
const workspaceRoot = findWorkspaceRoot(__dirname)

export const PATHS = {
  workspaceRoot,

  // Inputs
  abundanceTable: 'data/abundance/relative_abundance.tsv',

  // Outputs
  traitTable: 'etl/build/traits_long.tsv',
  runReport: 'etl/build/report/run-report.json',
} as const

// Helper function to resolve paths relative to workspace root
export const resolvePath = (relativePath: string): string => {
  return path.isAbsolute(relativePath) ? relativePath : path.join(workspaceRoot, relativePath)
}
