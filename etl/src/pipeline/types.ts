export interface PipelineConfig {
  inputs: {
    // relative-abundance table whose first column holds taxonomy labels
    abundanceTable: string
  }
  outputs: {
    traitTable: string
    runReport: string
  }
  bacdive: {
    username: string
    password: string
    apiUrl: string
    tokenUrl: string
    sleepMs: number
  }
}

export interface RunOptions {
  // explicit species names; the abundance table is not read when given
  species?: string[]
  input?: string
  out?: string
  report?: string
  limit?: number
  verbose?: boolean
}

export interface RunReport {
  success: boolean
  startedAt: string
  duration: number
  input: string
  outputs: {
    traitTable: string
    runReport: string
  }
  summary: {
    species: number
    extracted: number
    skipped: number
    typeStrains: number
    rows: number
    gramStainCount: number
    coverage: string
  }
  skipped: Array<{
    species: string
    reason: string
  }>
}
