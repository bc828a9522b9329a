import { describe, it, expect } from 'vitest'
import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import { findWorkspaceRoot, parseEnv, PATHS, resolvePath } from './index.js'

describe('parseEnv', () => {
  it('should fill defaults for an empty environment', () => {
    const env = parseEnv({})
    expect(env.BACDIVE_API_URL).toBe('https://api.bacdive.dsmz.de')
    expect(env.BACDIVE_SLEEP_MS).toBe(100)
    expect(env.BACDIVE_USERNAME).toBe('')
    expect(env.TRAITS_OUTPUT).toBe(PATHS.traitTable)
  })

  it('should coerce the request pause', () => {
    expect(parseEnv({ BACDIVE_SLEEP_MS: '250' }).BACDIVE_SLEEP_MS).toBe(250)
  })

  it('should reject a negative pause and a malformed API url', () => {
    expect(() => parseEnv({ BACDIVE_SLEEP_MS: '-1' })).toThrow()
    expect(() => parseEnv({ BACDIVE_API_URL: 'not a url' })).toThrow()
  })
})

describe('resolvePath', () => {
  it('should anchor relative paths at the workspace root', () => {
    expect(resolvePath('etl/build/x.tsv')).toBe(`${PATHS.workspaceRoot}/etl/build/x.tsv`)
    expect(resolvePath('/tmp/x.tsv')).toBe('/tmp/x.tsv')
  })
})

describe('findWorkspaceRoot', () => {
  it('should skip an unreadable package.json on the way up', () => {
    const root = fs.mkdtempSync(path.join(os.tmpdir(), 'bactraits-root-'))
    try {
      fs.writeFileSync(path.join(root, 'package.json'), JSON.stringify({ workspaces: ['pkg'] }))
      fs.mkdirSync(path.join(root, 'pkg', 'src'), { recursive: true })
      fs.writeFileSync(path.join(root, 'pkg', 'package.json'), '{ not json')

      expect(findWorkspaceRoot(path.join(root, 'pkg', 'src'))).toBe(root)
    } finally {
      fs.rmSync(root, { recursive: true, force: true })
    }
  })
})
