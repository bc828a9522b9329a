import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import { pathToFileURL } from 'node:url'
import { isMainModule } from './entry.js'

describe('isMainModule', () => {
  let dir: string
  let script: string

  beforeEach(() => {
    dir = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), 'bactraits-entry-')))
    script = path.join(dir, 'index.ts')
    fs.writeFileSync(script, '')
  })

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true })
  })

  it('should match the script started directly', () => {
    expect(isMainModule(pathToFileURL(script).href, script)).toBe(true)
  })

  it('should match the script started through a bin symlink', () => {
    const link = path.join(dir, 'bactraits')
    fs.symlinkSync(script, link)
    expect(isMainModule(pathToFileURL(script).href, link)).toBe(true)
  })

  it('should not match another script or a missing argv entry', () => {
    const other = path.join(dir, 'other.ts')
    fs.writeFileSync(other, '')
    expect(isMainModule(pathToFileURL(script).href, other)).toBe(false)
    expect(isMainModule(pathToFileURL(script).href, path.join(dir, 'missing.ts'))).toBe(false)
    expect(isMainModule(pathToFileURL(script).href, undefined)).toBe(false)
  })
})
