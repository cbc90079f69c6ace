import { existsSync, mkdtempSync, readFileSync, rmSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { resolveOutputPath, writeOutputFile } from './io'

describe('CLI I/O', () => {
  describe('resolveOutputPath', () => {
    it('joins relative paths onto the output directory', () => {
      expect(resolveOutputPath('out.json', '/data/exports')).toBe(join('/data/exports', 'out.json'))
    })

    it('keeps absolute paths', () => {
      expect(resolveOutputPath('/tmp/out.json', '/data/exports')).toBe('/tmp/out.json')
    })

    it('keeps the path when no directory is configured', () => {
      expect(resolveOutputPath('out.json', undefined)).toBe('out.json')
    })
  })

  describe('writeOutputFile', () => {
    let tempDir: string

    beforeEach(() => {
      tempDir = mkdtempSync(join(tmpdir(), 'dm-ingest-io-test-'))
    })

    afterEach(() => {
      rmSync(tempDir, { recursive: true, force: true })
    })

    it('creates missing parent directories', async () => {
      const path = join(tempDir, 'a', 'b', 'out.json')
      await writeOutputFile(path, '{}')
      expect(existsSync(path)).toBe(true)
      expect(readFileSync(path, 'utf-8')).toBe('{}')
    })
  })
})
