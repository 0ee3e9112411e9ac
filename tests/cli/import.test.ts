import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import { buildOptions, type CommandContext } from '../../src/cli/context.js'
import { runImport } from '../../src/cli/commands/import.js'
import { EnvironmentController } from '../../src/controller.js'
import { getDefaultConfig } from '../../src/lib/config-loader.js'
import { MemoryRegistryBackend } from '../../src/lib/memory-registry.js'

describe('runImport', () => {
  let tempDir: string
  let backend: MemoryRegistryBackend
  let written: string[]

  function contextFor(file: string): CommandContext {
    const config = getDefaultConfig(tempDir)
    return {
      command: ['import'],
      args: [],
      options: buildOptions({ file, json: true }),
      config,
      controller: new EnvironmentController({ config, backend, directoryCheck: () => true })
    }
  }

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'winenv-import-'))
    backend = new MemoryRegistryBackend({ user: { FOO: 'bar' } })
    written = []
    vi.spyOn(process.stdout, 'write').mockImplementation((chunk: string | Uint8Array) => {
      written.push(String(chunk))
      return true
    })
  })

  afterEach(() => {
    vi.restoreAllMocks()
    fs.rmSync(tempDir, { recursive: true, force: true })
  })

  it('applies the file and prints the report', async () => {
    const file = path.join(tempDir, 'env.csv')
    fs.writeFileSync(file, 'scope,name,value\r\nuser,NEW,1\r\n')

    await runImport(contextFor(file))

    expect(backend.list('user').map(v => [v.name, v.value])).toEqual([['FOO', 'bar'], ['NEW', '1']])
    expect(JSON.parse(written.join('')).applied).toEqual(['NEW'])
  })

  it('leaves no SIGINT listener behind and never installs one', async () => {
    const file = path.join(tempDir, 'env.csv')
    fs.writeFileSync(file, 'scope,name,value\r\nuser,NEW,1\r\n')
    const before = process.listenerCount('SIGINT')
    const once = vi.spyOn(process, 'once')

    await runImport(contextFor(file))

    expect(once).not.toHaveBeenCalled()
    expect(process.listenerCount('SIGINT')).toBe(before)
  })
})
