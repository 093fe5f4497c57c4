import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { mkdir, rm, writeFile } from 'node:fs/promises'
import { join, normalize } from 'node:path'
import { tmpdir } from 'node:os'
import { runResolveBundle } from '../resolve-bundle.js'
import { captureOutput } from '../../../../test/helpers/capture-output.js'

let testDir: string
let nestedDir: string

async function writeConfig(markers: string[]): Promise<string> {
  const path = join(testDir, 'foreman.yaml')
  await writeFile(path, `bundle_markers: [${markers.join(', ')}]\n`, 'utf-8')
  return path
}

beforeEach(async () => {
  testDir = join(tmpdir(), `foreman-bundle-cmd-${String(Date.now())}-${Math.random().toString(36).slice(2)}`)
  nestedDir = join(testDir, 'packages', 'app')
  await mkdir(nestedDir, { recursive: true })
  await mkdir(join(testDir, '.foreman-cli-test'))
})

afterEach(async () => {
  await rm(testDir, { recursive: true, force: true })
  vi.restoreAllMocks()
})

describe('runResolveBundle', () => {
  it('anchors a relative reference at the nearest marker directory', async () => {
    const configPath = await writeConfig(['.foreman-cli-test'])
    const out = captureOutput()
    const code = await runResolveBundle('workers/coding', { configPath, cwd: nestedDir })
    out.restore()

    expect(code).toBe(0)
    expect(out.getStdout()).toBe(`${normalize(join(testDir, 'workers/coding'))}\n  source: marker\n`)
  })

  it('leaves addressable references untouched', async () => {
    const configPath = await writeConfig(['.foreman-cli-test'])
    const out = captureOutput()
    const code = await runResolveBundle('git+https://example.com/workers/coding@main', {
      configPath,
      cwd: nestedDir,
    })
    out.restore()

    expect(code).toBe(0)
    expect(out.getStdout()).toBe('git+https://example.com/workers/coding@main\n  source: absolute\n')
  })

  it('falls back to --repo-root when no marker is found', async () => {
    const configPath = await writeConfig(['.foreman-cli-absent'])
    const out = captureOutput()
    const code = await runResolveBundle('workers/coding', {
      configPath,
      cwd: nestedDir,
      repoRoot: '/srv/repo',
    })
    out.restore()

    expect(code).toBe(0)
    expect(out.getStdout()).toBe(`${normalize(join('/srv/repo', 'workers/coding'))}\n  source: repo-root\n`)
  })

  it('exits 1 for a reference that cannot be anchored', async () => {
    const configPath = await writeConfig(['.foreman-cli-absent'])
    const out = captureOutput()
    const code = await runResolveBundle('workers/coding', { configPath, cwd: nestedDir })
    out.restore()

    expect(code).toBe(1)
    expect(out.getStdout()).toBe('workers/coding\n  source: unresolved\n')
  })
})
