import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from 'vitest'

const mocks = vi.hoisted(() => ({
  run: vi.fn()
}))

vi.mock('../../node/operations/StackSyncOperation', () => ({
  StackSyncOperation: vi.fn(function () {
    return { run: mocks.run }
  })
}))

vi.mock('../../node/adapters/git/GitRemoteInspector', () => ({
  GitRemoteInspector: vi.fn(function () {
    return { getRemoteUrl: vi.fn(), getDefaultBranch: vi.fn() }
  })
}))

import { setLogLevel } from '../../shared/logger'
import { GhCliAdapter } from '../../node/adapters/forge'
import { GitRemoteInspector } from '../../node/adapters/git/GitRemoteInspector'
import { JujutsuAdapter } from '../../node/adapters/vcs'
import { StackSyncOperation } from '../../node/operations/StackSyncOperation'
import { ConfigError } from '../../node/shared/errors'
import { createProgram } from '../program'

const CONFIG_VARIABLES = [
  'JJ_STACK_REMOTE',
  'JJ_STACK_DEFAULT_BASE',
  'JJ_STACK_MARKER',
  'JJ_STACK_FORGE',
  'JJ_STACK_LOG_LEVEL'
]

function sync(...args: string[]): Promise<unknown> {
  return createProgram().parseAsync([
    'node',
    'jj-stack',
    '--repo',
    '/work/repo',
    'stack',
    'sync',
    ...args
  ])
}

describe('stack sync', () => {
  let stdout: MockInstance<typeof console.log>

  beforeEach(() => {
    vi.clearAllMocks()
    for (const name of CONFIG_VARIABLES) {
      vi.stubEnv(name, '')
    }
    mocks.run.mockResolvedValue({
      dryRun: false,
      pushed: true,
      defaultBase: null,
      entries: [],
      bodiesRewritten: 0
    })
    stdout = vi.spyOn(console, 'log').mockImplementation(() => {})
  })

  afterEach(() => {
    stdout.mockRestore()
    vi.unstubAllEnvs()
    setLogLevel('info')
  })

  it('passes dry-run, marker and default base through to the sync', async () => {
    await sync('--dry-run', '--marker', 'k', '--default-base', 'dev')

    expect(mocks.run).toHaveBeenCalledWith({
      remote: 'origin',
      defaultBase: 'dev',
      markerKey: 'k',
      dryRun: true
    })
  })

  it('runs for real unless --dry-run is given', async () => {
    await sync('--remote', 'upstream')

    expect(mocks.run).toHaveBeenCalledWith({
      remote: 'upstream',
      defaultBase: null,
      markerKey: 'jj-stack-sync',
      dryRun: false
    })
  })

  it('wires jj, gh and the git remote of the --repo workspace', async () => {
    await sync()

    expect(GitRemoteInspector).toHaveBeenCalledWith('/work/repo')
    expect(StackSyncOperation).toHaveBeenCalledWith(
      expect.objectContaining({
        vcs: expect.any(JujutsuAdapter),
        host: expect.any(GhCliAdapter)
      })
    )
  })

  it('prints the result on stdout', async () => {
    await sync()

    expect(stdout).toHaveBeenCalledWith('No bookmarks to sync.')
  })

  it('rejects invalid options before syncing', async () => {
    const error = await sync('--forge', 'bogus').catch((e: unknown) => e)

    expect(error).toBeInstanceOf(ConfigError)
    if (!(error instanceof ConfigError)) return
    expect(error.field).toBe('forge')
    expect(mocks.run).not.toHaveBeenCalled()
  })

  it('rejects marker keys with whitespace', async () => {
    const error = await sync('--marker', 'a b').catch((e: unknown) => e)

    expect(error).toBeInstanceOf(ConfigError)
    if (!(error instanceof ConfigError)) return
    expect(error.field).toBe('markerKey')
  })
})
