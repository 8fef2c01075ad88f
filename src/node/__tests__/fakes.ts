/**
 * In-memory collaborators for tests. They record every call so tests can
 * assert on exactly what was pushed, created and edited.
 */

import { vi, type Mock } from 'vitest'
import type {
  CommitBookmarks,
  ReviewHostAdapter,
  ReviewRequest,
  ReviewRequestPatch
} from '../../shared/types'
import type { Logger } from '../../shared/logger'
import type { PushOptions, VcsAdapter } from '../adapters/vcs'

export class FakeVcs implements VcsAdapter {
  readonly name = 'fake-jj'

  readonly pushes: PushOptions[] = []
  readonly queriedRevsets: string[] = []

  /** Commit listing returned for the stack revset (oldest first) */
  stack: CommitBookmarks[] = []
  /** Commit listing returned for any other revset; defaults to `stack` */
  topology: CommitBookmarks[] | null = null
  bookmarkLines: string[] = []

  pushError: Error | null = null
  structuredError: Error | null = null
  linesError: Error | null = null
  topologyError: Error | null = null

  constructor(private readonly stackRevset = 'trunk()..@') {}

  async push(options: PushOptions): Promise<void> {
    if (this.pushError) throw this.pushError
    this.pushes.push(options)
  }

  async listCommitBookmarks(revset: string): Promise<CommitBookmarks[]> {
    this.queriedRevsets.push(revset)
    if (revset === this.stackRevset) {
      if (this.structuredError) throw this.structuredError
      return this.stack
    }
    if (this.topologyError) throw this.topologyError
    return this.topology ?? this.stack
  }

  async listBookmarkLines(revset: string): Promise<string[]> {
    this.queriedRevsets.push(revset)
    if (this.linesError) throw this.linesError
    return this.bookmarkLines
  }
}

export type HostCall =
  | { kind: 'listOpen' }
  | { kind: 'create'; head: string; base: string; title: string; body: string }
  | { kind: 'update'; number: number; patch: ReviewRequestPatch }
  | { kind: 'getDefaultBranch' }

export class FakeReviewHost implements ReviewHostAdapter {
  readonly name = 'fake-host'

  readonly calls: HostCall[] = []
  requests: ReviewRequest[] = []
  defaultBranch: string | null = 'main'
  nextNumber = 100

  createError: Error | null = null
  updateError: Error | null = null
  defaultBranchError: Error | null = null

  async listOpen(): Promise<ReviewRequest[]> {
    this.calls.push({ kind: 'listOpen' })
    return this.requests.map((request) => ({ ...request }))
  }

  async create(head: string, base: string, title: string, body: string): Promise<number> {
    this.calls.push({ kind: 'create', head, base, title, body })
    if (this.createError) throw this.createError
    const number = this.nextNumber++
    this.requests.push({ number, head, base, body })
    return number
  }

  async update(number: number, patch: ReviewRequestPatch): Promise<void> {
    this.calls.push({ kind: 'update', number, patch })
    if (this.updateError) throw this.updateError
    const request = this.requests.find((r) => r.number === number)
    if (request) {
      if (patch.base !== undefined) request.base = patch.base
      if (patch.body !== undefined) request.body = patch.body
    }
  }

  async getDefaultBranch(): Promise<string | null> {
    this.calls.push({ kind: 'getDefaultBranch' })
    if (this.defaultBranchError) throw this.defaultBranchError
    return this.defaultBranch
  }

  /** Calls that change something on the host */
  mutations(): HostCall[] {
    return this.calls.filter((call) => call.kind === 'create' || call.kind === 'update')
  }
}

export type MockLogger = { [Level in keyof Logger]: Mock<Logger[Level]> }

export function createMockLogger(): MockLogger {
  return {
    info: vi.fn<Logger['info']>(),
    warn: vi.fn<Logger['warn']>(),
    error: vi.fn<Logger['error']>(),
    debug: vi.fn<Logger['debug']>()
  }
}

export function commit(id: string, ...bookmarks: string[]): CommitBookmarks {
  return { commit: id, bookmarks }
}
