/**
 * BranchLister - Discovers the bookmarks on the current stack.
 *
 * Two interchangeable strategies are tried in order and the first one that
 * succeeds wins:
 * 1. structured: JSON lines with the commit each bookmark points at
 * 2. text: the plain `bookmarks` template, sanitized line by line
 */

import { log, type Logger } from '../../shared/logger'
import type { Branch } from '../../shared/types'
import type { VcsAdapter } from '../adapters/vcs'
import { STACK_REVSET } from '../shared/constants'
import { CollaboratorError, errorMessage } from '../shared/errors'

export interface BranchListStrategy {
  readonly name: string
  list(revset: string): Promise<Branch[]>
}

export class StructuredBranchListStrategy implements BranchListStrategy {
  readonly name = 'structured'

  constructor(private readonly vcs: VcsAdapter) {}

  async list(revset: string): Promise<Branch[]> {
    const commits = await this.vcs.listCommitBookmarks(revset)
    return commits.flatMap((commit) =>
      commit.bookmarks.map((name) => ({ name, target: commit.commit }))
    )
  }
}

export class TextBranchListStrategy implements BranchListStrategy {
  readonly name = 'text'

  constructor(private readonly vcs: VcsAdapter) {}

  async list(revset: string): Promise<Branch[]> {
    const lines = await this.vcs.listBookmarkLines(revset)
    const branches: Branch[] = []
    for (const line of lines) {
      const name = sanitizeBookmarkLine(line)
      if (name) {
        branches.push({ name, target: '' })
      }
    }
    return branches
  }
}

/**
 * Reduces one line of loose `bookmarks` output to a single bookmark name.
 *
 * - blank lines → null
 * - remote-tracking entries (`@origin`, ...) → null
 * - a trailing `:` separator is dropped
 * - several bookmarks on one commit → the first one
 */
export function sanitizeBookmarkLine(raw: string): string | null {
  let name = raw.trim()
  if (!name) return null
  if (name.startsWith('@')) return null

  if (name.endsWith(':')) {
    name = name.slice(0, -1)
  }

  const [first] = name.split(/\s+/)
  return first || null
}

/**
 * Collapses duplicate names, first occurrence wins.
 */
export function dedupeBranches(branches: readonly Branch[]): Branch[] {
  const seen = new Set<string>()
  return branches.filter((branch) => {
    if (seen.has(branch.name)) return false
    seen.add(branch.name)
    return true
  })
}

export class BranchLister {
  constructor(
    private readonly strategies: readonly BranchListStrategy[],
    private readonly logger: Logger = log,
    private readonly revset: string = STACK_REVSET
  ) {}

  static forVcs(vcs: VcsAdapter, logger: Logger = log): BranchLister {
    return new BranchLister(
      [new StructuredBranchListStrategy(vcs), new TextBranchListStrategy(vcs)],
      logger
    )
  }

  /**
   * @throws CollaboratorError when every strategy failed
   */
  async listBranches(): Promise<Branch[]> {
    const failures: { strategy: string; error: unknown }[] = []

    for (const strategy of this.strategies) {
      try {
        const branches = dedupeBranches(await strategy.list(this.revset))
        this.logger.debug(
          `[BranchLister] ${strategy.name} listing found ${branches.length} bookmark(s)`
        )
        return branches
      } catch (error) {
        this.logger.debug(`[BranchLister] ${strategy.name} listing failed: ${errorMessage(error)}`)
        failures.push({ strategy: strategy.name, error })
      }
    }

    const last = failures[failures.length - 1]?.error
    const summary = failures.map((f) => `${f.strategy}: ${errorMessage(f.error)}`).join('\n')
    throw new CollaboratorError(
      `Failed to list bookmarks for ${this.revset}\n${summary}`,
      last instanceof CollaboratorError ? last.command : 'jj log',
      last instanceof CollaboratorError ? last.exitCode : undefined,
      last instanceof CollaboratorError ? last.stderr : undefined,
      last
    )
  }
}
