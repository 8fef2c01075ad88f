import { z } from 'zod'
import type { CommitBookmarks } from '../../../shared/types'
import { formatCommand, parseJsonLines, runCommand, type CommandRunner } from '../../utils/exec'
import type { PushOptions, VcsAdapter } from './interface'

/**
 * One JSON object per commit: {"commit":"<id>","bookmarks":["a","b"]}.
 * Commit ids are hex so they need no escaping.
 */
export const COMMIT_BOOKMARKS_TEMPLATE = String.raw`"{\"commit\":\"" ++ commit_id ++ "\",\"bookmarks\":[" ++ local_bookmarks.map(|b| b.name().escape_json()).join(",") ++ "]}\n"`

export const BOOKMARK_LINES_TEMPLATE = String.raw`bookmarks ++ "\n"`

const commitBookmarksSchema = z.object({
  commit: z.string(),
  bookmarks: z.array(z.string())
})

/**
 * Quotes a value as a revset string literal.
 */
export function quoteRevsetString(value: string): string {
  const escaped = value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')
  return `"${escaped}"`
}

export class JujutsuAdapter implements VcsAdapter {
  readonly name = 'jj'

  constructor(
    private readonly repoPath: string,
    private readonly run: CommandRunner = runCommand
  ) {}

  async push(options: PushOptions): Promise<void> {
    const args = ['git', 'push', '--remote', options.remote, '-r', options.revset]
    if (options.allowNew) {
      args.push('--allow-new')
    }
    await this.jj(args)
  }

  async listCommitBookmarks(revset: string): Promise<CommitBookmarks[]> {
    const args = ['log', '-r', revset, '--no-graph', '--reversed', '-T', COMMIT_BOOKMARKS_TEMPLATE]
    const output = await this.jj(args)
    return parseJsonLines(output, commitBookmarksSchema, formatCommand('jj', args))
  }

  async listBookmarkLines(revset: string): Promise<string[]> {
    const output = await this.jj([
      'log',
      '-r',
      revset,
      '--no-graph',
      '--reversed',
      '-T',
      BOOKMARK_LINES_TEMPLATE
    ])
    return output.split('\n')
  }

  private jj(args: string[]): Promise<string> {
    return this.run('jj', args, { cwd: this.repoPath })
  }
}
