import { log, type Logger } from '../../shared/logger'
import type { CommitBookmarks } from '../../shared/types'
import { quoteRevsetString, type VcsAdapter } from '../adapters/vcs'
import { StackOrderer } from '../domain/StackOrderer'
import { errorMessage } from '../shared/errors'

/**
 * Orders stack bookmarks from the commit graph with a single topology query.
 *
 * Never fails: when the query cannot be answered the bookmarks keep the order
 * they were given in.
 */
export class StackOrderService {
  constructor(
    private readonly vcs: VcsAdapter,
    private readonly logger: Logger = log
  ) {}

  /**
   * Commits between trunk and any of the bookmarks. `present()` keeps a
   * bookmark that no longer resolves from failing the whole query.
   */
  static revsetFor(names: readonly string[]): string {
    const union = names.map((name) => `present(${quoteRevsetString(name)})`).join(' | ')
    return `trunk()..(${union})`
  }

  async order(names: readonly string[]): Promise<string[]> {
    const wanted = StackOrderer.dedupe(names)
    if (wanted.length === 0) return []

    let commits: CommitBookmarks[] = []
    try {
      commits = await this.vcs.listCommitBookmarks(StackOrderService.revsetFor(wanted))
    } catch (error) {
      this.logger.warn(
        `[StackOrderService] Could not read the commit graph, keeping listing order: ` +
          errorMessage(error)
      )
    }

    const unplaced = StackOrderer.unplaced(wanted, commits)
    if (unplaced.length > 0 && commits.length > 0) {
      this.logger.warn(
        `[StackOrderService] Position unknown for ${unplaced.join(', ')}; ` +
          'placing at the top of the stack'
      )
    }

    return StackOrderer.order(wanted, commits)
  }
}
