/**
 * VCS Adapter Interface
 *
 * The version-control collaborator as the sync sees it: something that can
 * publish a revision range and describe which bookmarks sit on which commits.
 */

import type { CommitBookmarks } from '../../../shared/types'

export type PushOptions = {
  remote: string
  /** Revision range to publish, e.g. 'trunk()..@' */
  revset: string
  /** Allow creating bookmarks that do not exist on the remote yet */
  allowNew: boolean
}

/**
 * All methods throw CollaboratorError on failure.
 */
export interface VcsAdapter {
  readonly name: string

  /**
   * Push every bookmark in the revset to the remote.
   */
  push(options: PushOptions): Promise<void>

  /**
   * Structured listing: commits in the revset in topological order (ancestors
   * first), each with the local bookmarks pointing at it.
   */
  listCommitBookmarks(revset: string): Promise<CommitBookmarks[]>

  /**
   * Loose listing: one raw line of bookmark names per commit, ancestors first.
   * Lines may carry remote markers and separators; callers sanitize them.
   */
  listBookmarkLines(revset: string): Promise<string[]>
}
