export type Branch = {
  /** Bookmark name; the identity key of a stack entry. */
  name: string
  /** Commit the bookmark points at, or '' when the VCS could not say. */
  target: string
}

/**
 * One row of a topological commit listing: a commit and the local bookmarks on it,
 * in the order the VCS printed them.
 */
export type CommitBookmarks = {
  commit: string
  bookmarks: string[]
}

export type StackEntryAction =
  | 'created'
  | 'rebased'
  | 'unchanged'
  | 'planned-create'
  | 'planned-rebase'

export type StackEntry = {
  branch: string
  base: string
  /** Review request number, or PLACEHOLDER_NUMBER for a dry-run create. */
  number: number
  action: StackEntryAction
}

export type StackSyncResult = {
  dryRun: boolean
  /** Whether the publish step pushed to the remote. */
  pushed: boolean
  /** Base of the bottom-most entry; null when the stack was empty. */
  defaultBase: string | null
  /** Oldest to newest. */
  entries: StackEntry[]
  /** Number of review request bodies rewritten (or that would be, in dry-run). */
  bodiesRewritten: number
}
