/**
 * Defaults shared by the CLI, the configuration loader and the sync.
 */

export const DEFAULT_REMOTE = 'origin'

/** Key embedded in the section markers of every review request body. */
export const DEFAULT_MARKER_KEY = 'jj-stack-sync'

/** Last resort when neither the forge nor the remote reports a default branch. */
export const FALLBACK_DEFAULT_BRANCH = 'main'

/** Commits on the current stack: everything between trunk and the working copy. */
export const STACK_REVSET = 'trunk()..@'

/** Marks the review request a section is rendered into. */
export const CURRENT_POSITION_GLYPH = '👉'

/** Shown instead of a number for a request that dry-run would create. */
export const PENDING_LABEL = '(pending)'

/**
 * Upper bound for `gh pr list`; the CLI defaults to 30 which silently
 * truncates busy repositories.
 */
export const MAX_LISTED_REVIEW_REQUESTS = 1000
