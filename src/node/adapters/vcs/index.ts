/**
 * VCS Adapter Module
 *
 * Jujutsu-backed implementation of the version-control collaborator.
 */

export {
  BOOKMARK_LINES_TEMPLATE,
  COMMIT_BOOKMARKS_TEMPLATE,
  JujutsuAdapter,
  quoteRevsetString
} from './JujutsuAdapter'
export type { PushOptions, VcsAdapter } from './interface'
