/**
 * Forge Adapter Module
 *
 * Review host adapters (pull requests on GitHub) and their factory.
 *
 * Usage:
 * ```typescript
 * const host = await createReviewHostAdapter(config, new GitRemoteInspector(config.repoPath))
 * const open = await host.listOpen()
 * ```
 */

export { createReviewHostAdapter } from './factory'
export type { RemoteUrlSource, ReviewHostConfig } from './factory'

// Adapter implementations
export { GhCliAdapter } from './GhCliAdapter'
export { GitHubAdapter } from './github/GitHubAdapter'
