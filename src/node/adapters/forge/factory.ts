/**
 * Review Host Adapter Factory
 *
 * Builds the ReviewHostAdapter selected by configuration.
 */

import { log } from '../../../shared/logger'
import type { ReviewHostAdapter } from '../../../shared/types'
import type { Configuration } from '../../core/config'
import { parseRemoteUrl } from '../../domain/GitUrlParser'
import { ConfigError } from '../../shared/errors'
import { GhCliAdapter } from './GhCliAdapter'
import { GitHubAdapter } from './github/GitHubAdapter'

export type RemoteUrlSource = {
  getRemoteUrl(remote: string): Promise<string | null>
}

export type ReviewHostConfig = Pick<Configuration, 'repoPath' | 'remote' | 'forge' | 'token'>

/**
 * - 'gh': the GitHub CLI, using its own login
 * - 'api': the GitHub REST API, using GITHUB_TOKEN or GH_TOKEN and the
 *   owner/repo of the configured remote
 */
export async function createReviewHostAdapter(
  config: ReviewHostConfig,
  remotes: RemoteUrlSource
): Promise<ReviewHostAdapter> {
  if (config.forge === 'gh') {
    log.debug('[ReviewHost] Using adapter: gh')
    return new GhCliAdapter(config.repoPath)
  }

  if (!config.token) {
    throw new ConfigError('The api forge needs GITHUB_TOKEN or GH_TOKEN to be set', 'token')
  }

  const url = await remotes.getRemoteUrl(config.remote)
  if (!url) {
    throw new ConfigError(`Remote "${config.remote}" is not configured`, 'remote')
  }

  const coordinates = parseRemoteUrl(url)
  if (!coordinates) {
    throw new ConfigError(`Cannot read owner/repo from remote URL: ${url}`, 'remote')
  }

  log.debug(`[ReviewHost] Using adapter: github-api (${coordinates.owner}/${coordinates.repo})`)
  return new GitHubAdapter(config.token, coordinates.owner, coordinates.repo)
}
