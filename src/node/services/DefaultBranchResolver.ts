/**
 * DefaultBranchResolver - Picks the base of the bottom-most stack entry.
 *
 * Strategies are tried in order and the first non-empty answer wins. Each
 * strategy is a best-effort read: a failure is logged and the next one is
 * tried. The constant fallback always answers.
 */

import { log, type Logger } from '../../shared/logger'
import type { ReviewHostAdapter } from '../../shared/types'
import { FALLBACK_DEFAULT_BRANCH } from '../shared/constants'
import { errorMessage } from '../shared/errors'

export type DefaultBranchStrategy = {
  readonly name: string
  resolve(): Promise<string | null>
}

export type ResolvedDefaultBranch = {
  branch: string
  /** Name of the strategy that answered, or 'fallback' */
  source: string
}

/**
 * Anything that can report the branch a remote's HEAD points at.
 */
export type UpstreamInspector = {
  getDefaultBranch(remote: string): Promise<string | null>
}

export function overrideStrategy(branch: string | null | undefined): DefaultBranchStrategy {
  return {
    name: 'override',
    resolve: async () => branch || null
  }
}

export function forgeStrategy(host: ReviewHostAdapter): DefaultBranchStrategy {
  return {
    name: host.name,
    resolve: () => host.getDefaultBranch()
  }
}

export function upstreamStrategy(
  inspector: UpstreamInspector,
  remote: string
): DefaultBranchStrategy {
  return {
    name: `${remote}/HEAD`,
    resolve: () => inspector.getDefaultBranch(remote)
  }
}

export class DefaultBranchResolver {
  constructor(
    private readonly strategies: readonly DefaultBranchStrategy[],
    private readonly fallback: string = FALLBACK_DEFAULT_BRANCH,
    private readonly logger: Logger = log
  ) {}

  async resolve(): Promise<ResolvedDefaultBranch> {
    for (const strategy of this.strategies) {
      try {
        const branch = (await strategy.resolve())?.trim()
        if (branch) {
          return { branch, source: strategy.name }
        }
        this.logger.debug(`[DefaultBranchResolver] ${strategy.name} reported no default branch`)
      } catch (error) {
        this.logger.debug(
          `[DefaultBranchResolver] ${strategy.name} failed: ${errorMessage(error)}`
        )
      }
    }
    return { branch: this.fallback, source: 'fallback' }
  }
}
