/**
 * ReviewRequestDirectory - Open review requests indexed by head branch.
 *
 * Thin layer over a ReviewHostAdapter. No caching and no retries: the index
 * is rebuilt on every run, and a failing call propagates so the sync stops
 * before leaving the chain half updated.
 */

import { log, type Logger } from '../../shared/logger'
import type {
  ReviewHostAdapter,
  ReviewRequestIndex,
  ReviewRequestPatch
} from '../../shared/types'

export class ReviewRequestDirectory {
  constructor(
    private readonly host: ReviewHostAdapter,
    private readonly logger: Logger = log
  ) {}

  async listOpenByHead(): Promise<ReviewRequestIndex> {
    const requests = await this.host.listOpen()
    const index: ReviewRequestIndex = new Map()

    for (const request of requests) {
      const existing = index.get(request.head)
      if (existing) {
        this.logger.warn(
          `[ReviewRequestDirectory] #${request.number} and #${existing.number} are both open ` +
            `for ${request.head}; using #${existing.number}`
        )
        continue
      }
      index.set(request.head, request)
    }

    this.logger.debug(
      `[ReviewRequestDirectory] ${index.size} open review request(s) via ${this.host.name}`
    )
    return index
  }

  async create(head: string, base: string, title: string, body: string): Promise<number> {
    const number = await this.host.create(head, base, title, body)
    this.logger.debug(`[ReviewRequestDirectory] Created #${number} for ${head} -> ${base}`)
    return number
  }

  /**
   * Applies a partial update. A patch with neither base nor body never
   * reaches the host.
   */
  async update(number: number, patch: ReviewRequestPatch): Promise<void> {
    if (patch.base === undefined && patch.body === undefined) {
      this.logger.debug(`[ReviewRequestDirectory] Nothing to update on #${number}`)
      return
    }
    await this.host.update(number, patch)
  }
}
