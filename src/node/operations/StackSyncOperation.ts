/**
 * StackSyncOperation - Reconciles a stack of bookmarks with a chain of review requests
 *
 * One pass, no state kept between runs:
 * 1. Publish: push trunk()..@ to the remote (skipped in dry-run)
 * 2. Discover: list the stack's bookmarks and order them oldest to newest
 * 3. Plan bases: resolve the default branch for the bottom of the stack
 * 4. Reconcile: create missing review requests, re-base existing ones
 * 5. Rewrite bodies: upsert the stack section into every review request
 *
 * Any collaborator failure aborts the remaining steps.
 */

import { log, type Logger } from '../../shared/logger'
import {
  PLACEHOLDER_NUMBER,
  isPlaceholder,
  type ReviewHostAdapter,
  type StackEntry,
  type StackSyncResult
} from '../../shared/types'
import type { VcsAdapter } from '../adapters/vcs'
import { StackOrderer } from '../domain/StackOrderer'
import { StackSection } from '../domain/StackSection'
import { BranchLister } from '../services/BranchLister'
import {
  DefaultBranchResolver,
  forgeStrategy,
  overrideStrategy,
  upstreamStrategy,
  type DefaultBranchStrategy,
  type UpstreamInspector
} from '../services/DefaultBranchResolver'
import { ReviewRequestDirectory } from '../services/ReviewRequestDirectory'
import { StackOrderService } from '../services/StackOrderService'
import { STACK_REVSET } from '../shared/constants'

export type StackSyncOptions = {
  remote: string
  /** Base for the bottom of the stack; resolved from the forge and remote when omitted */
  defaultBase?: string | null
  markerKey: string
  /** Compute and log the plan without pushing or touching any review request */
  dryRun: boolean
}

export type StackSyncDependencies = {
  vcs: VcsAdapter
  host: ReviewHostAdapter
  /** Consulted for the remote's HEAD after the forge */
  upstream?: UpstreamInspector
  logger?: Logger
}

export class StackSyncOperation {
  private readonly logger: Logger
  private readonly branchLister: BranchLister
  private readonly orderService: StackOrderService
  private readonly directory: ReviewRequestDirectory

  constructor(private readonly deps: StackSyncDependencies) {
    this.logger = deps.logger ?? log
    this.branchLister = BranchLister.forVcs(deps.vcs, this.logger)
    this.orderService = new StackOrderService(deps.vcs, this.logger)
    this.directory = new ReviewRequestDirectory(deps.host, this.logger)
  }

  async run(options: StackSyncOptions): Promise<StackSyncResult> {
    const { dryRun, markerKey } = options

    const pushed = await this.publish(options)

    const branches = await this.branchLister.listBranches()
    const order = await this.orderService.order(branches.map((branch) => branch.name))
    if (order.length === 0) {
      this.logger.info(`No bookmarks in ${STACK_REVSET}; nothing to sync`)
      return { dryRun, pushed, defaultBase: null, entries: [], bodiesRewritten: 0 }
    }
    this.logger.info(`Stack: ${order.join(' <- ')}`)

    const resolved = await this.createDefaultBranchResolver(options).resolve()
    const defaultBase = resolved.branch
    this.logger.info(`Default base: ${defaultBase} (from ${resolved.source})`)

    const index = await this.directory.listOpenByHead()
    const entries: StackEntry[] = []

    for (let position = 0; position < order.length; position++) {
      const branch = order[position]
      const base = StackOrderer.baseFor(order, position, defaultBase)
      const existing = index.get(branch)

      if (!existing) {
        if (dryRun) {
          this.logger.info(`Would create PR for ${branch} -> ${base}`)
          entries.push({ branch, base, number: PLACEHOLDER_NUMBER, action: 'planned-create' })
          continue
        }

        this.logger.info(`Creating PR for ${branch} -> ${base}`)
        const number = await this.directory.create(branch, base, branch, '')
        this.logger.info(`PR created: #${number}`)
        index.set(branch, { number, head: branch, base, body: '' })
        entries.push({ branch, base, number, action: 'created' })
        continue
      }

      if (existing.base === base) {
        this.logger.debug(`#${existing.number} ${branch} already targets ${base}`)
        entries.push({ branch, base, number: existing.number, action: 'unchanged' })
        continue
      }

      if (dryRun) {
        this.logger.info(`Would re-base #${existing.number} ${branch}: ${existing.base} -> ${base}`)
        entries.push({ branch, base, number: existing.number, action: 'planned-rebase' })
        continue
      }

      this.logger.info(`Re-basing #${existing.number} ${branch}: ${existing.base} -> ${base}`)
      await this.directory.update(existing.number, { base })
      entries.push({ branch, base, number: existing.number, action: 'rebased' })
    }

    const numbers = entries.map((entry) => entry.number)
    let bodiesRewritten = 0

    for (let position = 0; position < entries.length; position++) {
      const entry = entries[position]
      if (isPlaceholder(entry.number)) continue

      const request = index.get(entry.branch)
      if (!request) continue

      const section = StackSection.render(markerKey, numbers, position)
      const body = StackSection.upsert(request.body, markerKey, section)
      if (body === request.body) {
        this.logger.debug(
          `#${entry.number} already lists the current stack; rewriting unchanged body`
        )
      }

      if (dryRun) {
        this.logger.debug(`Would set body of #${entry.number}:\n${body}`)
      } else {
        this.logger.debug(`Updating body of #${entry.number} (${entry.branch})`)
        await this.directory.update(entry.number, { body })
      }
      bodiesRewritten++
    }

    this.logger.info(
      `${dryRun ? 'Planned' : 'Synced'} ${entries.length} review request(s) on top of ${defaultBase}`
    )
    return { dryRun, pushed, defaultBase, entries, bodiesRewritten }
  }

  /**
   * Pushes the stack so that every base a review request names exists on the
   * remote. Dry-run pushes nothing.
   */
  private async publish(options: StackSyncOptions): Promise<boolean> {
    if (options.dryRun) {
      this.logger.info(`Dry run: not pushing ${STACK_REVSET} to ${options.remote}`)
      return false
    }

    this.logger.info(`Pushing ${STACK_REVSET} to ${options.remote}`)
    await this.deps.vcs.push({ remote: options.remote, revset: STACK_REVSET, allowNew: true })
    return true
  }

  private createDefaultBranchResolver(options: StackSyncOptions): DefaultBranchResolver {
    const strategies: DefaultBranchStrategy[] = [
      overrideStrategy(options.defaultBase),
      forgeStrategy(this.deps.host)
    ]
    if (this.deps.upstream) {
      strategies.push(upstreamStrategy(this.deps.upstream, options.remote))
    }
    return new DefaultBranchResolver(strategies, undefined, this.logger)
  }
}
