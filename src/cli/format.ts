import { isPlaceholder, type StackEntry, type StackSyncResult } from '../shared/types'
import { PENDING_LABEL } from '../node/shared/constants'

const ACTION_LABELS: Record<StackEntry['action'], string> = {
  created: 'created',
  rebased: 'base updated',
  unchanged: 'up to date',
  'planned-create': 'would create',
  'planned-rebase': 'would update base'
}

/**
 * Plain-text summary of a sync, one line per stack entry, bottom first.
 */
export function formatResult(result: StackSyncResult): string {
  if (result.entries.length === 0) {
    return 'No bookmarks to sync.'
  }

  const lines = result.entries.map((entry) => {
    const label = isPlaceholder(entry.number) ? PENDING_LABEL : `#${entry.number}`
    return `${label} ${entry.branch} -> ${entry.base} (${ACTION_LABELS[entry.action]})`
  })

  const summary = result.dryRun
    ? `Dry run: ${result.bodiesRewritten} body update(s) planned, nothing pushed.`
    : `${result.bodiesRewritten} body update(s) written.`

  return [...lines, summary].join('\n')
}
