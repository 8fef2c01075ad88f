import { describe, expect, it } from 'vitest'
import { formatResult } from '../format'

describe('formatResult', () => {
  it('lists each entry and the body updates', () => {
    const output = formatResult({
      dryRun: false,
      pushed: true,
      defaultBase: 'main',
      entries: [
        { branch: 'feat-a', base: 'main', number: 11, action: 'unchanged' },
        { branch: 'feat-b', base: 'feat-a', number: 12, action: 'rebased' },
        { branch: 'feat-c', base: 'feat-b', number: 13, action: 'created' }
      ],
      bodiesRewritten: 3
    })

    expect(output).toBe(
      [
        '#11 feat-a -> main (up to date)',
        '#12 feat-b -> feat-a (base updated)',
        '#13 feat-c -> feat-b (created)',
        '3 body update(s) written.'
      ].join('\n')
    )
  })

  it('marks planned requests as pending in a dry run', () => {
    const output = formatResult({
      dryRun: true,
      pushed: false,
      defaultBase: 'main',
      entries: [
        { branch: 'feat-a', base: 'main', number: 7, action: 'planned-rebase' },
        { branch: 'feat-b', base: 'feat-a', number: 0, action: 'planned-create' }
      ],
      bodiesRewritten: 1
    })

    expect(output).toBe(
      [
        '#7 feat-a -> main (would update base)',
        '(pending) feat-b -> feat-a (would create)',
        'Dry run: 1 body update(s) planned, nothing pushed.'
      ].join('\n')
    )
  })

  it('reports an empty stack', () => {
    const output = formatResult({
      dryRun: false,
      pushed: true,
      defaultBase: null,
      entries: [],
      bodiesRewritten: 0
    })

    expect(output).toBe('No bookmarks to sync.')
  })
})
