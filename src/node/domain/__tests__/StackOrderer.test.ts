import { describe, expect, it } from 'vitest'
import { commit } from '../../__tests__/fakes'
import { StackOrderer } from '../StackOrderer'

describe('StackOrderer', () => {
  describe('order', () => {
    it('orders bookmarks oldest to newest from the commit listing', () => {
      const commits = [commit('c1', 'feat-a'), commit('c2', 'feat-b'), commit('c3', 'feat-c')]

      expect(StackOrderer.order(['feat-c', 'feat-a', 'feat-b'], commits)).toEqual([
        'feat-a',
        'feat-b',
        'feat-c'
      ])
    })

    it('keeps annotation order for bookmarks on the same commit', () => {
      const commits = [commit('c1', 'feat-a'), commit('c2', 'feat-b', 'feat-b2')]

      expect(StackOrderer.order(['feat-b2', 'feat-b', 'feat-a'], commits)).toEqual([
        'feat-a',
        'feat-b',
        'feat-b2'
      ])
    })

    it('ignores annotated bookmarks that were not asked for', () => {
      const commits = [commit('c1', 'other', 'feat-a'), commit('c2', 'feat-b')]

      expect(StackOrderer.order(['feat-b', 'feat-a'], commits)).toEqual(['feat-a', 'feat-b'])
    })

    it('appends names missing from the listing in input order', () => {
      const commits = [commit('c1', 'feat-b')]

      expect(StackOrderer.order(['gone-2', 'feat-b', 'gone-1'], commits)).toEqual([
        'feat-b',
        'gone-2',
        'gone-1'
      ])
    })

    it('returns the input order when the listing is empty', () => {
      expect(StackOrderer.order(['feat-b', 'feat-a'], [])).toEqual(['feat-b', 'feat-a'])
    })

    it('contains every input name exactly once', () => {
      const names = ['feat-a', 'feat-b', 'feat-a', 'feat-c']
      const commits = [commit('c1', 'feat-c'), commit('c2', 'feat-a', 'feat-a')]

      const result = StackOrderer.order(names, commits)

      expect(result).toEqual(['feat-c', 'feat-a', 'feat-b'])
      expect(new Set(result).size).toBe(result.length)
    })

    it('returns an empty list for no names', () => {
      expect(StackOrderer.order([], [commit('c1', 'feat-a')])).toEqual([])
    })
  })

  describe('unplaced', () => {
    it('lists names that have no commit in the listing', () => {
      const commits = [commit('c1', 'feat-a')]

      expect(StackOrderer.unplaced(['feat-a', 'feat-b', 'feat-b'], commits)).toEqual(['feat-b'])
    })
  })

  describe('baseFor', () => {
    const order = ['feat-a', 'feat-b', 'feat-c']

    it('uses the default base for the bottom entry', () => {
      expect(StackOrderer.baseFor(order, 0, 'main')).toBe('main')
    })

    it('uses the entry below for every other entry', () => {
      expect(StackOrderer.baseFor(order, 1, 'main')).toBe('feat-a')
      expect(StackOrderer.baseFor(order, 2, 'main')).toBe('feat-b')
    })

    it('rejects positions outside the stack', () => {
      expect(() => StackOrderer.baseFor(order, 3, 'main')).toThrow(RangeError)
      expect(() => StackOrderer.baseFor(order, -1, 'main')).toThrow(RangeError)
    })
  })
})
