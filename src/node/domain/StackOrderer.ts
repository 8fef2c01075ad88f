/**
 * StackOrderer - Pure domain logic for linearizing a stack of bookmarks.
 *
 * Given the bookmark names on a stack and a topological commit listing
 * (ancestors first, each commit annotated with its bookmarks), produces one
 * deterministic oldest-to-newest order. All functions are pure and synchronous.
 */

import type { CommitBookmarks } from '../../shared/types'

export class StackOrderer {
  // Prevent instantiation - use static methods
  private constructor() {}

  /**
   * Removes repeated names, keeping the first occurrence of each.
   */
  public static dedupe(names: readonly string[]): string[] {
    const seen = new Set<string>()
    const result: string[] = []
    for (const name of names) {
      if (seen.has(name)) continue
      seen.add(name)
      result.push(name)
    }
    return result
  }

  /**
   * Orders `names` by where their commits appear in `commits`.
   *
   * - Bookmarks are emitted as their commit is reached, in annotation order.
   * - Annotated bookmarks that are not in `names` are ignored.
   * - Names never reached are appended in input order.
   *
   * The result always contains every input name exactly once.
   */
  public static order(names: readonly string[], commits: readonly CommitBookmarks[]): string[] {
    const wanted = StackOrderer.dedupe(names)
    if (wanted.length === 0) return []

    const pending = new Set(wanted)
    const ordered: string[] = []

    for (const commit of commits) {
      for (const bookmark of commit.bookmarks) {
        if (!pending.has(bookmark)) continue
        pending.delete(bookmark)
        ordered.push(bookmark)
      }
      if (pending.size === 0) break
    }

    // Unknown position: keep the branch, put it last
    for (const name of wanted) {
      if (pending.has(name)) ordered.push(name)
    }

    return ordered
  }

  /**
   * Names that `order` could not place from the commit listing.
   */
  public static unplaced(names: readonly string[], commits: readonly CommitBookmarks[]): string[] {
    const placed = new Set(commits.flatMap((commit) => commit.bookmarks))
    return StackOrderer.dedupe(names).filter((name) => !placed.has(name))
  }

  /**
   * Base branch for the entry at `index`: the default base for the bottom of
   * the stack, otherwise the entry right below it.
   */
  public static baseFor(order: readonly string[], index: number, defaultBase: string): string {
    if (index < 0 || index >= order.length) {
      throw new RangeError(`Stack position ${index} is outside 0..${order.length - 1}`)
    }
    return index === 0 ? defaultBase : order[index - 1]
  }
}
