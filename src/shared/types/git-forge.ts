/**
 * An open pull request as seen by the sync. Owned by the forge: only `base`
 * and `body` are ever patched.
 */
export type ReviewRequest = {
  /** Forge-assigned identifier, always positive for a real request. */
  number: number
  /** The branch holding the changes. Used to link the request to a bookmark. */
  head: string
  /** The branch the changes are proposed against. */
  base: string
  body: string
}

/**
 * Open review requests keyed by head branch name. Rebuilt on every run.
 */
export type ReviewRequestIndex = Map<string, ReviewRequest>

export type ReviewRequestPatch = {
  base?: string
  body?: string
}

export type ForgeKind = 'gh' | 'api'

export const FORGE_KINDS = ['gh', 'api'] as const satisfies readonly ForgeKind[]

/**
 * Identifier used in place of a request number for a request that would be
 * created outside dry-run. Never sent to the forge.
 */
export const PLACEHOLDER_NUMBER = 0

export function isPlaceholder(number: number): boolean {
  return number === PLACEHOLDER_NUMBER
}

export interface ReviewHostAdapter {
  readonly name: string

  /**
   * Lists every open review request. Order follows the forge's listing.
   */
  listOpen(): Promise<ReviewRequest[]>

  /**
   * Creates a review request and returns the number the forge assigned to it.
   * @throws CollaboratorError when the forge rejects the request
   * @throws ProtocolError when the response carries no identifier
   */
  create(head: string, base: string, title: string, body: string): Promise<number>

  /**
   * Patches base and/or body. Fields left undefined are not sent.
   */
  update(number: number, patch: ReviewRequestPatch): Promise<void>

  /**
   * The repository's configured default branch, or null if the forge does not report one.
   */
  getDefaultBranch(): Promise<string | null>
}
