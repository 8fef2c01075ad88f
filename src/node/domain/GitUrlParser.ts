/**
 * GitUrlParser - Pure functions for parsing Git remote URLs
 *
 * This module provides deterministic parsing of Git repository URLs
 * without any I/O operations.
 */

export type RepoCoordinates = {
  owner: string
  repo: string
}

/**
 * Extracts owner and repository name from a remote URL.
 *
 * Handles URLs like:
 * - https://github.com/owner/repo.git
 * - https://user@github.com/owner/repo
 * - git@github.com:owner/repo.git
 * - ssh://git@github.com/owner/repo.git
 *
 * @returns null when the URL has no owner/repo path
 */
export function parseRemoteUrl(url: string): RepoCoordinates | null {
  const trimmed = url.trim()
  if (!trimmed) {
    return null
  }

  // scp-like syntax: [user@]host:owner/repo
  const scpLike = /^(?:[^@/]+@)?[^:/]+:(?!\/)(.+)$/.exec(trimmed)
  if (scpLike && !/^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed)) {
    return fromPath(scpLike[1])
  }

  // URL syntax: scheme://[user@]host[:port]/owner/repo
  const urlLike = /^[a-z][a-z0-9+.-]*:\/\/(?:[^@/]+@)?[^/:]+(?::\d+)?\/(.+)$/i.exec(trimmed)
  if (urlLike) {
    return fromPath(urlLike[1])
  }

  return null
}

function fromPath(path: string): RepoCoordinates | null {
  const segments = path
    .replace(/\/+$/, '')
    .replace(/\.git$/, '')
    .split('/')
    .filter((segment) => segment.length > 0)

  if (segments.length < 2) {
    return null
  }

  const repo = segments[segments.length - 1]
  const owner = segments[segments.length - 2]
  return { owner, repo }
}
