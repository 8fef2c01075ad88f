import simpleGit, { type SimpleGit } from 'simple-git'
import { CollaboratorError, errorMessage } from '../../shared/errors'

/**
 * Read-only queries against the git repository colocated with the jj
 * workspace: remote URLs and the remote's HEAD.
 */
export class GitRemoteInspector {
  readonly name = 'simple-git'

  private readonly git: SimpleGit

  constructor(repoPath: string, git?: SimpleGit) {
    this.git = git ?? simpleGit(repoPath)
  }

  /**
   * Branch that `refs/remotes/<remote>/HEAD` points at, e.g. 'main'.
   * Null when the symbolic ref is unset.
   */
  async getDefaultBranch(remote: string): Promise<string | null> {
    const ref = `refs/remotes/${remote}/HEAD`
    let target: string
    try {
      target = (await this.git.raw(['symbolic-ref', ref])).trim()
    } catch (error) {
      throw this.createError(`symbolic-ref ${ref}`, error)
    }

    if (!target) return null

    const prefix = `refs/remotes/${remote}/`
    if (target.startsWith(prefix)) {
      return target.slice(prefix.length) || null
    }
    return target.split('/').pop() || null
  }

  /**
   * Fetch URL of the remote (push URL when no fetch URL is set), or null if
   * the remote is not configured.
   */
  async getRemoteUrl(remote: string): Promise<string | null> {
    try {
      const remotes = await this.git.getRemotes(true)
      const match = remotes.find((r) => r.name === remote)
      if (!match) return null
      return match.refs.fetch || match.refs.push || null
    } catch (error) {
      throw this.createError('remote -v', error)
    }
  }

  private createError(operation: string, error: unknown): CollaboratorError {
    return new CollaboratorError(
      `git ${operation} failed: ${errorMessage(error)}`,
      `git ${operation}`,
      undefined,
      undefined,
      error
    )
  }
}
