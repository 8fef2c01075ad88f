import { z } from 'zod'
import type { ReviewHostAdapter, ReviewRequest, ReviewRequestPatch } from '../../../shared/types'
import { MAX_LISTED_REVIEW_REQUESTS } from '../../shared/constants'
import { ProtocolError } from '../../shared/errors'
import { formatCommand, parseJsonOutput, runCommand, type CommandRunner } from '../../utils/exec'

const pullRequestListSchema = z.array(
  z.object({
    number: z.number().int().positive(),
    headRefName: z.string(),
    baseRefName: z.string().nullish(),
    body: z.string().nullish()
  })
)

const repoViewSchema = z.object({
  defaultBranchRef: z.object({ name: z.string().nullish() }).nullish()
})

/**
 * `gh pr create` prints the URL of the new pull request; its last path
 * segment is the number.
 */
const CREATED_URL_PATTERN = /\/(\d+)$/

/**
 * Review host backed by the GitHub CLI. Authentication and repository
 * selection are whatever `gh` resolves for the working directory.
 */
export class GhCliAdapter implements ReviewHostAdapter {
  readonly name = 'gh'

  constructor(
    private readonly repoPath: string,
    private readonly run: CommandRunner = runCommand
  ) {}

  async listOpen(): Promise<ReviewRequest[]> {
    const args = [
      'pr',
      'list',
      '--state',
      'open',
      '--json',
      'number,headRefName,baseRefName,body',
      '--limit',
      String(MAX_LISTED_REVIEW_REQUESTS)
    ]
    const output = await this.gh(args)
    const pullRequests = parseJsonOutput(output, pullRequestListSchema, formatCommand('gh', args))

    return pullRequests.map((pr) => ({
      number: pr.number,
      head: pr.headRefName,
      base: pr.baseRefName ?? '',
      body: pr.body ?? ''
    }))
  }

  async create(head: string, base: string, title: string, body: string): Promise<number> {
    const args = ['pr', 'create', '--head', head, '--base', base, '--title', title, '--body', body]
    const output = await this.gh(args)

    const match = CREATED_URL_PATTERN.exec(output.trim())
    if (!match) {
      throw new ProtocolError(
        `Failed to get PR number from gh output: ${output}`,
        formatCommand('gh', args),
        output
      )
    }
    return Number(match[1])
  }

  async update(number: number, patch: ReviewRequestPatch): Promise<void> {
    if (patch.base === undefined && patch.body === undefined) return

    const args = ['pr', 'edit', String(number)]
    if (patch.base !== undefined) {
      args.push('--base', patch.base)
    }
    if (patch.body !== undefined) {
      args.push('--body', patch.body)
    }
    await this.gh(args)
  }

  async getDefaultBranch(): Promise<string | null> {
    const args = ['repo', 'view', '--json', 'defaultBranchRef']
    const output = await this.gh(args)
    const data = parseJsonOutput(output, repoViewSchema, formatCommand('gh', args))
    return data.defaultBranchRef?.name || null
  }

  private gh(args: string[]): Promise<string> {
    return this.run('gh', args, { cwd: this.repoPath })
  }
}
