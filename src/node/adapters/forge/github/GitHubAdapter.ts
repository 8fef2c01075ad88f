import { Agent, request } from 'undici'
import { z } from 'zod'
import type { ReviewHostAdapter, ReviewRequest, ReviewRequestPatch } from '../../../../shared/types'
import { CollaboratorError, ProtocolError, errorMessage } from '../../../shared/errors'
import { parseJsonOutput } from '../../../utils/exec'

/**
 * Shared HTTP agent with timeout configuration for GitHub API requests.
 * Prevents indefinite hangs on network issues.
 */
const githubAgent = new Agent({
  connectTimeout: 10_000, // 10s to establish connection
  headersTimeout: 30_000, // 30s to receive headers
  bodyTimeout: 30_000 // 30s to receive body
})

/** Per-request timeout for GitHub API calls */
const REQUEST_TIMEOUT_MS = 15_000

const PAGE_SIZE = 100

const GITHUB_API = 'https://api.github.com'

const pullRequestSchema = z.object({
  number: z.number().int().positive(),
  head: z.object({ ref: z.string() }),
  base: z.object({ ref: z.string() }),
  body: z.string().nullable()
})

const pullRequestListSchema = z.array(pullRequestSchema)

const createdPullRequestSchema = z.object({
  number: z.number().int().positive()
})

const repositorySchema = z.object({
  default_branch: z.string().nullish()
})

type HttpMethod = 'GET' | 'POST' | 'PATCH'

type GitHubResponse = {
  statusCode: number
  text: string
  command: string
}

/**
 * Review host backed by the GitHub REST API.
 *
 * Docs: https://docs.github.com/en/rest/pulls/pulls
 */
export class GitHubAdapter implements ReviewHostAdapter {
  readonly name = 'github-api'

  constructor(
    private readonly token: string,
    private readonly owner: string,
    private readonly repo: string
  ) {}

  async listOpen(): Promise<ReviewRequest[]> {
    const result: ReviewRequest[] = []

    for (let page = 1; ; page++) {
      const response = await this.send(
        'GET',
        `/pulls?state=open&per_page=${PAGE_SIZE}&page=${page}`
      )
      this.expectStatus(response, 200)

      const pullRequests = parseJsonOutput(response.text, pullRequestListSchema, response.command)
      for (const pr of pullRequests) {
        result.push({
          number: pr.number,
          head: pr.head.ref,
          base: pr.base.ref,
          body: pr.body ?? ''
        })
      }

      if (pullRequests.length < PAGE_SIZE) break
    }

    return result
  }

  async create(head: string, base: string, title: string, body: string): Promise<number> {
    const response = await this.send('POST', '/pulls', { title, head, base, body })
    this.expectStatus(response, 201)

    const created = createdPullRequestSchema.safeParse(safeJson(response.text))
    if (!created.success) {
      throw new ProtocolError(
        `GitHub did not return a pull request number: ${response.text}`,
        response.command,
        response.text,
        created.error
      )
    }
    return created.data.number
  }

  async update(number: number, patch: ReviewRequestPatch): Promise<void> {
    if (patch.base === undefined && patch.body === undefined) return

    const response = await this.send('PATCH', `/pulls/${number}`, {
      base: patch.base,
      body: patch.body
    })
    this.expectStatus(response, 200)
  }

  async getDefaultBranch(): Promise<string | null> {
    const response = await this.send('GET', '')
    this.expectStatus(response, 200)

    const repository = parseJsonOutput(response.text, repositorySchema, response.command)
    return repository.default_branch || null
  }

  private async send(
    method: HttpMethod,
    path: string,
    payload?: Record<string, unknown>
  ): Promise<GitHubResponse> {
    const url = `${GITHUB_API}/repos/${this.owner}/${this.repo}${path}`
    const command = `${method} ${url}`

    try {
      const { body, statusCode } = await request(url, {
        method,
        dispatcher: githubAgent,
        signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
        headers: {
          Authorization: `Bearer ${this.token}`,
          'User-Agent': 'jj-stack',
          Accept: 'application/vnd.github.v3+json',
          ...(payload ? { 'Content-Type': 'application/json' } : {})
        },
        // JSON.stringify leaves out undefined fields, which keeps PATCH partial
        body: payload ? JSON.stringify(payload) : undefined
      })
      return { statusCode, text: await body.text(), command }
    } catch (error) {
      throw new CollaboratorError(
        `GitHub API request failed: ${errorMessage(error)}`,
        command,
        undefined,
        undefined,
        error
      )
    }
  }

  private expectStatus(response: GitHubResponse, expected: number): void {
    if (response.statusCode !== expected) {
      throw new CollaboratorError(
        this.parseGitHubError(response.statusCode, response.text),
        response.command
      )
    }
  }

  private parseGitHubError(statusCode: number, responseText: string): string {
    const errorData = z.object({ message: z.string() }).safeParse(safeJson(responseText))
    // If not JSON, use raw text
    const githubMessage = errorData.success ? errorData.data.message : responseText
    const lowerMessage = githubMessage.toLowerCase()

    switch (statusCode) {
      case 401:
        return (
          'GitHub authentication failed. The token is invalid or has expired.\n\n' +
          'Check GITHUB_TOKEN (or GH_TOKEN) and ensure it is still valid.'
        )

      case 403:
        if (lowerMessage.includes('rate limit')) {
          return 'GitHub API rate limit exceeded. Please wait a few minutes before trying again.'
        }
        return (
          'GitHub access forbidden. The token may lack the "repo" scope.\n\n' +
          `GitHub says: ${githubMessage}`
        )

      case 404:
        return (
          `GitHub repository ${this.owner}/${this.repo} or pull request not found.\n\n` +
          'Ensure the branches are pushed and the token can access the repository.'
        )

      case 422:
        if (lowerMessage.includes('already exists')) {
          return 'A pull request already exists for this branch.'
        }
        if (lowerMessage.includes('no commits')) {
          return 'Cannot create pull request: the head branch has no commits that are not in the base branch.'
        }
        return `GitHub validation error.\n\nGitHub says: ${githubMessage}`

      default:
        return `GitHub API error (status ${statusCode}).\n\n${githubMessage || 'Unknown error'}`
    }
  }
}

function safeJson(text: string): unknown {
  try {
    return JSON.parse(text)
  } catch {
    return null
  }
}
