import dotenv from 'dotenv'
import path from 'path'
import { z } from 'zod'
import { LOG_LEVELS, type LogLevel } from '../../shared/logger'
import { FORGE_KINDS, type ForgeKind } from '../../shared/types'
import { DEFAULT_MARKER_KEY, DEFAULT_REMOTE } from '../shared/constants'
import { ConfigError } from '../shared/errors'

export type Configuration = {
  repoPath: string
  remote: string
  /** Null means: ask the forge, then the remote's HEAD */
  defaultBase: string | null
  markerKey: string
  dryRun: boolean
  forge: ForgeKind
  /** GitHub token, only needed by the 'api' forge */
  token: string | null
  logLevel: LogLevel
}

/**
 * Values given on the command line. They win over the environment.
 */
export type ConfigurationOverrides = {
  repoPath?: string
  remote?: string
  defaultBase?: string
  markerKey?: string
  dryRun?: boolean
  forge?: string
  logLevel?: string
  verbose?: boolean
}

export type Environment = Record<string, string | undefined>

const configurationSchema = z.object({
  repoPath: z.string().min(1, 'must not be empty'),
  remote: z.string().trim().min(1, 'must not be empty'),
  defaultBase: z.string().trim().min(1, 'must not be empty').nullable(),
  markerKey: z
    .string()
    .min(1, 'must not be empty')
    .refine((key) => !/\s/.test(key), 'must not contain whitespace')
    .refine((key) => !key.includes('-->'), 'must not contain "-->"'),
  dryRun: z.boolean(),
  forge: z.enum(FORGE_KINDS, {
    errorMap: () => ({ message: `must be one of: ${FORGE_KINDS.join(', ')}` })
  }),
  token: z.string().min(1).nullable(),
  logLevel: z.enum(LOG_LEVELS, {
    errorMap: () => ({ message: `must be one of: ${LOG_LEVELS.join(', ')}` })
  })
})

/**
 * Loads `<repoPath>/.env` into process.env. Variables already set are kept.
 */
export function loadEnvFile(repoPath: string): void {
  dotenv.config({ path: path.join(repoPath, '.env') })
}

export function loadConfiguration(
  overrides: ConfigurationOverrides = {},
  env: Environment = process.env
): Configuration {
  const candidate = {
    repoPath: path.resolve(overrides.repoPath ?? process.cwd()),
    remote: overrides.remote ?? fromEnv(env, 'JJ_STACK_REMOTE') ?? DEFAULT_REMOTE,
    defaultBase: overrides.defaultBase ?? fromEnv(env, 'JJ_STACK_DEFAULT_BASE') ?? null,
    markerKey: overrides.markerKey ?? fromEnv(env, 'JJ_STACK_MARKER') ?? DEFAULT_MARKER_KEY,
    dryRun: overrides.dryRun ?? false,
    forge: overrides.forge ?? fromEnv(env, 'JJ_STACK_FORGE') ?? 'gh',
    token: fromEnv(env, 'GITHUB_TOKEN') ?? fromEnv(env, 'GH_TOKEN') ?? null,
    logLevel: overrides.verbose
      ? 'debug'
      : (overrides.logLevel ?? fromEnv(env, 'JJ_STACK_LOG_LEVEL') ?? 'info')
  }

  const parsed = configurationSchema.safeParse(candidate)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    const field = issue.path.join('.')
    throw new ConfigError(`Invalid ${field}: ${issue.message}`, field)
  }
  return parsed.data
}

function fromEnv(env: Environment, name: string): string | undefined {
  const value = env[name]?.trim()
  return value ? value : undefined
}
