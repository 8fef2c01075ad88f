/**
 * Custom error classes for the sync.
 * Provides typed errors for the different failure scenarios.
 */

/**
 * Base error class for all application errors.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown
  ) {
    super(message)
    this.name = 'AppError'
  }
}

/**
 * Error thrown when an external tool (jj, gh, git, the GitHub API) is unreachable,
 * exits non-zero or prints output that cannot be parsed.
 */
export class CollaboratorError extends AppError {
  constructor(
    message: string,
    public readonly command: string,
    public readonly exitCode?: number,
    public readonly stderr?: string,
    cause?: unknown
  ) {
    super(message, cause)
    this.name = 'CollaboratorError'
  }
}

/**
 * Error thrown when a collaborator succeeded but its output does not have the
 * expected shape, e.g. a create response without a request number.
 */
export class ProtocolError extends CollaboratorError {
  constructor(
    message: string,
    command: string,
    public readonly output: string,
    cause?: unknown
  ) {
    super(message, command, undefined, undefined, cause)
    this.name = 'ProtocolError'
  }
}

/**
 * Error thrown when options or environment values are invalid.
 */
export class ConfigError extends AppError {
  constructor(
    message: string,
    public readonly field?: string
  ) {
    super(message)
    this.name = 'ConfigError'
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
