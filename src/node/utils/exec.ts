/**
 * Process execution for the jj and gh collaborators.
 *
 * Arguments are passed as an array (no shell), so bodies and titles reach the
 * tool byte for byte.
 */

import { execFile } from 'child_process'
import { promisify } from 'util'
import type { z } from 'zod'
import { CollaboratorError, ProtocolError } from '../shared/errors'

const execFileAsync = promisify(execFile)

const MAX_BUFFER_BYTES = 32 * 1024 * 1024

export type JsonSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>

export type CommandOptions = {
  cwd?: string
  /** Kills the process after this many milliseconds. No limit when omitted. */
  timeoutMs?: number
}

/**
 * Runs a command and resolves with its trimmed stdout.
 * Rejects with CollaboratorError when the tool is missing or exits non-zero.
 */
export type CommandRunner = (
  command: string,
  args: string[],
  options?: CommandOptions
) => Promise<string>

export const runCommand: CommandRunner = async (command, args, options = {}) => {
  const display = formatCommand(command, args)
  try {
    const { stdout } = await execFileAsync(command, args, {
      cwd: options.cwd,
      timeout: options.timeoutMs,
      maxBuffer: MAX_BUFFER_BYTES,
      encoding: 'utf8'
    })
    return stdout.trim()
  } catch (error) {
    throw toCollaboratorError(display, error)
  }
}

export function formatCommand(command: string, args: string[]): string {
  return [command, ...args.map((arg) => (/[\s"'$]/.test(arg) ? JSON.stringify(arg) : arg))].join(
    ' '
  )
}

function toCollaboratorError(display: string, error: unknown): CollaboratorError {
  if (!(error instanceof Error)) {
    return new CollaboratorError(`${display} failed: ${String(error)}`, display)
  }

  const stderr = 'stderr' in error && typeof error.stderr === 'string' ? error.stderr.trim() : ''
  const code = 'code' in error ? error.code : undefined

  if (code === 'ENOENT') {
    return new CollaboratorError(
      `${display.split(' ')[0]} not found on PATH`,
      display,
      undefined,
      undefined,
      error
    )
  }

  const exitCode = typeof code === 'number' ? code : undefined
  const message = stderr || error.message
  return new CollaboratorError(message, display, exitCode, stderr || undefined, error)
}

/**
 * Parses a JSON document printed by a collaborator and validates its shape.
 * Syntax errors surface as CollaboratorError, shape mismatches as ProtocolError.
 */
export function parseJsonOutput<T>(
  output: string,
  schema: JsonSchema<T>,
  command: string
): T {
  let data: unknown
  try {
    data = JSON.parse(output)
  } catch (error) {
    throw new CollaboratorError(
      `Failed to parse JSON from: ${command}\nOutput: ${output}`,
      command,
      undefined,
      undefined,
      error
    )
  }

  const parsed = schema.safeParse(data)
  if (!parsed.success) {
    throw new ProtocolError(
      `Unexpected output from: ${command}\n${parsed.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('\n')}`,
      command,
      output,
      parsed.error
    )
  }
  return parsed.data
}

/**
 * Parses newline-delimited JSON, skipping blank lines.
 */
export function parseJsonLines<T>(output: string, schema: JsonSchema<T>, command: string): T[] {
  return output
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .map((line) => parseJsonOutput(line, schema, command))
}
