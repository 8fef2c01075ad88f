import { Command } from 'commander'
import { log } from '../shared/logger'
import { CollaboratorError, ConfigError, errorMessage } from '../node/shared/errors'
import { createStackCommand } from './commands/stack'

export const VERSION = '0.1.0'

export function createProgram(): Command {
  return new Command()
    .name('jj-stack')
    .description('Keep a stack of jj bookmarks in sync with a chain of GitHub pull requests')
    .version(VERSION)
    .option('--repo <path>', 'path to the jj workspace (default: current directory)')
    .addCommand(createStackCommand())
}

/**
 * Reports a failed run and returns the process exit code. A failing tool's
 * stderr is passed through as is, along with its exit code.
 */
export function reportError(error: unknown): number {
  if (error instanceof CollaboratorError) {
    const output = error.stderr?.trim()
    console.error(output || error.message)
    return error.exitCode ?? 1
  }
  if (error instanceof ConfigError) {
    log.error(error.message)
    return 2
  }
  log.error(`Unexpected error: ${errorMessage(error)}`)
  return 1
}
