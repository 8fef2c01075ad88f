import { Command } from 'commander'
import { setLogLevel } from '../../shared/logger'
import type { StackSyncResult } from '../../shared/types'
import { createReviewHostAdapter } from '../../node/adapters/forge'
import { GitRemoteInspector } from '../../node/adapters/git/GitRemoteInspector'
import { JujutsuAdapter } from '../../node/adapters/vcs'
import { loadConfiguration, loadEnvFile, type Configuration } from '../../node/core/config'
import { StackSyncOperation } from '../../node/operations/StackSyncOperation'
import { formatResult } from '../format'

type SyncCommandOptions = {
  repo?: string
  remote?: string
  defaultBase?: string
  marker?: string
  dryRun?: boolean
  forge?: string
  verbose?: boolean
}

/**
 * Wires the real collaborators (jj, git, gh or the GitHub API) and runs one sync.
 */
export async function runStackSync(config: Configuration): Promise<StackSyncResult> {
  const inspector = new GitRemoteInspector(config.repoPath)
  const host = await createReviewHostAdapter(config, inspector)
  const operation = new StackSyncOperation({
    vcs: new JujutsuAdapter(config.repoPath),
    host,
    upstream: inspector
  })

  return operation.run({
    remote: config.remote,
    defaultBase: config.defaultBase,
    markerKey: config.markerKey,
    dryRun: config.dryRun
  })
}

function createSyncCommand(): Command {
  return new Command('sync')
    .description('Push the stack and create or update one pull request per bookmark')
    .option('--remote <name>', 'remote to push to (default: origin)')
    .option('--default-base <branch>', 'base for the bottom of the stack (default: detected)')
    .option('--marker <key>', 'key of the section markers in PR bodies (default: jj-stack-sync)')
    .option('--dry-run', 'print the plan without pushing or changing pull requests')
    .option('--forge <kind>', 'how to reach GitHub: gh or api (default: gh)')
    .option('--verbose', 'log debug output')
    .action(async (_options: unknown, command: Command) => {
      const options = command.optsWithGlobals<SyncCommandOptions>()
      const repoPath = options.repo ?? process.cwd()
      loadEnvFile(repoPath)

      const config = loadConfiguration({
        repoPath,
        remote: options.remote,
        defaultBase: options.defaultBase,
        markerKey: options.marker,
        dryRun: options.dryRun,
        forge: options.forge,
        verbose: options.verbose
      })
      setLogLevel(config.logLevel)

      const result = await runStackSync(config)
      console.log(formatResult(result))
    })
}

/**
 * Built per program: commander keeps parsed option values on the command.
 */
export function createStackCommand(): Command {
  return new Command('stack')
    .description('Work with the stack of bookmarks between trunk() and @')
    .addCommand(createSyncCommand())
}
