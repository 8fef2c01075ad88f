export * from './shared/types'
export { log, setLogLevel, silentLogger } from './shared/logger'
export type { LogLevel, Logger } from './shared/logger'

export { AppError, CollaboratorError, ConfigError, ProtocolError } from './node/shared/errors'
export { loadConfiguration, loadEnvFile } from './node/core/config'
export type { Configuration, ConfigurationOverrides } from './node/core/config'

export { JujutsuAdapter } from './node/adapters/vcs'
export type { VcsAdapter } from './node/adapters/vcs'
export { GhCliAdapter, GitHubAdapter, createReviewHostAdapter } from './node/adapters/forge'
export { GitRemoteInspector } from './node/adapters/git/GitRemoteInspector'

export * from './node/domain'
export * from './node/services'

export { StackSyncOperation } from './node/operations/StackSyncOperation'
export type { StackSyncOptions } from './node/operations/StackSyncOperation'
