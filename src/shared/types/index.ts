export * from './git-forge'
export * from './repo'
