/**
 * Domain Layer - Pure business logic with no I/O dependencies.
 *
 * All functions in this module are pure and synchronous. For anything that
 * needs jj, git or the forge, use the services layer.
 */

export { parseRemoteUrl } from './GitUrlParser'
export type { RepoCoordinates } from './GitUrlParser'
export { StackOrderer } from './StackOrderer'
export { StackSection } from './StackSection'
export type { SectionMarkers } from './StackSection'
