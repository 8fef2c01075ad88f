export {
  BranchLister,
  StructuredBranchListStrategy,
  TextBranchListStrategy,
  dedupeBranches,
  sanitizeBookmarkLine,
  type BranchListStrategy
} from './BranchLister'
export {
  DefaultBranchResolver,
  forgeStrategy,
  overrideStrategy,
  upstreamStrategy,
  type DefaultBranchStrategy,
  type ResolvedDefaultBranch,
  type UpstreamInspector
} from './DefaultBranchResolver'
export { ReviewRequestDirectory } from './ReviewRequestDirectory'
export { StackOrderService } from './StackOrderService'
