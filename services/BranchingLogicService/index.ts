export { BranchingLogicService } from './BranchingLogicService';
export type { BranchingLogicServiceOptions } from './BranchingLogicService';
export type { FieldPredicate, IBranchingLogicService, MetadataRow } from './IBranchingLogicService';
