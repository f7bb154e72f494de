export * from "./errors";
export { HierarchicalSummarizer } from "./HierarchicalSummarizer";
export { ConcurrencyLimiter } from "./ConcurrencyLimiter";
export { assignToGroups, partition, resolveLabel } from "./Partitioner";
export type { Assignment } from "./Partitioner";
export {
  createEmptySection,
  isEmptySection,
  renderDocument,
  SectionMerger,
} from "./SectionMerger";
export { resolveSummarizerOptions } from "./SummarizerConfig";
export type * from "./types";
