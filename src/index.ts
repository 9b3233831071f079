export { createContainer, getRepoStructure } from "./container";
export type { Container } from "./container";

export type {
  StructureNode,
  StructureNodeType,
} from "./domain/model/StructureNode";
export {
  GitCommandError,
  InvalidOptionsError,
  InvalidRootError,
} from "./domain/errors/StructureErrors";

export type {
  StructureOptions,
  RepositorySource,
} from "./application/ports/driving/StructureOptions";
export type {
  StructureResult,
  StructureErrorCode,
} from "./application/ports/driving/StructureResult";
export type { StructureUseCase } from "./application/ports/driving/StructureUseCase";
export type {
  FileSystemPort,
  PortDirectoryEntry,
  PortEntryStats,
} from "./application/ports/driven/FileSystemPort";
export type { GitPort, CloneRequest } from "./application/ports/driven/GitPort";
export type { ProgressReporter } from "./application/ports/driven/ProgressReporter";

export { IgnoreMatcher } from "./application/services/ignore/IgnoreMatcher";
export {
  isExcluded,
  mergeExclusions,
  resolveExclusions,
} from "./application/services/filter/ExclusionPolicy";
export type { ExclusionSet } from "./application/services/filter/ExclusionPolicy";
export { TreeBuilder } from "./application/services/tree/TreeBuilder";
export type { TraversalContext } from "./application/services/tree/common";
export { StructureService } from "./application/use-cases/structure/services/StructureService";
export { GetRepoStructure } from "./application/use-cases/structure/GetRepoStructure";
export {
  RepositoryAcquirer,
  authenticatedUrl,
} from "./application/use-cases/acquire/RepositoryAcquirer";

export { FsAdapter } from "./adapters/secondary/fs/FsAdapter";
export {
  GitAdapter,
  parseCloneProgress,
  redactCredentials,
} from "./adapters/secondary/git/GitAdapter";
export { ConsoleProgressReporter } from "./adapters/secondary/reporting/ConsoleProgressReporter";

export {
  DEFAULT_EXCLUSIONS,
  EXCLUSION_PRESETS,
} from "./shared/utils/exclusionPresets";
export type { ExclusionPreset } from "./shared/utils/exclusionPresets";
