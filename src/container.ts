import { FsAdapter } from "./adapters/secondary/fs/FsAdapter";
import { GitAdapter } from "./adapters/secondary/git/GitAdapter";
import { ConsoleProgressReporter } from "./adapters/secondary/reporting/ConsoleProgressReporter";
import { ProgressReporter } from "./application/ports/driven/ProgressReporter";
import { StructureOptions } from "./application/ports/driving/StructureOptions";
import { StructureUseCase } from "./application/ports/driving/StructureUseCase";
import { GetRepoStructure } from "./application/use-cases/structure/GetRepoStructure";

export interface Container {
  fsAdapter: FsAdapter;
  gitAdapter: GitAdapter;
  logger: ProgressReporter;
  structureUseCase: StructureUseCase;
  defaultOptions: Omit<StructureOptions, "rootPath">;
}

export function createContainer(verboseLogging: boolean = false): Container {
  const defaultOptions: Omit<StructureOptions, "rootPath"> = {
    maxDepth: null,
    extraExclusions: [],
    includeGitIgnore: true,
    enumerationTimeoutMs: null,
  };

  const logger = new ConsoleProgressReporter(verboseLogging, true);
  const fsAdapter = new FsAdapter();
  const gitAdapter = new GitAdapter();

  const structureUseCase = new GetRepoStructure(fsAdapter, gitAdapter, logger);

  return {
    fsAdapter,
    gitAdapter,
    logger,
    structureUseCase,
    defaultOptions,
  };
}

/**
 * Atajo: construye el árbol de un repositorio con las opciones por defecto
 */
export function getRepoStructure(
  options: StructureOptions,
  verboseLogging: boolean = false
): ReturnType<StructureUseCase["execute"]> {
  const container = createContainer(verboseLogging);
  return container.structureUseCase.execute({
    ...container.defaultOptions,
    ...options,
  });
}
