import * as path from "path";
import { StructureNode } from "../../../../domain/model/StructureNode";
import { InvalidRootError } from "../../../../domain/errors/StructureErrors";
import { STRUCTURE_MESSAGES } from "../../../../shared/constants/structureMessages";
import { FileSystemPort } from "../../../ports/driven/FileSystemPort";
import { GitPort } from "../../../ports/driven/GitPort";
import { ProgressReporter } from "../../../ports/driven/ProgressReporter";
import { ExclusionSet } from "../../../services/filter/ExclusionPolicy";
import { IgnoreMatcher } from "../../../services/ignore/IgnoreMatcher";
import { TreeBuilder } from "../../../services/tree/TreeBuilder";
import {
  TraversalContext,
  kindFromStats,
} from "../../../services/tree/common";

export interface StructureRequest {
  rootPath: string;
  maxDepth: number | null;
  exclusions: ExclusionSet;
  includeGitIgnore: boolean;
  enumerationTimeoutMs: number | null;
}

export class StructureService {
  private readonly treeBuilder: TreeBuilder;

  constructor(
    private readonly fsPort: FileSystemPort,
    private readonly gitPort: GitPort,
    private readonly logger: ProgressReporter,
    treeBuilder?: TreeBuilder
  ) {
    this.treeBuilder = treeBuilder ?? new TreeBuilder(fsPort, logger);
  }

  /**
   * Recorre un repositorio ya materializado en disco.
   * @throws InvalidRootError si la raíz no existe o no es un directorio
   */
  async getStructure(request: StructureRequest): Promise<StructureNode> {
    this.logger.startOperation("StructureService.getStructure");
    try {
      const rootPath = path.resolve(request.rootPath);
      const stats = await this.fsPort.stat(rootPath);
      if (stats === null) {
        throw new InvalidRootError(rootPath, "missing");
      }
      if (kindFromStats(stats) !== "directory") {
        throw new InvalidRootError(rootPath, "not-a-directory");
      }

      const context: TraversalContext = {
        rootPath,
        ignoreMatcher: request.includeGitIgnore
          ? await this.loadIgnoreMatcher(rootPath)
          : null,
        exclusions: request.exclusions,
        maxDepth: request.maxDepth,
        enumerationTimeoutMs: request.enumerationTimeoutMs,
      };

      const tree = await this.treeBuilder.build(
        { absolutePath: rootPath, kind: "directory" },
        context,
        0
      );
      if (tree === null) {
        throw new InvalidRootError(rootPath, "unreadable");
      }
      return tree;
    } finally {
      this.logger.endOperation("StructureService.getStructure");
    }
  }

  private async loadIgnoreMatcher(
    rootPath: string
  ): Promise<IgnoreMatcher | null> {
    let patterns: string[] | null;
    try {
      patterns = await this.gitPort.getIgnorePatterns(rootPath);
    } catch (error) {
      this.logger.warn(
        STRUCTURE_MESSAGES.ERRORS.IGNORE_READ_FAILED(
          rootPath,
          error instanceof Error ? error.message : String(error)
        )
      );
      return null;
    }

    if (patterns === null) {
      this.logger.debug(STRUCTURE_MESSAGES.INFO.NO_IGNORE_FILE);
      return null;
    }
    const matcher = IgnoreMatcher.compile(patterns);
    this.logger.info(STRUCTURE_MESSAGES.INFO.IGNORE_LOADED(matcher.ruleCount));
    return matcher;
  }
}
