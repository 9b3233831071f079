import pLimit from "p-limit";
import * as path from "path";
import { StructureNode } from "../../../domain/model/StructureNode";
import { rel } from "../../../shared/utils/pathUtils";
import { sortByName } from "../../../shared/utils/sortUtils";
import { withTimeout } from "../../../shared/utils/withTimeout";
import { STRUCTURE_MESSAGES } from "../../../shared/constants/structureMessages";
import {
  FileSystemPort,
  PortDirectoryEntry,
} from "../../ports/driven/FileSystemPort";
import { ProgressReporter } from "../../ports/driven/ProgressReporter";
import { isExcluded } from "../filter/ExclusionPolicy";
import {
  TraversalContext,
  TraversalEntry,
  kindFromDirent,
} from "./common";

export const DEFAULT_IO_CONCURRENCY = 16;

/**
 * Construye el árbol de un directorio de forma recursiva.
 *
 * Para cada entrada se aplican, en este orden: corte por profundidad,
 * exclusión por segmento, reglas de .gitignore y descarte de enlaces
 * simbólicos. Los hijos se emiten con los directorios primero y cada grupo
 * ordenado alfabéticamente sin distinguir mayúsculas.
 */
export class TreeBuilder {
  protected ioLimiter: ReturnType<typeof pLimit>;

  constructor(
    private readonly fsPort: FileSystemPort,
    private readonly logger: ProgressReporter,
    concurrency: number = DEFAULT_IO_CONCURRENCY
  ) {
    this.ioLimiter = pLimit(concurrency);
  }

  async build(
    entry: TraversalEntry,
    context: TraversalContext,
    depth: number
  ): Promise<StructureNode | null> {
    if (context.maxDepth !== null && depth > context.maxDepth) return null;

    const relativePath = rel(context.rootPath, entry.absolutePath);
    if (isExcluded(context.exclusions, relativePath)) return null;
    if (
      context.ignoreMatcher?.matches(relativePath, entry.kind === "directory")
    ) {
      return null;
    }
    if (entry.kind === "symlink") return null;

    const name = path.basename(entry.absolutePath);
    if (entry.kind === "file") return { name, type: "file" };
    if (entry.kind !== "directory") return null;

    if (context.maxDepth !== null && depth === context.maxDepth) {
      return { name, type: "directory" };
    }

    const childEntries = await this.listChildren(entry.absolutePath, context);
    if (childEntries === null) return null;

    const children = (
      await Promise.all(
        childEntries.map((child) => this.build(child, context, depth + 1))
      )
    ).filter((child): child is StructureNode => child !== null);

    return children.length > 0
      ? { name, type: "directory", children }
      : { name, type: "directory" };
  }

  /**
   * Entradas inmediatas: directorios primero, luego el resto, cada grupo
   * ordenado por nombre. null si el directorio no se puede leer.
   */
  protected async listChildren(
    dirFsPath: string,
    context: TraversalContext
  ): Promise<TraversalEntry[] | null> {
    let dirents: PortDirectoryEntry[];
    try {
      dirents = await this.ioLimiter(() =>
        withTimeout(
          this.fsPort.listDirectoryEntries(dirFsPath),
          context.enumerationTimeoutMs,
          `Listing ${dirFsPath}`
        )
      );
    } catch (error) {
      this.logger.warn(
        STRUCTURE_MESSAGES.ERRORS.ENUMERATION_FAILED(
          dirFsPath,
          error instanceof Error ? error.message : String(error)
        )
      );
      return null;
    }

    const directories = sortByName(
      dirents.filter((dirent) => kindFromDirent(dirent) === "directory")
    );
    const others = sortByName(
      dirents.filter((dirent) => kindFromDirent(dirent) !== "directory")
    );
    return [...directories, ...others].map((dirent) => ({
      absolutePath: path.join(dirFsPath, dirent.name),
      kind: kindFromDirent(dirent),
    }));
  }
}
