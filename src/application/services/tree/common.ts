import { IgnoreMatcher } from "../ignore/IgnoreMatcher";
import { ExclusionSet } from "../filter/ExclusionPolicy";
import {
  PortDirectoryEntry,
  PortEntryStats,
} from "../../ports/driven/FileSystemPort";

/** Contexto inmutable de un recorrido */
export interface TraversalContext {
  /** Ruta absoluta de la raíz del repositorio */
  readonly rootPath: string;
  /** null = no hay .gitignore, nada se ignora por reglas */
  readonly ignoreMatcher: IgnoreMatcher | null;
  readonly exclusions: ExclusionSet;
  /** null = sin límite */
  readonly maxDepth: number | null;
  /** null = sin tiempo máximo por listado */
  readonly enumerationTimeoutMs: number | null;
}

export type EntryKind = "file" | "directory" | "symlink" | "other";

/** Entrada pendiente de visitar */
export interface TraversalEntry {
  absolutePath: string;
  kind: EntryKind;
}

export function kindFromDirent(entry: PortDirectoryEntry): EntryKind {
  if (entry.isSymbolicLink()) return "symlink";
  if (entry.isDirectory()) return "directory";
  if (entry.isFile()) return "file";
  return "other";
}

export function kindFromStats(stats: PortEntryStats): EntryKind {
  if (stats.isSymbolicLink) return "symlink";
  if (stats.isDirectory) return "directory";
  if (stats.isFile) return "file";
  return "other";
}
