import { ExclusionPreset } from "../../../shared/utils/exclusionPresets";

/** Repositorio remoto que se clona en rootPath antes de recorrerlo */
export interface RepositorySource {
  /** URL del repositorio, p. ej. https://example.com/org/repo.git */
  url: string;

  /** Token de acceso para repositorios privados (solo https) */
  token?: string;
}

/**
 * Opciones del caso de uso de estructura
 */
export interface StructureOptions {
  /** Ruta raíz del repositorio ya materializado (o destino del clon) */
  rootPath: string;

  /** Profundidad máxima; 0 devuelve solo la raíz. null o ausente = sin límite */
  maxDepth?: number | null;

  /** Conjunto de exclusiones por ecosistema */
  excludePreset?: ExclusionPreset;

  /** Nombres de segmento adicionales a excluir */
  extraExclusions?: string[];

  /** Aplicar el .gitignore de la raíz (por defecto true) */
  includeGitIgnore?: boolean;

  /** Tiempo máximo por listado de directorio, para almacenamiento en red */
  enumerationTimeoutMs?: number | null;

  /** Si se indica, se clona el repositorio antes de recorrerlo */
  source?: RepositorySource;
}
