export interface PortDirectoryEntry {
  name: string;
  isFile(): boolean;
  isDirectory(): boolean;
  isSymbolicLink(): boolean;
}

export interface PortEntryStats {
  isFile: boolean;
  isDirectory: boolean;
  isSymbolicLink: boolean;
}

/**
 * Puerto secundario para interactuar con el sistema de archivos
 */
export interface FileSystemPort {
  /**
   * Obtiene el tipo de una entrada sin seguir enlaces simbólicos.
   * @param path Ruta del archivo o directorio
   * @returns Las estadísticas o null si no existe o hay error.
   */
  stat(path: string): Promise<PortEntryStats | null>;

  /**
   * Lista las entradas inmediatas de un directorio.
   * @param dirPath Ruta del directorio
   * @returns Las entradas, en el orden que devuelva el sistema de archivos.
   * Rechaza si el directorio no se puede leer.
   */
  listDirectoryEntries(dirPath: string): Promise<PortDirectoryEntry[]>;
}
