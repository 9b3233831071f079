import { ProgressReporter } from "./ProgressReporter";

export interface CloneRequest {
  /** URL remota, ya con credenciales si hacen falta */
  url: string;

  /** Directorio local de destino */
  targetPath: string;
}

/**
 * Puerto secundario para las operaciones de Git
 */
export interface GitPort {
  /**
   * Obtiene las líneas de regla del .gitignore de la raíz
   * @param rootPath Ruta raíz del proyecto
   * @returns Las reglas, o null si no hay .gitignore
   */
  getIgnorePatterns(rootPath: string): Promise<string[] | null>;

  /**
   * Verifica si un directorio es un repositorio Git clonado
   * @param rootPath Ruta del directorio a verificar
   */
  isGitRepository(rootPath: string): Promise<boolean>;

  /**
   * Clona un repositorio remoto informando del progreso de transferencia
   * @param request Origen y destino del clon
   * @param reporter Receptor de los mensajes de progreso
   */
  clone(request: CloneRequest, reporter: ProgressReporter): Promise<void>;
}
