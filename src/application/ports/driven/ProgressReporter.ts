/**
 * Interfaz para reportar progreso durante operaciones largas
 */
export interface ProgressReporter {
  /**
   * Inicia una operación con temporizador
   * @param label Etiqueta para identificar la operación
   */
  startOperation(label: string): void;

  /**
   * Finaliza una operación con temporizador
   * @param label Etiqueta para identificar la operación
   */
  endOperation(label: string): void;

  info(message: string): void;

  warn(message: string): void;

  /**
   * Reporta un mensaje de error
   * @param message Mensaje de error
   * @param error Objeto de error opcional
   */
  error(message: string, error?: unknown): void;

  debug(message: string, ...optionalParams: unknown[]): void;
}
