import { ProgressReporter } from "../../../application/ports/driven/ProgressReporter";

/**
 * Implementación de ProgressReporter que usa console y puede añadir prefijos de nivel.
 */
export class ConsoleProgressReporter implements ProgressReporter {
  private readonly verbose: boolean;
  private readonly addLevelPrefixes: boolean;

  /**
   * @param verbose Si es true, muestra los mensajes de debug.
   * @param addLevelPrefixes Si es true, añade prefijos [INFO], [WARN], etc. a los mensajes.
   */
  constructor(verbose: boolean = false, addLevelPrefixes: boolean = false) {
    this.verbose = verbose;
    this.addLevelPrefixes = addLevelPrefixes;
  }

  startOperation(label: string): void {
    if (this.verbose) console.time(label);
  }

  endOperation(label: string): void {
    if (this.verbose) console.timeEnd(label);
  }

  info(message: string): void {
    console.log(`${this.prefix("INFO")}${message}`);
  }

  warn(message: string): void {
    console.warn(`${this.prefix("WARN")}${message}`);
  }

  error(message: string, error?: unknown): void {
    console.error(`${this.prefix("ERROR")}${message}`, error ?? "");
  }

  debug(message: string, ...optionalParams: unknown[]): void {
    if (this.verbose) {
      console.debug(`${this.prefix("DEBUG")}${message}`, ...optionalParams);
    }
  }

  private prefix(level: string): string {
    return this.addLevelPrefixes ? `[${level}] ` : "";
  }
}
