import ignore, { Ignore } from "ignore";
import { toPosix } from "../../../shared/utils/pathUtils";

/**
 * Reglas de un fichero .gitignore compiladas con la semántica de gitignore:
 * negación, reglas solo para directorios, anclaje con "/" y comodines.
 * Las reglas posteriores prevalecen sobre las anteriores.
 */
export class IgnoreMatcher {
  private constructor(
    private readonly handler: Ignore,
    public readonly ruleCount: number
  ) {}

  static compile(lines: readonly string[]): IgnoreMatcher {
    const rules = lines
      .map((line) => line.replace(/\r$/, ""))
      .filter((line) => line.trim() !== "" && !line.startsWith("#"));
    return new IgnoreMatcher(ignore().add(rules), rules.length);
  }

  /**
   * Indica si una ruta relativa a la raíz queda ignorada
   * @param relativePath Ruta relativa a la raíz del recorrido
   * @param isDirectory Si la entrada es un directorio (aplica reglas "dir/")
   */
  matches(relativePath: string, isDirectory = false): boolean {
    const normalized = toPosix(relativePath).replace(/^\/+|\/+$/g, "");
    if (normalized === "") return false;
    const candidate = isDirectory ? `${normalized}/` : normalized;
    // "ignore" rechaza nombres como "..." o "..../x"; ninguna regla los alcanza
    if (!ignore.isPathValid(candidate)) return false;
    return this.handler.ignores(candidate);
  }
}
