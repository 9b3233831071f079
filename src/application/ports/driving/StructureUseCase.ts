import { StructureOptions } from "./StructureOptions";
import { StructureResult } from "./StructureResult";

/**
 * Puerto primario (interfaz) para el caso de uso de estructura
 */
export interface StructureUseCase {
  /**
   * Construye el árbol del repositorio según las opciones proporcionadas
   * @param options Opciones de estructura
   * @returns Resultado de la operación; nunca rechaza
   */
  execute(options: StructureOptions): Promise<StructureResult>;
}
