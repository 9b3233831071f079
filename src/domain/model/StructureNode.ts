export type StructureNodeType = "file" | "directory";

/**
 * Nodo del árbol de estructura de un repositorio
 */
export interface StructureNode {
  /** Último segmento de la ruta */
  readonly name: string;

  /** Tipo de entrada */
  readonly type: StructureNodeType;

  /** Hijos supervivientes; ausente en archivos y en directorios sin hijos */
  readonly children?: readonly StructureNode[];
}
