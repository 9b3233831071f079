import { StructureNode } from "../../../domain/model/StructureNode";

export type StructureErrorCode =
  | "INVALID_ROOT"
  | "INVALID_OPTIONS"
  | "ACQUISITION_FAILED"
  | "UNEXPECTED";

/**
 * Resultado de la operación de estructura
 */
export type StructureResult =
  | { ok: true; tree: StructureNode }
  | { ok: false; error: string; code: StructureErrorCode };
