// Segmentos excluidos siempre: VCS, dependencias y entornos virtuales.
export const DEFAULT_EXCLUSIONS: readonly string[] = [
  ".git",
  "node_modules",
  "venv",
];

const python = ["__pycache__", ".idea", ".vscode"];

const node = ["dist", "build", ".idea", ".vscode", "coverage"];

const java = ["target", "out", "build", ".idea", ".vscode"];

export const EXCLUSION_PRESETS = {
  python,
  node,
  java,
} as const satisfies Record<string, readonly string[]>;

export type ExclusionPreset = keyof typeof EXCLUSION_PRESETS;

export function isExclusionPreset(value: string): value is ExclusionPreset {
  return Object.prototype.hasOwnProperty.call(EXCLUSION_PRESETS, value);
}
