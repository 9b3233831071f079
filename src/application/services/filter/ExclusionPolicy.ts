import { segments } from "../../../shared/utils/pathUtils";
import {
  DEFAULT_EXCLUSIONS,
  EXCLUSION_PRESETS,
  ExclusionPreset,
} from "../../../shared/utils/exclusionPresets";

export type ExclusionSet = ReadonlySet<string>;

/**
 * Une la línea base con exclusiones adicionales; los duplicados se colapsan
 */
export function mergeExclusions(
  baseline: Iterable<string>,
  extra?: Iterable<string>
): ExclusionSet {
  const merged = new Set(baseline);
  for (const name of extra ?? []) {
    merged.add(name);
  }
  return merged;
}

/**
 * true si algún segmento de la ruta coincide exactamente con un miembro del
 * conjunto. Los segmentos se cuentan desde la raíz del recorrido.
 */
export function isExcluded(
  exclusions: ExclusionSet,
  relativePosixPath: string
): boolean {
  return segments(relativePosixPath).some((segment) =>
    exclusions.has(segment)
  );
}

/** Línea base más el preset del ecosistema y los nombres extra del llamador */
export function resolveExclusions(
  preset?: ExclusionPreset,
  extra?: Iterable<string>
): ExclusionSet {
  const withPreset = mergeExclusions(
    DEFAULT_EXCLUSIONS,
    preset ? EXCLUSION_PRESETS[preset] : undefined
  );
  return mergeExclusions(withPreset, extra);
}
