import * as path from "path";

export function toPosix(relative: string): string {
  return relative.split(path.sep).join("/");
}

export function rel(root: string, absolute: string): string {
  return toPosix(path.relative(root, absolute));
}

/** Segmentos de una ruta relativa ya normalizada; la raíz ("") no tiene ninguno */
export function segments(relativePosixPath: string): string[] {
  return relativePosixPath.split("/").filter((segment) => segment !== "");
}
