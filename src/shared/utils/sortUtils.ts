/** Compara por puntos de código (no por unidades UTF-16) */
export function compareCodePoints(a: string, b: string): number {
  let i = 0;
  while (i < a.length && i < b.length) {
    const pointA = a.codePointAt(i) ?? 0;
    const pointB = b.codePointAt(i) ?? 0;
    if (pointA !== pointB) return pointA < pointB ? -1 : 1;
    i += pointA > 0xffff ? 2 : 1;
  }
  if (a.length === b.length) return 0;
  return a.length < b.length ? -1 : 1;
}

/**
 * Orden alfabético sin distinguir mayúsculas; los empates se resuelven por
 * puntos de código para que el resultado no dependa del listado del disco
 */
export function compareNamesCaseInsensitive(a: string, b: string): number {
  return (
    compareCodePoints(a.toLowerCase(), b.toLowerCase()) ||
    compareCodePoints(a, b)
  );
}

export function sortByName<T extends { name: string }>(items: T[]): T[] {
  return [...items].sort((a, b) => compareNamesCaseInsensitive(a.name, b.name));
}
