/** Relative severity per preservative, 0.1 (benign) to 1.0 (strongest concern). */
export const PRESERVATIVE_SEVERITY: ReadonlyMap<string, number> = new Map([
  ["sodium nitrite", 1.0],
  ["sodium nitrate", 1.0],
  ["potassium bromate", 1.0],
  ["bha", 1.0],
  ["tbhq", 0.9],
  ["bht", 0.8],
  ["propyl gallate", 0.8],
  ["sodium benzoate", 0.7],
  ["potassium benzoate", 0.7],
  ["sulfur dioxide", 0.7],
  ["sodium metabisulfite", 0.7],
  ["calcium propionate", 0.5],
  ["potassium sorbate", 0.4],
  ["sorbic acid", 0.3],
  ["citric acid", 0.1],
  ["ascorbic acid", 0.1],
]);

export const UNKNOWN_PRESERVATIVE_SEVERITY = 0.5;

export function normalizePreservative(name: string): string {
  return name.trim().toLowerCase().replace(/\s+/g, " ");
}

export function preservativeSeverity(name: string): number {
  return PRESERVATIVE_SEVERITY.get(normalizePreservative(name)) ?? UNKNOWN_PRESERVATIVE_SEVERITY;
}
