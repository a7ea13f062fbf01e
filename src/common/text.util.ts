export function normalizeKey(value: string): string {
  return (value || '')
    .normalize('NFKC')
    .toLowerCase()
    .trim()
    .replace(/\s+/g, ' ');
}

export function compareNames(a: string, b: string): number {
  const la = normalizeKey(a);
  const lb = normalizeKey(b);
  if (la !== lb) return la < lb ? -1 : 1;
  if (a !== b) return a < b ? -1 : 1;
  return 0;
}

/** Values too large to scale are already coarser than `decimals` and come back as-is. */
export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  const scaled = value * factor;
  if (!Number.isFinite(scaled)) return value;
  return Math.round(scaled) / factor;
}

export function clamp(min: number, max: number, value: number): number {
  return Math.min(max, Math.max(min, value));
}
