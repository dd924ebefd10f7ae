// Quality labels shared by the HLS and HDS parsers.

export function pixelsLabel(height?: number): string | undefined {
  return height && height > 0 ? `${height}p` : undefined;
}

// 2500000 -> "2500k", 500 -> "0.5k"
export function bitrateLabel(bitsPerSecond?: number): string | undefined {
  if (!bitsPerSecond || bitsPerSecond <= 0) return undefined;
  if (bitsPerSecond >= 1000) return `${Math.floor(bitsPerSecond / 1000)}k`;
  return `${bitsPerSecond / 1000}k`;
}

/**
 * Picks a free key for `name` in `taken`: the name itself, then `<name>_alt`,
 * then `<name>_alt2`. Returns undefined once those are used up.
 */
export function claimStreamName(name: string, taken: ReadonlyMap<string, unknown>): string | undefined {
  if (!taken.has(name)) return name;
  const alt = `${name}_alt`;
  const altCount = Array.from(taken.keys()).filter((k) => k.startsWith(alt)).length;
  if (altCount === 0) return alt;
  if (altCount === 1) return `${alt}2`;
  return undefined;
}
