/**
 * Byte size parsing and formatting shared by condition construction and match reasons
 */

const UNIT_EXPONENTS: Record<string, number> = {
  B: 0,
  KB: 1,
  MB: 2,
  GB: 3,
  TB: 4,
};

const SIZE_LITERAL = /^(\d+(?:\.\d+)?|\.\d+)\s*([KMGT]?B)$/i;

/**
 * Parse a size literal such as "100MB" or "1.5GB" into bytes (value * 1024^n, floored).
 * Returns null for unitless or otherwise malformed input.
 */
export function parseByteSize(literal: string): number | null {
  const match = SIZE_LITERAL.exec(literal.trim());
  if (!match) return null;

  const value = Number(match[1]);
  const exponent = UNIT_EXPONENTS[match[2].toUpperCase()];
  if (!Number.isFinite(value) || exponent === undefined) return null;

  return Math.floor(value * 1024 ** exponent);
}

/**
 * Format a byte count for display, e.g. 1536 → "2KB", 1610612736 → "1.5GB"
 */
export function formatByteSize(bytes: number): string {
  const kb = 1024;
  const mb = kb * 1024;
  const gb = mb * 1024;
  const tb = gb * 1024;

  if (bytes >= tb) return `${(bytes / tb).toFixed(1)}TB`;
  if (bytes >= gb) return `${(bytes / gb).toFixed(1)}GB`;
  if (bytes >= mb) return `${(bytes / mb).toFixed(0)}MB`;
  if (bytes >= kb) return `${(bytes / kb).toFixed(0)}KB`;
  return `${bytes}B`;
}
