/**
 * Literal, Unicode-normalized filename comparisons.
 *
 * User patterns are compared as plain text: "file[1]" matches the characters
 * "file[1]", never a character class. Both sides are NFC-normalized and
 * lower-cased so composed and decomposed accents compare equal.
 */

export function normalizeForComparison(value: string): string {
  return value.normalize('NFC').toLowerCase();
}

export function containsLiteral(filename: string, pattern: string): boolean {
  return normalizeForComparison(filename).includes(normalizeForComparison(pattern));
}

export function startsWithLiteral(filename: string, prefix: string): boolean {
  return normalizeForComparison(filename).startsWith(normalizeForComparison(prefix));
}

export function endsWithLiteral(filename: string, suffix: string): boolean {
  return normalizeForComparison(filename).endsWith(normalizeForComparison(suffix));
}

/**
 * Lower-cased extension without a leading dot
 */
export function normalizeExtension(extension: string): string {
  return extension.trim().replace(/^\.+/, '').toLowerCase();
}
