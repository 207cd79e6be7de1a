/**
 * Normalize text for consistent matching: strips diacritics, lower-cases and
 * turns every run of non letter/digit characters into a single space.
 *
 * "Médecins Sans Frontières (MSF)" -> "medecins sans frontieres msf"
 */
export function normalize(text: string): string {
  return text
    .normalize("NFKD")
    .replaceAll(/\p{M}/gu, "")
    .toLowerCase()
    .replaceAll(/[^\p{L}\p{N}]+/gu, " ")
    .trim();
}

/**
 * Upper-case and strip whitespace, the shape pcodes are published in
 */
export function normalizePcode(code: string): string {
  return code.toUpperCase().replaceAll(/\s+/g, "");
}

/**
 * Truncate to at most `maxLength` characters
 */
export function truncate(text: string, maxLength: number): string {
  return text.length > maxLength ? text.slice(0, maxLength) : text;
}
