// Refined Soundex letter groups. H and W carry no code and are dropped.
const REFINED_SOUNDEX_CODES: Record<string, string> = {
  A: "0",
  E: "0",
  I: "0",
  O: "0",
  U: "0",
  Y: "0",
  B: "1",
  P: "1",
  F: "2",
  V: "2",
  C: "3",
  K: "3",
  S: "3",
  G: "4",
  J: "4",
  Q: "5",
  X: "5",
  Z: "5",
  D: "6",
  T: "6",
  L: "7",
  M: "8",
  N: "8",
  R: "9",
};

export const DEFAULT_PHONETIC_THRESHOLD = 2;

/** Edit distance with unit insert, delete and substitute costs. */
export function levenshtein(a: string, b: string): number {
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  let previous = Array.from({ length: b.length + 1 }, (_, j) => j);
  for (let i = 1; i <= a.length; i++) {
    const current = [i];
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      current[j] = Math.min(
        (current[j - 1] ?? 0) + 1,
        (previous[j] ?? 0) + 1,
        (previous[j - 1] ?? 0) + cost
      );
    }
    previous = current;
  }
  return previous[b.length] ?? 0;
}

/**
 * Refined Soundex encoding: first letter followed by the letter group codes
 * with consecutive duplicates squeezed. Returns "" when the word has no
 * latin letters.
 */
export function refinedSoundex(word: string): string {
  const letters = word
    .normalize("NFKD")
    .replaceAll(/\p{M}/gu, "")
    .toUpperCase()
    .replaceAll(/[^A-Z]/g, "");
  const first = letters[0];
  if (first === undefined) return "";

  let encoded = first;
  let previous = "";
  for (const letter of letters) {
    const code = REFINED_SOUNDEX_CODES[letter];
    if (code === undefined) continue;
    if (code !== previous) {
      encoded += code;
      previous = code;
    }
  }
  return encoded;
}

export interface PhoneticMatchOptions {
  /** Also compare this spelling (usually the normalized name) */
  alternativeName?: string;
  threshold?: number;
}

/**
 * Find the candidate that sounds closest to `name`.
 * @returns index into `candidates`, or null when nothing is close enough
 */
export function phoneticMatch(
  candidates: readonly string[],
  name: string,
  options: PhoneticMatchOptions = {}
): number | null {
  const threshold = options.threshold ?? DEFAULT_PHONETIC_THRESHOLD;
  const spellings = [name];
  if (
    options.alternativeName !== undefined &&
    options.alternativeName !== "" &&
    options.alternativeName !== name
  ) {
    spellings.push(options.alternativeName);
  }
  const encodings = spellings
    .map((spelling) => refinedSoundex(spelling))
    .filter((code) => code !== "");
  if (encodings.length === 0) return null;

  let bestIndex: number | null = null;
  let bestDistance = Number.POSITIVE_INFINITY;

  for (const [index, candidate] of candidates.entries()) {
    const candidateCode = refinedSoundex(candidate);
    if (candidateCode === "") continue;
    for (const code of encodings) {
      const d = levenshtein(code, candidateCode);
      // strict comparison keeps the earliest candidate on ties
      if (d < bestDistance) {
        bestDistance = d;
        bestIndex = index;
      }
    }
  }

  return bestDistance <= threshold ? bestIndex : null;
}
