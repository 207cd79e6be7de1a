import { resolverLogger } from "../../logger.js";
import { normalize } from "../../utils/normalize.js";
import {
  DEFAULT_PHONETIC_THRESHOLD,
  phoneticMatch,
} from "../../utils/phonetics.js";

// ============================================================================
// Types
// ============================================================================

/** Name, acronym or code variant -> canonical code */
export type Vocabulary = Map<string, string>;

export interface NameCodeResolverOptions {
  /** Names of this length or shorter are never fuzzy matched */
  fuzzyMinLength?: number;
  /** Largest phonetic distance accepted as a match */
  phoneticThreshold?: number;
}

export const DEFAULT_FUZZY_MIN_LENGTH = 5;

// ============================================================================
// Name Code Resolver
// ============================================================================

/**
 * Resolves free text to a code from a vocabulary. Successful normalized and
 * fuzzy matches are written back into the vocabulary and failures into the
 * unmatched set, so each distinct string costs at most one fuzzy search.
 */
export class NameCodeResolver {
  readonly fuzzyMinLength: number;
  readonly phoneticThreshold: number;
  private fuzzyCount = 0;

  constructor(options: NameCodeResolverOptions = {}) {
    this.fuzzyMinLength = options.fuzzyMinLength ?? DEFAULT_FUZZY_MIN_LENGTH;
    this.phoneticThreshold =
      options.phoneticThreshold ?? DEFAULT_PHONETIC_THRESHOLD;
  }

  /**
   * Number of fuzzy searches performed so far
   */
  get fuzzyLookups(): number {
    return this.fuzzyCount;
  }

  resolve(
    name: string,
    vocabulary: Vocabulary,
    unmatched: Set<string>,
    allowFuzzy = true
  ): string | null {
    const exact = vocabulary.get(name);
    if (exact !== undefined) return exact;

    if (unmatched.has(name)) return null;

    const normalized = normalize(name);
    const byNormalized = vocabulary.get(normalized);
    if (byNormalized !== undefined) {
      vocabulary.set(name, byNormalized);
      return byNormalized;
    }

    if (name.length <= this.fuzzyMinLength || !allowFuzzy) {
      unmatched.add(name);
      return null;
    }

    this.fuzzyCount++;
    const candidates = [...vocabulary.keys()].filter(
      (key) => key.length > this.fuzzyMinLength
    );
    const index = phoneticMatch(candidates, name, {
      alternativeName: normalized,
      threshold: this.phoneticThreshold,
    });
    const matched = index === null ? undefined : candidates[index];
    const code = matched === undefined ? undefined : vocabulary.get(matched);
    if (code === undefined) {
      unmatched.add(name);
      return null;
    }

    resolverLogger.debug({ name, matched, code }, "Fuzzy matched name");
    vocabulary.set(name, code);
    vocabulary.set(normalized, code);
    return code;
  }
}
