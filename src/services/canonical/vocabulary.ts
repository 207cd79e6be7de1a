import { NameCodeResolver, type Vocabulary } from "./name-code-resolver.js";
import { resolverLogger } from "../../logger.js";
import { normalize } from "../../utils/normalize.js";

import type { VocabularyEntry } from "../../types/index.js";

/**
 * Code list built from a reference table plus static synonyms.
 * Lookups go through the shared NameCodeResolver.
 */
export class CodeVocabulary {
  readonly data: Vocabulary = new Map();
  readonly unmatched = new Set<string>();
  private codeToName = new Map<string, string>();

  constructor(
    readonly kind: string,
    private resolver: NameCodeResolver,
    private staticEntries: readonly VocabularyEntry[] = []
  ) {}

  /**
   * Load the vocabulary. Synonyms are raw text -> code pairs applied first,
   * so reference entries win on conflicts.
   */
  populate(
    entries: Iterable<VocabularyEntry>,
    synonyms: Record<string, string> = {}
  ): void {
    resolverLogger.info({ kind: this.kind }, "Populating vocabulary");

    for (const [text, code] of Object.entries(synonyms)) {
      this.setVariant(text.trim(), code);
      this.setVariant(normalize(text), code);
    }

    let count = 0;
    for (const entry of entries) {
      this.addEntry(entry.code, entry.label);
      count++;
    }
    for (const entry of this.staticEntries) {
      this.addEntry(entry.code, entry.label);
    }

    resolverLogger.debug(
      { kind: this.kind, entries: count, keys: this.data.size },
      "Vocabulary populated"
    );
  }

  /**
   * Register code, label and their normalized forms
   */
  addEntry(code: string, label: string): void {
    const trimmedCode = code.trim();
    if (trimmedCode === "") return;
    const trimmedLabel = label.trim();

    this.setVariant(trimmedCode, trimmedCode);
    this.setVariant(normalize(trimmedCode), trimmedCode);
    if (trimmedLabel !== "") {
      this.setVariant(trimmedLabel, trimmedCode);
      this.setVariant(normalize(trimmedLabel), trimmedCode);
      this.codeToName.set(trimmedCode, trimmedLabel);
    }
  }

  private setVariant(text: string, code: string): void {
    if (text === "") return;
    this.data.set(text, code);
  }

  getCode(text: string, allowFuzzy = true): string | null {
    const trimmed = text.trim();
    if (trimmed === "") return null;
    return this.resolver.resolve(
      trimmed,
      this.data,
      this.unmatched,
      allowFuzzy
    );
  }

  /**
   * Preferred label for a code, "" when blank or unknown
   */
  getName(code: string): string {
    if (code === "") return "";
    return this.codeToName.get(code) ?? "";
  }
}
