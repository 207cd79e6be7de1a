import { CodeVocabulary } from "./vocabulary.js";

import type { NameCodeResolver } from "./name-code-resolver.js";
import type { VocabularyEntry } from "../../types/index.js";

// Legacy sector codes still found in partner files
const STATIC_SECTORS: VocabularyEntry[] = [
  { code: "Cash", label: "Cash programming" },
  { code: "Hum", label: "Humanitarian assistance (unspecified)" },
  { code: "Multi", label: "Multi-sector (unspecified)" },
  { code: "Intersectoral", label: "Intersectoral" },
];

export class SectorVocabulary extends CodeVocabulary {
  constructor(resolver: NameCodeResolver) {
    super("sector", resolver, STATIC_SECTORS);
  }
}
