import { CodeVocabulary } from "./vocabulary.js";

import type { NameCodeResolver } from "./name-code-resolver.js";
import type { VocabularyEntry } from "../../types/index.js";

// Types missing from the reference list
const STATIC_ORG_TYPES: VocabularyEntry[] = [
  { code: "501", label: "Civil Society" },
  { code: "502", label: "Observer" },
  { code: "503", label: "Development Programme" },
  { code: "504", label: "Local NGO" },
];

export class OrgTypeVocabulary extends CodeVocabulary {
  constructor(resolver: NameCodeResolver) {
    super("org type", resolver, STATIC_ORG_TYPES);
  }
}
