import { AdminLevelTable, type AdminNode } from "./admin-levels.js";
import { resolverLogger } from "../../logger.js";
import { tupleKey } from "../../utils/keyed-map.js";
import { normalize } from "../../utils/normalize.js";
import {
  DEFAULT_PHONETIC_THRESHOLD,
  phoneticMatch,
} from "../../utils/phonetics.js";

import type { AdminReferenceRow } from "../../types/index.js";

// ============================================================================
// Types
// ============================================================================

export const ADMIN_LEVELS = 3;

export interface AdminResolution {
  /** Resolved pcodes, index 0 is admin 1; "" when unresolved */
  codes: string[];
  /** Canonical names of the resolved pcodes; "" when unresolved */
  names: string[];
  /** Deepest level with a code or a provider name, 0 when none */
  level: number;
  warnings: string[];
}

export interface AdminHierarchyOptions {
  /** Deepest admin level produced, 1 to 3 */
  maxLevel?: number;
  /** Provider names of this length or shorter are only matched exactly */
  fuzzyMinLength?: number;
  phoneticThreshold?: number;
}

// ============================================================================
// Admin Hierarchy Resolver
// ============================================================================

/**
 * Maps provider admin codes and names onto the canonical pcode trees
 */
export class AdminHierarchyResolver {
  private levels: AdminLevelTable[];
  private nameCache = new Map<string, AdminNode | null>();
  readonly maxLevel: number;
  private fuzzyMinLength: number;
  private phoneticThreshold: number;

  constructor(options: AdminHierarchyOptions = {}) {
    this.maxLevel = Math.min(
      Math.max(options.maxLevel ?? ADMIN_LEVELS, 1),
      ADMIN_LEVELS
    );
    this.fuzzyMinLength = options.fuzzyMinLength ?? 3;
    this.phoneticThreshold =
      options.phoneticThreshold ?? DEFAULT_PHONETIC_THRESHOLD;
    this.levels = Array.from(
      { length: ADMIN_LEVELS },
      (_, i) => new AdminLevelTable(i + 1)
    );
  }

  populate(rows: Iterable<AdminReferenceRow>): void {
    for (const row of rows) {
      const table = this.levels[row.level - 1];
      if (!table) {
        resolverLogger.debug(
          { pcode: row.pcode, level: row.level },
          "Skipping pcode outside supported admin levels"
        );
        continue;
      }
      table.add(row);
    }
    resolverLogger.info(
      { pcodes: this.levels.map((table) => table.size) },
      "Admin levels populated"
    );
  }

  /**
   * Resolve one row's admin columns. Codes are validated and completed
   * upwards through the parent table, then names fill the remaining levels
   * from the top down within the resolved parent.
   */
  resolve(
    countryCode: string,
    providerNames: readonly string[],
    providedCodes: readonly string[]
  ): AdminResolution {
    const codes: string[] = Array.from({ length: ADMIN_LEVELS }, () => "");
    const names: string[] = Array.from({ length: ADMIN_LEVELS }, () => "");
    const warnings: string[] = [];

    let childCode = "";
    for (let i = this.maxLevel - 1; i >= 0; i--) {
      const table = this.table(i);
      const provided = (providedCodes[i] ?? "").trim();
      let code = "";
      if (provided !== "") {
        const valid = table.validate(countryCode, provided);
        if (valid !== null) {
          code = valid;
        } else {
          warnings.push(
            `admin ${String(i + 1)} code ${provided} not found in ${countryCode}`
          );
        }
      }
      if (code === "" && childCode !== "") {
        code = this.table(i + 1).parentOf(childCode) ?? "";
      }
      codes[i] = code;
      childCode = code;
    }

    let ancestor: { code: string; index: number } | null = null;
    for (let i = 0; i < this.maxLevel; i++) {
      const code = codes[i] ?? "";
      if (code !== "") {
        ancestor = { code, index: i };
        continue;
      }
      const providerName = (providerNames[i] ?? "").trim();
      if (providerName === "") continue;

      const node = this.matchName(countryCode, i, providerName, ancestor);
      if (node) {
        codes[i] = node.pcode;
        ancestor = { code: node.pcode, index: i };
      } else {
        warnings.push(
          `admin ${String(i + 1)} name ${providerName} could not be matched in ${countryCode}`
        );
      }
    }

    let level = 0;
    for (let i = 0; i < this.maxLevel; i++) {
      const code = codes[i] ?? "";
      if (code !== "") {
        names[i] = this.table(i).get(code)?.name ?? "";
      }
      if (code !== "" || (providerNames[i] ?? "").trim() !== "") {
        level = i + 1;
      }
    }

    return { codes, names, level, warnings };
  }

  /**
   * Ancestor of a pcode at `targetIndex`, or null when the chain breaks
   */
  private ancestorOf(
    index: number,
    pcode: string,
    targetIndex: number
  ): string | null {
    let current: string | null = pcode;
    for (let i = index; i > targetIndex && current !== null; i--) {
      current = this.table(i).parentOf(current);
    }
    return current;
  }

  private matchName(
    countryCode: string,
    index: number,
    providerName: string,
    ancestor: { code: string; index: number } | null
  ): AdminNode | null {
    const cacheKey = tupleKey([
      countryCode,
      index,
      ancestor?.code ?? null,
      providerName,
    ]);
    const cached = this.nameCache.get(cacheKey);
    if (cached !== undefined) return cached;

    const candidates = this.table(index)
      .nodesIn(countryCode)
      .filter(
        (node) =>
          ancestor === null ||
          this.ancestorOf(index, node.pcode, ancestor.index) === ancestor.code
      );

    const normalized = normalize(providerName);
    let node =
      candidates.find((candidate) => normalize(candidate.name) === normalized) ??
      null;

    if (node === null && normalized.length > this.fuzzyMinLength) {
      const matched = phoneticMatch(
        candidates.map((candidate) => candidate.name),
        providerName,
        { alternativeName: normalized, threshold: this.phoneticThreshold }
      );
      node = matched === null ? null : (candidates[matched] ?? null);
    }

    this.nameCache.set(cacheKey, node);
    return node;
  }

  private table(index: number): AdminLevelTable {
    const table = this.levels[index];
    if (!table) {
      throw new RangeError(`Admin level ${String(index + 1)} not supported`);
    }
    return table;
  }
}
