import { resolverLogger } from "../../logger.js";
import { KeyedMap, tupleKey } from "../../utils/keyed-map.js";
import { compareBy } from "../../utils/sort.js";
import { normalize, truncate } from "../../utils/normalize.js";

import type { OrgTypeVocabulary } from "./org-types.js";
import type { DiagnosticsSink } from "../diagnostics.js";
import type {
  OrganizationRecord,
  OrgReferenceRow,
} from "../../types/index.js";

// ============================================================================
// Types
// ============================================================================

/**
 * One way an organization is referred to inside a country (or globally).
 * Mutated in place as acronym and type are learned.
 */
export interface OrgIdentity {
  canonicalName: string;
  normalizedName: string;
  /** "" when unknown */
  acronym: string;
  normalizedAcronym: string;
  /** "" when unknown */
  typeCode: string;
  complete: boolean;
  used: boolean;
}

/** Deduplicated organization, one per (normalized acronym, normalized name) */
export type CanonicalOrg = OrganizationRecord;

export interface IdentityKey {
  /** null for entries that apply to every country */
  countryCode: string | null;
  lookup: string;
}

export interface CanonicalOrgKey {
  normalizedAcronym: string;
  normalizedName: string;
}

export interface OrganizationResolverOptions {
  acronymMaxLength?: number;
}

export const DEFAULT_ACRONYM_MAX_LENGTH = 32;

const GLOBAL_COUNTRY_CODES = new Set(["", "*"]);

function identityKeyOf(key: IdentityKey): string {
  return tupleKey([key.countryCode, key.lookup]);
}

function canonicalKeyOf(key: CanonicalOrgKey): string {
  return tupleKey([key.normalizedAcronym, key.normalizedName]);
}

// ============================================================================
// Organization Identity Resolver
// ============================================================================

export class OrganizationIdentityResolver {
  private identities = new KeyedMap<IdentityKey, OrgIdentity>(identityKeyOf);
  private canonical = new KeyedMap<CanonicalOrgKey, CanonicalOrg>(
    canonicalKeyOf
  );
  readonly acronymMaxLength: number;

  constructor(
    private orgTypes: OrgTypeVocabulary,
    private diagnostics: DiagnosticsSink,
    options: OrganizationResolverOptions = {}
  ) {
    this.acronymMaxLength =
      options.acronymMaxLength ?? DEFAULT_ACRONYM_MAX_LENGTH;
  }

  /**
   * Index the reference organizations. Each row is reachable by its name,
   * acronym and alternate pattern, raw and normalized.
   */
  populate(rows: Iterable<OrgReferenceRow>): void {
    resolverLogger.info("Populating org mapping");

    let index = 0;
    for (const row of rows) {
      index++;
      const canonicalName = row.name.trim();
      if (canonicalName === "") {
        resolverLogger.error({ row: index }, "Canonical name is empty");
        continue;
      }
      const countryCode = GLOBAL_COUNTRY_CODES.has(row.countryCode.trim())
        ? null
        : row.countryCode.trim();
      const acronym = row.acronym.trim();
      const typeCode = row.typeCode.trim();
      const pattern = row.pattern.trim();

      const identity: OrgIdentity = {
        canonicalName,
        normalizedName: normalize(canonicalName),
        acronym,
        normalizedAcronym: normalize(acronym),
        typeCode,
        complete: acronym !== "" && typeCode !== "",
        used: false,
      };

      const lookups = [
        canonicalName,
        identity.normalizedName,
        acronym,
        identity.normalizedAcronym,
        pattern,
        normalize(pattern),
      ];
      for (const lookup of lookups) {
        if (lookup === "") continue;
        this.identities.set({ countryCode, lookup }, identity);
      }
    }

    resolverLogger.debug(
      { lookups: this.identities.size },
      "Org mapping populated"
    );
  }

  /**
   * Find the identity for a raw organization string. Country entries win over
   * global ones and exact strings over normalized ones. Unknown strings get a
   * new, incomplete identity.
   */
  getIdentity(raw: string, countryCode: string): OrgIdentity {
    const key: IdentityKey = { countryCode, lookup: raw };
    const direct = this.identities.get(key);
    if (direct) return direct;

    const normalized = normalize(raw);
    const fallbacks: IdentityKey[] = [
      { countryCode, lookup: normalized },
      { countryCode: null, lookup: raw },
      { countryCode: null, lookup: normalized },
    ];
    for (const fallback of fallbacks) {
      const found = this.identities.get(fallback);
      if (found) {
        this.identities.set(key, found);
        return found;
      }
    }

    const created: OrgIdentity = {
      canonicalName: raw,
      normalizedName: normalized,
      acronym: "",
      normalizedAcronym: "",
      typeCode: "",
      complete: false,
      used: false,
    };
    this.identities.set(key, created);
    return created;
  }

  /**
   * Fill a missing acronym or type from the values on a source row
   */
  completeIdentity(
    identity: OrgIdentity,
    acronym: string | undefined,
    typeLabel: string | undefined,
    datasetName: string
  ): void {
    if (identity.acronym === "" && acronym !== undefined && acronym !== "") {
      identity.acronym = truncate(acronym, this.acronymMaxLength);
      identity.normalizedAcronym = normalize(identity.acronym);
    }

    if (
      identity.typeCode === "" &&
      typeLabel !== undefined &&
      typeLabel !== ""
    ) {
      const typeCode = this.orgTypes.getCode(typeLabel);
      if (typeCode !== null) {
        identity.typeCode = typeCode;
      } else {
        this.diagnostics.missingValue(datasetName, "org type", typeLabel);
      }
    }
  }

  /**
   * Attach the identity to its canonical organization, creating it on first
   * sight. The first non-empty type code seen for a canonical organization
   * is kept; the identity takes the canonical acronym, name and type.
   */
  mergeOrRegister(identity: OrgIdentity, datasetName = ""): CanonicalOrg {
    const key: CanonicalOrgKey = {
      normalizedAcronym: identity.normalizedAcronym,
      normalizedName: identity.normalizedName,
    };
    let canonical = this.canonical.get(key);

    if (canonical) {
      if (canonical.typeCode === "" && identity.typeCode !== "") {
        canonical = { ...canonical, typeCode: identity.typeCode };
        this.canonical.set(key, canonical);
      } else {
        if (
          identity.typeCode !== "" &&
          identity.typeCode !== canonical.typeCode
        ) {
          this.diagnostics.warning(
            datasetName,
            `org ${canonical.name} has conflicting org types ${canonical.typeCode} and ${identity.typeCode}`
          );
        }
        identity.typeCode = canonical.typeCode;
      }
      identity.acronym = canonical.acronym;
      identity.canonicalName = canonical.name;
    } else {
      canonical = {
        acronym: identity.acronym,
        name: identity.canonicalName,
        typeCode: identity.typeCode,
      };
      this.canonical.set(key, canonical);
    }

    identity.complete = identity.acronym !== "" && identity.typeCode !== "";
    identity.used = true;
    return canonical;
  }

  getTypeDescription(typeCode: string): string {
    return this.orgTypes.getName(typeCode);
  }

  /**
   * Canonical organizations ordered by acronym, name and type code
   */
  canonicalOrgs(): CanonicalOrg[] {
    return [...this.canonical.values()].sort(
      compareBy(
        (org) => org.acronym,
        (org) => org.name,
        (org) => org.typeCode
      )
    );
  }

  /**
   * Every lookup key with the identity it points to, for auditing
   */
  identityMapRows(): Record<string, string>[] {
    const rows: Record<string, string>[] = [];
    for (const [key, identity] of this.identities.entries()) {
      rows.push({
        "Country Code": key.countryCode ?? "",
        Lookup: key.lookup,
        "Canonical Name": identity.canonicalName,
        "Normalized Name": identity.normalizedName,
        Acronym: identity.acronym,
        "Normalized Acronym": identity.normalizedAcronym,
        "Type Code": identity.typeCode,
        Complete: identity.complete ? "Y" : "N",
        Used: identity.used ? "Y" : "N",
      });
    }
    return rows;
  }
}

