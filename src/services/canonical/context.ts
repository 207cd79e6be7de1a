import { AdminHierarchyResolver } from "./admin-hierarchy.js";
import { NameCodeResolver } from "./name-code-resolver.js";
import { OrgTypeVocabulary } from "./org-types.js";
import { OrganizationIdentityResolver } from "./organizations.js";
import { SectorVocabulary } from "./sectors.js";
import { DiagnosticsCollector } from "../diagnostics.js";

import type { MatchingConfig } from "../../config/schema.js";
import type {
  AdminReferenceRow,
  OrgReferenceRow,
  VocabularyEntry,
} from "../../types/index.js";

export interface ReferenceData {
  sectors: VocabularyEntry[];
  orgTypes: VocabularyEntry[];
  organizations: OrgReferenceRow[];
  adminPcodes: AdminReferenceRow[];
  sectorMap?: Record<string, string>;
  orgTypeMap?: Record<string, string>;
}

/**
 * Every cache a run mutates. One context per run; tests build their own.
 */
export class ResolverContext {
  readonly nameCodeResolver: NameCodeResolver;
  readonly sectors: SectorVocabulary;
  readonly orgTypes: OrgTypeVocabulary;
  readonly organizations: OrganizationIdentityResolver;
  readonly admins: AdminHierarchyResolver;

  constructor(
    readonly diagnostics: DiagnosticsCollector = new DiagnosticsCollector(),
    matching: Partial<MatchingConfig> = {}
  ) {
    this.nameCodeResolver = new NameCodeResolver({
      fuzzyMinLength: matching.fuzzyMinLength,
      phoneticThreshold: matching.phoneticThreshold,
    });
    this.sectors = new SectorVocabulary(this.nameCodeResolver);
    this.orgTypes = new OrgTypeVocabulary(this.nameCodeResolver);
    this.organizations = new OrganizationIdentityResolver(
      this.orgTypes,
      diagnostics,
      { acronymMaxLength: matching.acronymMaxLength }
    );
    this.admins = new AdminHierarchyResolver({
      maxLevel: matching.maxAdminLevel,
      fuzzyMinLength: matching.adminFuzzyMinLength,
      phoneticThreshold: matching.phoneticThreshold,
    });
  }

  /**
   * Populate all resolvers from reference data, vocabularies first
   */
  populate(reference: ReferenceData): this {
    this.sectors.populate(reference.sectors, reference.sectorMap);
    this.orgTypes.populate(reference.orgTypes, reference.orgTypeMap);
    this.organizations.populate(reference.organizations);
    this.admins.populate(reference.adminPcodes);
    return this;
  }
}
