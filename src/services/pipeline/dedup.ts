import { KeyedMap, tupleKey } from "../../utils/keyed-map.js";
import { compareBy } from "../../utils/sort.js";

import type { OutputRecord } from "../../types/index.js";

/**
 * Fields that make two presence records the same record
 */
export interface PresenceKey {
  countryCode: string;
  providerAdmin1Name: string;
  providerAdmin2Name: string;
  admin1Code: string;
  admin2Code: string;
  orgAcronym: string;
  orgName: string;
  sectorCode: string;
  referencePeriodStart: string;
}

export function presenceKeyOf(record: OutputRecord): PresenceKey {
  return {
    countryCode: record.countryCode,
    providerAdmin1Name: record.providerAdmin1Name,
    providerAdmin2Name: record.providerAdmin2Name,
    admin1Code: record.admin1Code,
    admin2Code: record.admin2Code,
    orgAcronym: record.orgAcronym,
    orgName: record.orgName,
    sectorCode: record.sectorCode,
    referencePeriodStart: record.referencePeriodStart,
  };
}

function derivePresenceKey(key: PresenceKey): string {
  return tupleKey([
    key.countryCode,
    key.providerAdmin1Name,
    key.providerAdmin2Name,
    key.admin1Code,
    key.admin2Code,
    key.orgAcronym,
    key.orgName,
    key.sectorCode,
    key.referencePeriodStart,
  ]);
}

/**
 * Presence records keyed by PresenceKey. A later record with the same key
 * replaces the earlier one.
 */
export class PresenceRecordSet {
  private records = new KeyedMap<PresenceKey, OutputRecord>(
    derivePresenceKey
  );

  add(record: OutputRecord): void {
    this.records.set(presenceKeyOf(record), record);
  }

  get size(): number {
    return this.records.size;
  }

  /**
   * Records ordered by country, admin codes, organization and sector
   */
  sorted(): OutputRecord[] {
    return [...this.records.values()].sort(
      compareBy(
        (r) => r.countryCode,
        (r) => r.admin1Code,
        (r) => r.admin2Code,
        (r) => r.admin3Code,
        (r) => r.providerAdmin1Name,
        (r) => r.providerAdmin2Name,
        (r) => r.orgAcronym,
        (r) => r.orgName,
        (r) => r.sectorCode,
        (r) => r.referencePeriodStart
      )
    );
  }
}
