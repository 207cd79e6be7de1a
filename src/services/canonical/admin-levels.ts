import { normalizePcode } from "../../utils/normalize.js";

import type { AdminReferenceRow } from "../../types/index.js";

export interface AdminNode {
  pcode: string;
  name: string;
  /** "" for admin 1 */
  parentPcode: string;
  countryCode: string;
}

/**
 * Pcodes of one admin level across all countries
 */
export class AdminLevelTable {
  private nodes = new Map<string, AdminNode>();
  private byCountry = new Map<string, AdminNode[]>();

  constructor(readonly level: number) {}

  add(row: AdminReferenceRow): void {
    const pcode = row.pcode.trim();
    if (pcode === "") return;
    const node: AdminNode = {
      pcode,
      name: row.name.trim(),
      parentPcode: row.parentPcode.trim(),
      countryCode: row.countryCode.trim(),
    };
    if (!this.nodes.has(pcode)) {
      const list = this.byCountry.get(node.countryCode) ?? [];
      list.push(node);
      this.byCountry.set(node.countryCode, list);
    }
    this.nodes.set(pcode, node);
  }

  get size(): number {
    return this.nodes.size;
  }

  get(pcode: string): AdminNode | undefined {
    return this.nodes.get(pcode);
  }

  /**
   * The pcode as published when `code` belongs to the country at this level,
   * trying the code as given and then upper-cased without spaces
   */
  validate(countryCode: string, code: string): string | null {
    for (const candidate of [code, normalizePcode(code)]) {
      const node = this.nodes.get(candidate);
      if (node?.countryCode === countryCode) return node.pcode;
    }
    return null;
  }

  parentOf(pcode: string): string | null {
    const parent = this.nodes.get(pcode)?.parentPcode ?? "";
    return parent === "" ? null : parent;
  }

  nodesIn(countryCode: string): readonly AdminNode[] {
    return this.byCountry.get(countryCode) ?? [];
  }
}
