// src/policyReport.ts
import { buildLookup, resolveName, type NamedEntity } from "./lookups";
import type { NinjaDetailedOrganization, NinjaPolicy, NinjaRole } from "./ninjaApi";

export type PolicyReportMode = "rows" | "columns";

export interface PolicyAssignmentRow {
  organization: string;
  nodeRole: string;
  policyId: number;
  policy: string;
}

/** Pivoted report: header[0] is "organization", then one column per role name. */
export interface PolicyMatrix {
  header: string[];
  rows: string[][];
}

export interface PolicyReportInput {
  organizations: readonly NinjaDetailedOrganization[];
  roles: readonly NamedEntity[];
  policies: readonly NinjaPolicy[];
}

function compareText(a: string, b: string): number {
  return a.localeCompare(b);
}

/**
 * One row per organization/role assignment. Names that cannot be resolved
 * come out as "". Array#sort is stable, so equal keys keep fetch order.
 */
export function buildPolicyRows({
  organizations,
  roles,
  policies,
}: PolicyReportInput): PolicyAssignmentRow[] {
  const roleNames = buildLookup(roles);
  const policyNames = buildLookup(policies);

  const rows: PolicyAssignmentRow[] = [];
  for (const org of organizations) {
    for (const assignment of org.policies ?? []) {
      rows.push({
        organization: org.name,
        nodeRole: resolveName(roleNames, assignment.nodeRoleId),
        policyId: assignment.policyId,
        policy: resolveName(policyNames, assignment.policyId),
      });
    }
  }

  return rows.sort(
    (a, b) =>
      compareText(a.organization, b.organization) ||
      compareText(a.nodeRole, b.nodeRole) ||
      compareText(a.policy, b.policy)
  );
}

/** Distinct role names, alphabetical. */
export function roleColumns(roles: readonly NinjaRole[]): string[] {
  return [...new Set(roles.map((role) => role.name))].sort(compareText);
}

/**
 * One row per organization, one column per role name known to the
 * instance (used or not). A cell holds the policy assigned for that role;
 * when several roles share a name their policies are joined with "; ".
 */
export function buildPolicyMatrix({
  organizations,
  roles,
  policies,
}: PolicyReportInput): PolicyMatrix {
  const roleNames = buildLookup(roles);
  const policyNames = buildLookup(policies);
  const columns = roleColumns(roles);

  const sortedOrgs = [...organizations].sort((a, b) => compareText(a.name, b.name));

  const rows = sortedOrgs.map((org) => {
    const cells = new Map<string, string[]>();
    for (const assignment of org.policies ?? []) {
      const role = resolveName(roleNames, assignment.nodeRoleId);
      const policy = resolveName(policyNames, assignment.policyId);
      if (!role || !policy) continue;

      const existing = cells.get(role) ?? [];
      if (!existing.includes(policy)) existing.push(policy);
      cells.set(role, existing);
    }

    return [org.name, ...columns.map((role) => (cells.get(role) ?? []).join("; "))];
  });

  return { header: ["organization", ...columns], rows };
}

/** Matrix rows keyed by column name, for console.table. */
export function matrixToRecords(matrix: PolicyMatrix): Record<string, string>[] {
  return matrix.rows.map((row) =>
    Object.fromEntries(matrix.header.map((column, i) => [column, row[i] ?? ""]))
  );
}
