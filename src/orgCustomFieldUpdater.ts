// src/orgCustomFieldUpdater.ts
// Apply one organization custom-field value per CSV row.

import type { CustomFieldCsvRow } from "./csvFiles";
import { describeRequestError, ValidationError } from "./errors";
import type { NinjaApi, NinjaOrganization } from "./ninjaApi";

export type RowStatus = "updated" | "not-found" | "failed" | "skipped";

export interface RowOutcome {
  row: number; // 1-based, data rows only
  organization: string;
  customfieldvalue: string;
  status: RowStatus;
  message: string;
}

export interface UpdateSummary {
  updated: number;
  notFound: number;
  failed: number;
  skipped: number;
}

export interface UpdateRun {
  outcomes: RowOutcome[];
  summary: UpdateSummary;
}

export type CustomFieldWriter = Pick<NinjaApi, "updateOrganizationCustomFields">;

function matchKey(name: string): string {
  return name.trim().toLowerCase();
}

/** Lower-cased name -> every organization carrying it, in fetch order. */
export function indexOrganizationsByName(
  organizations: readonly NinjaOrganization[]
): ReadonlyMap<string, NinjaOrganization[]> {
  const index = new Map<string, NinjaOrganization[]>();
  for (const org of organizations) {
    const key = matchKey(org.name);
    const bucket = index.get(key) ?? [];
    bucket.push(org);
    index.set(key, bucket);
  }
  return index;
}

/**
 * Walk the CSV rows in order. Each row ends in exactly one of
 * updated / not-found / failed / skipped, so the counters always add up
 * to rows.length. Two organizations sharing a name (ignoring case) are
 * treated as a failure rather than guessing which one to write.
 */
export async function applyCustomFieldUpdates(
  rows: readonly CustomFieldCsvRow[],
  organizations: readonly NinjaOrganization[],
  fieldName: string,
  api: CustomFieldWriter
): Promise<UpdateRun> {
  if (!fieldName.trim()) {
    throw new ValidationError("Missing required setting: custom field name");
  }

  const index = indexOrganizationsByName(organizations);
  const summary: UpdateSummary = { updated: 0, notFound: 0, failed: 0, skipped: 0 };
  const outcomes: RowOutcome[] = [];

  for (const [i, row] of rows.entries()) {
    const organization = row.organization.trim();
    const value = row.customfieldvalue.trim();
    const record = (status: RowStatus, message: string) => {
      outcomes.push({ row: i + 1, organization, customfieldvalue: value, status, message });
    };

    if (!organization) {
      console.log(`Skipped row ${i + 1}: missing organization name`);
      summary.skipped++;
      record("skipped", "missing organization name");
      continue;
    }

    if (!value) {
      console.log(`Skipped row ${i + 1}: missing custom field value for "${organization}"`);
      summary.skipped++;
      record("skipped", "missing custom field value");
      continue;
    }

    const matches = index.get(matchKey(organization)) ?? [];

    if (matches.length === 0) {
      console.log(`No match: "${organization}"`);
      summary.notFound++;
      record("not-found", "organization not found");
      continue;
    }

    if (matches.length > 1) {
      const ids = matches.map((org) => org.id).join(", ");
      console.error(`Ambiguous: "${organization}" matches organizations ${ids}`);
      summary.failed++;
      record("failed", `ambiguous organization name (ids ${ids})`);
      continue;
    }

    const [org] = matches;
    try {
      await api.updateOrganizationCustomFields(org.id, { [fieldName]: value });
      console.log(`Updated: ${org.name} (${org.id}) -> ${fieldName}=${value}`);
      summary.updated++;
      record("updated", "");
    } catch (err) {
      const message = describeRequestError(err);
      console.error(`Error updating ${org.name} (${org.id}): ${message}`);
      summary.failed++;
      record("failed", message);
    }
  }

  return { outcomes, summary };
}

export function formatSummary(summary: UpdateSummary): string {
  return [
    "=== Summary ===",
    `Updated: ${summary.updated}`,
    `NotFound: ${summary.notFound}`,
    `Failed: ${summary.failed}`,
    `Skipped: ${summary.skipped}`,
  ].join("\n");
}
