// src/deviceReport.ts
import { format, fromUnixTime } from "date-fns";
import { buildLookup, resolveName, type NamedEntity } from "./lookups";
import type { NinjaDevice } from "./ninjaApi";

export const ORGANIZATION_DISPLAY_WIDTH = 30;
export const LOCATION_DISPLAY_WIDTH = 25;

export interface DeviceReportRow {
  organization: string;
  location: string;
  systemName: string;
  id: number;
  approvalStatus: string;
  offline: boolean;
  created: string;
  lastContact: string;
}

/** Epoch seconds -> local "yyyy-MM-dd HH:mm:ss"; missing -> "". */
export function formatEpochSeconds(seconds: number | null | undefined): string {
  if (seconds === null || seconds === undefined) return "";
  return format(fromUnixTime(seconds), "yyyy-MM-dd HH:mm:ss");
}

export function buildDeviceRows(
  devices: readonly NinjaDevice[],
  organizations: readonly NamedEntity[],
  locations: readonly NamedEntity[]
): DeviceReportRow[] {
  const orgNames = buildLookup(organizations);
  const locationNames = buildLookup(locations);

  const rows = devices.map(
    (device): DeviceReportRow => ({
      organization: resolveName(orgNames, device.organizationId),
      location: resolveName(locationNames, device.locationId),
      systemName: device.systemName ?? "",
      id: device.id,
      approvalStatus: device.approvalStatus ?? "",
      offline: device.offline ?? false,
      created: formatEpochSeconds(device.created),
      lastContact: formatEpochSeconds(device.lastContact),
    })
  );

  return rows.sort(
    (a, b) =>
      a.organization.localeCompare(b.organization) ||
      a.systemName.localeCompare(b.systemName)
  );
}

export function truncate(value: string, width: number): string {
  return value.length > width ? value.slice(0, width) : value;
}

/**
 * Narrowed copy for the terminal. Exports use the full rows.
 */
export function toConsoleRows(rows: readonly DeviceReportRow[]): DeviceReportRow[] {
  return rows.map((row) => ({
    ...row,
    organization: truncate(row.organization, ORGANIZATION_DISPLAY_WIDTH),
    location: truncate(row.location, LOCATION_DISPLAY_WIDTH),
  }));
}
