// src/csvFiles.ts
import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import fs from "fs-extra";
import { z } from "zod";
import { ValidationError } from "./errors";

export const CUSTOM_FIELD_CSV_HEADER = ["organization", "customfieldvalue"] as const;

export interface CustomFieldCsvRow {
  organization: string;
  customfieldvalue: string;
}

const recordsSchema = z.array(z.array(z.string()));

/**
 * Parse the bulk-update CSV. The header must be
 * "organization,customfieldvalue" in any letter case; cells are trimmed and
 * blank lines dropped.
 */
export function parseCustomFieldCsv(content: string): CustomFieldCsvRow[] {
  const records = recordsSchema.parse(
    parse(content, {
      bom: true,
      trim: true,
      skip_empty_lines: true,
      relax_column_count: true,
    })
  );

  const [header, ...rows] = records;
  const expected = CUSTOM_FIELD_CSV_HEADER.join(",");
  if (!header || header.join(",").toLowerCase() !== expected) {
    throw new ValidationError(
      `CSV header must be "${expected}" (found "${header ? header.join(",") : ""}")`
    );
  }

  return rows.map((row) => ({
    organization: row[0] ?? "",
    customfieldvalue: row[1] ?? "",
  }));
}

export async function readCustomFieldCsv(csvPath: string): Promise<CustomFieldCsvRow[]> {
  if (!(await fs.pathExists(csvPath))) {
    throw new ValidationError(`CSV file not found: ${csvPath}`);
  }
  return parseCustomFieldCsv(await fs.readFile(csvPath, "utf8"));
}

export function toCsv<T extends object>(records: readonly T[], columns: readonly (keyof T & string)[]): string {
  return stringify([...records], {
    header: true,
    columns: [...columns],
    cast: { boolean: (value) => String(value) },
  });
}

export function matrixToCsv(header: readonly string[], rows: readonly string[][]): string {
  return stringify([[...header], ...rows]);
}

export async function writeCsvFile(outputPath: string, csv: string): Promise<void> {
  await fs.outputFile(outputPath, csv, "utf8");
}
