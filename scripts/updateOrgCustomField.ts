// scripts/updateOrgCustomField.ts
// Set one organization custom field from a CSV of
//   organization,customfieldvalue

import { Command } from "commander";
import { readCustomFieldCsv, toCsv, writeCsvFile } from "../src/csvFiles";
import { ValidationError } from "../src/errors";
import { addConnectionOptions, openSession, reportFatal, type ConnectionOptions } from "../src/ninjaSession";
import { applyCustomFieldUpdates, formatSummary } from "../src/orgCustomFieldUpdater";

type UpdateOptions = ConnectionOptions & {
  csv: string;
  field: string;
  results?: string;
};

async function main() {
  const program = addConnectionOptions(
    new Command()
      .name("update-org-custom-field")
      .description("Bulk-update an organization custom field from a CSV file")
      .requiredOption("--csv <file>", "CSV with header organization,customfieldvalue")
      .requiredOption("--field <name>", "custom field name, e.g. billingCode")
      .option("--results <file>", "write per-row outcomes to this CSV")
  );
  program.parse(process.argv);
  const opts = program.opts<UpdateOptions>();

  // Validate input before touching the network
  if (!opts.field.trim()) {
    throw new ValidationError("--field must not be empty");
  }
  const rows = await readCustomFieldCsv(opts.csv);
  console.log(`Loaded ${rows.length} row(s) from ${opts.csv}\n`);

  const { api, config } = await openSession(opts, { outputPath: opts.results });

  console.log("Fetching organizations...");
  const organizations = await api.listOrganizations();
  console.log(`Found ${organizations.length} organizations\n`);

  const { outcomes, summary } = await applyCustomFieldUpdates(rows, organizations, opts.field, api);

  console.log(`\n${formatSummary(summary)}`);

  if (config.outputPath) {
    await writeCsvFile(
      config.outputPath,
      toCsv(outcomes, ["row", "organization", "customfieldvalue", "status", "message"])
    );
    console.log(`\nResults written to ${config.outputPath}`);
  }
}

main().catch(reportFatal);
