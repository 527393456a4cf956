// scripts/policyReport.ts
// Which policy each organization uses per node role.

import { Command, Option } from "commander";
import { matrixToCsv, toCsv, writeCsvFile } from "../src/csvFiles";
import { addConnectionOptions, openSession, reportFatal, type ConnectionOptions } from "../src/ninjaSession";
import {
  buildPolicyMatrix,
  buildPolicyRows,
  matrixToRecords,
  type PolicyReportMode,
} from "../src/policyReport";

type PolicyReportOptions = ConnectionOptions & {
  mode: PolicyReportMode;
  output?: string;
};

async function main() {
  const program = addConnectionOptions(
    new Command()
      .name("policy-report")
      .description("Report organization policy assignments per node role")
      .addOption(
        new Option("--mode <mode>", "one row per assignment, or one column per role")
          .choices(["rows", "columns"])
          .default("rows")
      )
      .option("--output <file>", "export the report to CSV")
  );
  program.parse(process.argv);
  const opts = program.opts<PolicyReportOptions>();

  const { api, config } = await openSession(opts, { outputPath: opts.output });

  console.log("Fetching organizations, roles and policies...");
  const organizations = await api.listOrganizationsDetailed();
  const roles = await api.listRoles();
  const policies = await api.listPolicies();
  console.log(
    `Found ${organizations.length} organizations, ${roles.length} roles, ${policies.length} policies\n`
  );

  const input = { organizations, roles, policies };
  let csv: string;

  if (opts.mode === "columns") {
    const matrix = buildPolicyMatrix(input);
    console.table(matrixToRecords(matrix));
    csv = matrixToCsv(matrix.header, matrix.rows);
  } else {
    const rows = buildPolicyRows(input);
    console.table(rows);
    console.log(`${rows.length} assignment(s)`);
    csv = toCsv(rows, ["organization", "nodeRole", "policyId", "policy"]);
  }

  if (config.outputPath) {
    await writeCsvFile(config.outputPath, csv);
    console.log(`\nReport written to ${config.outputPath}`);
  }
}

main().catch(reportFatal);
