// scripts/deviceReport.ts
import { Command } from "commander";
import { toCsv, writeCsvFile } from "../src/csvFiles";
import { buildDeviceRows, toConsoleRows } from "../src/deviceReport";
import { addConnectionOptions, openSession, reportFatal, type ConnectionOptions } from "../src/ninjaSession";

type DeviceReportOptions = ConnectionOptions & {
  filter?: string;
  output?: string;
};

async function main() {
  const program = addConnectionOptions(
    new Command()
      .name("device-report")
      .description("List devices with their organization and location")
      .option("--filter <df>", 'device filter, e.g. "class in (WINDOWS_SERVER)"')
      .option("--output <file>", "export the full report to CSV")
  );
  program.parse(process.argv);
  const opts = program.opts<DeviceReportOptions>();

  const { api, config } = await openSession(opts, {
    filter: opts.filter,
    outputPath: opts.output,
  });

  console.log(config.filter ? `Fetching devices (df: ${config.filter})...` : "Fetching devices...");
  const devices = await api.listDevices(config.filter);
  const organizations = await api.listOrganizations();
  const locations = await api.listLocations();
  console.log(`Found ${devices.length} devices\n`);

  const rows = buildDeviceRows(devices, organizations, locations);
  console.table(toConsoleRows(rows));

  if (config.outputPath) {
    await writeCsvFile(
      config.outputPath,
      toCsv(rows, [
        "organization",
        "location",
        "systemName",
        "id",
        "approvalStatus",
        "offline",
        "created",
        "lastContact",
      ])
    );
    console.log(`\nReport written to ${config.outputPath}`);
  }
}

main().catch(reportFatal);
