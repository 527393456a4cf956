// scripts/checkUserFile.ts
// Exit codes: 0 = found (or nobody logged on), 1 = bad input / unexpected error, 2 = not found

import { Command, CommanderError } from "commander";
import { checkUserFile, exitCodeFor, EXIT_CODES, type FileCheckOutcome } from "../src/userFileCheck";

function describeOutcome(outcome: FileCheckOutcome): string {
  switch (outcome.status) {
    case "found":
      return `Found: ${outcome.file}`;
    case "no-user":
      return "No logged-on user; nothing to check.";
    case "not-found":
      return outcome.folders.length === 0
        ? `No matching folder under ${outcome.profileDir}`
        : `No matching file in: ${outcome.folders.join(", ")}`;
    case "invalid":
      return `Invalid input: ${outcome.message}`;
  }
}

async function main(): Promise<number> {
  const program = new Command()
    .name("check-user-file")
    .description("Check for a file under the logged-on user's profile")
    .requiredOption("--folder <pattern>", 'folder pattern relative to the profile, e.g. "AppData\\Local\\8x8*"')
    .requiredOption("--file <pattern>", 'file name pattern, e.g. "8x8*.exe"')
    .exitOverride();

  try {
    program.parse(process.argv);
  } catch (err) {
    // commander has already printed usage or help
    if (err instanceof CommanderError) {
      return err.exitCode === 0 ? 0 : EXIT_CODES.invalid;
    }
    throw err;
  }
  const opts = program.opts<{ folder: string; file: string }>();

  const outcome = await checkUserFile({ folderPattern: opts.folder, filePattern: opts.file });
  const line = describeOutcome(outcome);
  if (outcome.status === "invalid") {
    console.error(line);
  } else {
    console.log(line);
  }
  return exitCodeFor(outcome);
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error("Unexpected error:", err instanceof Error ? err.message : String(err));
    process.exitCode = EXIT_CODES.invalid;
  });
