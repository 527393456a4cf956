// scripts/diagnose-api.ts
// Quick connectivity check: token, then one small page of each list endpoint

import { Command } from "commander";
import { loadConfig } from "../src/config";
import { describeRequestError } from "../src/errors";
import { axiosPageRequester, createNinjaClient } from "../src/ninjaApi";
import { getAccessToken, tokenUrlFor } from "../src/ninjaToken";
import { decodePage } from "../src/pagination";
import { addConnectionOptions, reportFatal, type ConnectionOptions } from "../src/ninjaSession";

const TIMEOUT_MS = 15_000; // per request

const ENDPOINTS = [
  "/organizations",
  "/organizations-detailed",
  "/policies",
  "/roles",
  "/locations",
  "/devices",
];

function withTimeout<T>(promise: Promise<T>, ms: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<T>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`${label} timed out after ${ms}ms`)), ms);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

async function main() {
  const program = addConnectionOptions(
    new Command().name("diagnose-api").description("Check NinjaOne API connectivity")
  );
  program.parse(process.argv);
  const config = await loadConfig(program.opts<ConnectionOptions>());

  console.log("API Diagnostic Tool");
  console.log("===================");
  console.log("Timeout per request:", TIMEOUT_MS, "ms");

  console.log(`\n=== Token (${tokenUrlFor(config)}) ===`);
  const start = Date.now();
  const token = await withTimeout(getAccessToken(config), TIMEOUT_MS, "Token request");
  console.log(`   ✓ Token obtained in ${Date.now() - start}ms`);

  console.log("\n=== List endpoints (pageSize=1) ===");
  const request = axiosPageRequester(createNinjaClient(config, token));

  for (const endpoint of ENDPOINTS) {
    try {
      const t0 = Date.now();
      const body = await withTimeout(request(endpoint, { pageSize: 1 }), TIMEOUT_MS, endpoint);
      const page = decodePage(body);
      const count = page.kind === "unknown" ? "?" : page.items.length;
      console.log(`   ✓ ${endpoint}: ${page.kind} envelope, ${count} item(s) in ${Date.now() - t0}ms`);
    } catch (err) {
      console.log(`   ✗ ${endpoint}: ${describeRequestError(err)}`);
    }
  }

  console.log("\n=== Done ===\n");
}

main().catch(reportFatal);
