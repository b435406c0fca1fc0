#!/usr/bin/env node
/**
 * deployment-info entry point
 *
 * Reconciles the networks declared in a hardhat config with the deployment
 * records on disk.
 *
 * Usage:
 *   deployment-info [--root <dir>] list --format json --aggregate
 *   deployment-info audit --format csv --output reports/audit.csv
 */

import { readFileSync } from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { run } from "./cli.js";

const PACKAGE_DIR = path.resolve(
  path.dirname(fileURLToPath(import.meta.url)),
  "..",
);

function readPackageVersion(): string {
  const manifest: unknown = JSON.parse(
    readFileSync(path.join(PACKAGE_DIR, "package.json"), "utf8"),
  );
  if (
    manifest &&
    typeof manifest === "object" &&
    "version" in manifest &&
    typeof manifest.version === "string"
  ) {
    return manifest.version;
  }
  throw new Error(`package.json in ${PACKAGE_DIR} has no version`);
}

async function main(): Promise<number> {
  return run(process.argv.slice(2), { version: readPackageVersion() });
}

main()
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error) => {
    console.error("Fatal error:", error);
    process.exitCode = 1;
  });
