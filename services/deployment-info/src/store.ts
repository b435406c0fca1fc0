import { type Dirent, readdirSync, readFileSync } from "node:fs";
import path from "node:path";
import { isHex } from "viem";
import { StoreParseError, StoreReadError } from "./errors.js";

const CHAIN_DIRECTORY_PATTERN = /^chain-(0|[1-9][0-9]*)$/;

export const DEFAULT_DEPLOYMENTS_DIR = path.join("ignition", "deployments");
export const DEFAULT_RECORD_FILE = "deployed_addresses.json";

export interface DeploymentStore {
  rootDir: string;
  /** Path of the record file for `chainId`, whether or not it exists. */
  recordPath(chainId: number): string;
  /** First address in the chain's record, or null when nothing is deployed. */
  lookup(chainId: number): string | null;
  listChainIds(): number[];
  countDeployments(): number;
}

export interface DeploymentStoreOptions {
  rootDir: string;
  recordFile?: string;
}

function isMissingPathError(error: unknown): boolean {
  return (
    error instanceof Error &&
    "code" in error &&
    (error.code === "ENOENT" || error.code === "ENOTDIR")
  );
}

function isAddressValue(value: unknown): value is string {
  return typeof value === "string" && value.length > 2 && isHex(value);
}

function readRecordValues(filePath: string): unknown[] | null {
  let raw: string;
  try {
    raw = readFileSync(filePath, "utf8");
  } catch (error) {
    if (isMissingPathError(error)) {
      return null;
    }
    throw new StoreReadError(filePath, error);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new StoreParseError(filePath, error);
  }

  if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new StoreParseError(filePath, "expected a label -> address object");
  }
  return Object.values(parsed);
}

/**
 * Reads hardhat ignition style deployment directories: one `chain-<id>`
 * directory per chain holding a JSON object of `label -> address`.
 *
 * Record order is JSON.parse order: integer-like labels first, ascending,
 * then the remaining labels as written.
 */
export function createDeploymentStore(
  options: DeploymentStoreOptions,
): DeploymentStore {
  const rootDir = options.rootDir;
  const recordFile = options.recordFile ?? DEFAULT_RECORD_FILE;

  const recordPath = (chainId: number): string =>
    path.join(rootDir, `chain-${chainId}`, recordFile);

  const listChainIds = (): number[] => {
    let entries: Dirent[];
    try {
      entries = readdirSync(rootDir, { withFileTypes: true });
    } catch (error) {
      if (isMissingPathError(error)) {
        return [];
      }
      throw new StoreReadError(rootDir, error);
    }

    const chainIds: number[] = [];
    for (const entry of entries) {
      const match = CHAIN_DIRECTORY_PATTERN.exec(entry.name);
      if (!entry.isDirectory() || !match) {
        continue;
      }
      const chainId = Number(match[1]);
      if (Number.isSafeInteger(chainId)) {
        chainIds.push(chainId);
      }
    }
    return chainIds.sort((left, right) => left - right);
  };

  return {
    rootDir,
    recordPath,
    lookup(chainId: number): string | null {
      const values = readRecordValues(recordPath(chainId));
      if (!values) {
        return null;
      }
      for (const value of values) {
        if (isAddressValue(value)) {
          return value;
        }
      }
      return null;
    },
    listChainIds,
    countDeployments(): number {
      return listChainIds().length;
    },
  };
}
