import { z } from "zod";
import { UpdateCheckError } from "./errors.js";

const VERSION_PATTERN = /^v?(0|[1-9][0-9]*)\.(0|[1-9][0-9]*)\.(0|[1-9][0-9]*)/;

const LatestReleaseSchema = z.object({
  version: z.string().min(1),
});

export interface UpdateCheckOptions {
  packageName: string;
  currentVersion: string;
  registryUrl: string;
}

export interface UpdateCheckResult {
  currentVersion: string;
  latestVersion: string;
  updateAvailable: boolean;
}

export interface UpdateCheckDeps {
  fetch: typeof fetch;
}

const DEFAULT_UPDATE_CHECK_DEPS: UpdateCheckDeps = {
  fetch: (input, init) => fetch(input, init),
};

function parseVersion(value: string): [number, number, number] {
  const match = VERSION_PATTERN.exec(value.trim());
  if (!match) {
    throw new Error(`Unrecognized version "${value}"`);
  }
  return [Number(match[1]), Number(match[2]), Number(match[3])];
}

/** Compares `major.minor.patch`; pre-release and build tags are ignored. */
export function compareVersions(left: string, right: string): number {
  const leftParts = parseVersion(left);
  const rightParts = parseVersion(right);
  for (let index = 0; index < leftParts.length; index += 1) {
    const delta = leftParts[index] - rightParts[index];
    if (delta !== 0) {
      return Math.sign(delta);
    }
  }
  return 0;
}

export function latestVersionUrl(
  registryUrl: string,
  packageName: string,
): string {
  const base = registryUrl.endsWith("/") ? registryUrl : `${registryUrl}/`;
  return new URL(`${packageName}/latest`, base).href;
}

/**
 * Asks the package registry for the latest published version. The request
 * is made once; any failure surfaces as UpdateCheckError.
 */
export async function checkForUpdate(
  options: UpdateCheckOptions,
  depsOverride: Partial<UpdateCheckDeps> = {},
): Promise<UpdateCheckResult> {
  const deps: UpdateCheckDeps = {
    ...DEFAULT_UPDATE_CHECK_DEPS,
    ...depsOverride,
  };
  const url = latestVersionUrl(options.registryUrl, options.packageName);

  try {
    const response = await deps.fetch(url, {
      headers: { accept: "application/json" },
    });
    if (!response.ok) {
      throw new Error(`GET ${url} returned HTTP ${response.status}`);
    }
    const latest = LatestReleaseSchema.parse(await response.json());
    return {
      currentVersion: options.currentVersion,
      latestVersion: latest.version,
      updateAvailable:
        compareVersions(latest.version, options.currentVersion) > 0,
    };
  } catch (error) {
    throw new UpdateCheckError(error);
  }
}
