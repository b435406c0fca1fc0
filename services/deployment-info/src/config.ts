import { existsSync, readFileSync } from "node:fs";
import path from "node:path";
import { parse } from "yaml";
import { z } from "zod";
import {
  DeploymentInfoError,
  formatErrorMessage,
  SettingsParseError,
} from "./errors.js";
import { DEFAULT_DEPLOYMENTS_DIR, DEFAULT_RECORD_FILE } from "./store.js";

export const DEFAULT_SETTINGS_FILE = "deployment-info.yaml";
export const DEFAULT_PACKAGE_NAME = "evm-deployment-info";
export const DEFAULT_REGISTRY_URL = "https://registry.npmjs.org";

const OutputFormatSchema = z.enum(["table", "json", "csv"]);

const UpdateSettingsSchema = z
  .object({
    /** npm package whose latest published version is compared to ours. */
    package_name: z.string().min(1).default(DEFAULT_PACKAGE_NAME),
    registry_url: z.string().url().default(DEFAULT_REGISTRY_URL),
  })
  .default({});

const SettingsSchema = z
  .object({
    hardhat_config: z.string().min(1).default("hardhat.config.ts"),
    /** Relative to the project root. */
    deployments_dir: z.string().min(1).default(DEFAULT_DEPLOYMENTS_DIR),
    record_file: z.string().min(1).default(DEFAULT_RECORD_FILE),
    /** `hardhat` is always excluded on top of these. */
    excluded_networks: z.array(z.string().min(1)).default([]),
    default_format: OutputFormatSchema.default("table"),
    aggregate: z.boolean().default(false),
    update: UpdateSettingsSchema,
  })
  .strict();

export type Settings = z.infer<typeof SettingsSchema>;

export interface LoadSettingsOptions {
  rootDir: string;
  /** Explicit settings file; must exist when given. */
  settingsPath?: string;
  env?: NodeJS.ProcessEnv;
}

export interface LoadedSettings {
  settings: Settings;
  /** Settings file that was read, if any. */
  source: string | null;
}

function readSettingsFile(filePath: string): unknown {
  let raw: string;
  try {
    raw = readFileSync(filePath, "utf8");
  } catch (error) {
    throw new DeploymentInfoError(
      `Failed reading settings at ${filePath}: ${formatErrorMessage(error)}`,
      { cause: error },
    );
  }
  try {
    // An empty YAML document parses to null; treat it as "all defaults".
    return parse(raw) ?? {};
  } catch (error) {
    throw new SettingsParseError(filePath, error);
  }
}

export function loadSettings(options: LoadSettingsOptions): LoadedSettings {
  const env = options.env ?? process.env;

  let source: string | null = null;
  let raw: unknown = {};
  if (options.settingsPath !== undefined) {
    source = path.resolve(options.settingsPath);
    if (!existsSync(source)) {
      throw new DeploymentInfoError(`Settings file not found at ${source}`);
    }
    raw = readSettingsFile(source);
  } else {
    const candidate = path.join(options.rootDir, DEFAULT_SETTINGS_FILE);
    if (existsSync(candidate)) {
      source = candidate;
      raw = readSettingsFile(candidate);
    }
  }

  const settings = SettingsSchema.parse(raw);
  const formatOverride = env.DEPLOYMENT_INFO_FORMAT?.trim();
  const deploymentsDirOverride = env.DEPLOYMENT_INFO_DEPLOYMENTS_DIR?.trim();
  const registryUrlOverride = env.DEPLOYMENT_INFO_REGISTRY_URL?.trim();

  return {
    source,
    settings: {
      ...settings,
      default_format: formatOverride
        ? OutputFormatSchema.parse(formatOverride)
        : settings.default_format,
      deployments_dir: deploymentsDirOverride || settings.deployments_dir,
      update: {
        ...settings.update,
        registry_url: registryUrlOverride
          ? z.string().url().parse(registryUrlOverride)
          : settings.update.registry_url,
      },
    },
  };
}
