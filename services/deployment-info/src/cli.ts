import path from "node:path";
import { ZodError } from "zod";
import { type ChainNameLookup, knownChainName } from "./chains.js";
import { loadSettings, type Settings } from "./config.js";
import { CliError, DeploymentInfoError } from "./errors.js";
import { extractNetworks, loadHardhatConfig } from "./hardhat-config.js";
import {
  type ReconciliationResult,
  reconcileDeployments,
} from "./reconcile.js";
import {
  OUTPUT_FORMATS,
  type OutputFormat,
  renderAudit,
  renderListing,
  writeOutput,
} from "./render.js";
import { createDeploymentStore, type DeploymentStore } from "./store.js";
import { checkForUpdate } from "./update.js";

export const CLI_NAME = "deployment-info";

type CommandName = "list" | "audit" | "count" | "update";

const COMMANDS = new Set<CommandName>(["list", "audit", "count", "update"]);

type CliArgs = {
  rootDir: string;
  settingsPath: string | null;
  command: CommandName | null;
  format: OutputFormat | null;
  aggregate: boolean | null;
  outputPath: string | null;
};

type CliParseResult =
  | {
      kind: "help";
    }
  | {
      kind: "version";
    }
  | {
      kind: "args";
      args: CliArgs;
    };

export interface CliContext {
  /** Version of the running tool, compared against the registry by `update`. */
  version: string;
  logger?: Pick<Console, "log" | "warn" | "error">;
  env?: NodeJS.ProcessEnv;
  fetch?: typeof fetch;
  chainName?: ChainNameLookup;
}

interface ProjectContext {
  settings: Settings;
  store: DeploymentStore;
  configSource: string;
}

export function usage(): string {
  return [
    "Usage:",
    `  ${CLI_NAME} [--root <dir>] [--config <settings.yaml>] <command> [options]`,
    "",
    "Commands:",
    "  list     List deployed addresses for every configured network",
    "  audit    Show networks without deployments and deployments without networks",
    "  count    Count chain deployment directories",
    "  update   Check the package registry for a newer release",
    "",
    "Options:",
    "  -r, --root <dir>           Hardhat project root (default: .)",
    "  -c, --config <path.yaml>   Settings file (default: <root>/deployment-info.yaml when present)",
    "  -f, --format <table|json|csv>",
    "                             Output format for list and audit (default: table)",
    "  -a, --aggregate            Group list output by network ecosystem",
    "  -o, --output <path>        Write list or audit output to a file",
    "  -h, --help                 Show this help",
    "  -V, --version              Show the installed version",
    "",
    "Environment fallbacks:",
    "  DEPLOYMENT_INFO_FORMAT",
    "  DEPLOYMENT_INFO_DEPLOYMENTS_DIR",
    "  DEPLOYMENT_INFO_REGISTRY_URL",
  ].join("\n");
}

function nextArg(argv: string[], index: number, flag: string): string {
  const value = argv[index + 1];
  if (!value || value.startsWith("-")) {
    throw new CliError(`Missing value for ${flag}`);
  }
  return value;
}

function parseOutputFormat(value: string, fieldName: string): OutputFormat {
  const format = OUTPUT_FORMATS.find((candidate) => candidate === value);
  if (!format) {
    throw new CliError(
      `Invalid ${fieldName}: expected one of ${OUTPUT_FORMATS.join(", ")}`,
    );
  }
  return format;
}

function parseCommand(value: string): CommandName {
  for (const command of COMMANDS) {
    if (command === value) {
      return command;
    }
  }
  throw new CliError(`Unknown command: ${value}`);
}

export function parseCliArgs(argv: string[]): CliParseResult {
  const args: CliArgs = {
    rootDir: ".",
    settingsPath: null,
    command: null,
    format: null,
    aggregate: null,
    outputPath: null,
  };

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    switch (arg) {
      case "-h":
      case "--help":
        return { kind: "help" };
      case "-V":
      case "--version":
        return { kind: "version" };
      case "-r":
      case "--root":
        args.rootDir = nextArg(argv, i, arg);
        i += 1;
        break;
      case "-c":
      case "--config":
        args.settingsPath = nextArg(argv, i, arg);
        i += 1;
        break;
      case "-f":
      case "--format":
        args.format = parseOutputFormat(nextArg(argv, i, arg), arg);
        i += 1;
        break;
      case "-a":
      case "--aggregate":
        args.aggregate = true;
        break;
      case "-o":
      case "--output":
        args.outputPath = nextArg(argv, i, arg);
        i += 1;
        break;
      default:
        if (arg.startsWith("-")) {
          throw new CliError(`Unknown argument: ${arg}`);
        }
        if (args.command !== null) {
          throw new CliError(`Unexpected argument: ${arg}`);
        }
        args.command = parseCommand(arg);
    }
  }

  if (args.aggregate !== null && args.command !== "list") {
    throw new CliError("--aggregate only applies to the list command");
  }
  if (
    (args.format !== null || args.outputPath !== null) &&
    args.command !== "list" &&
    args.command !== "audit"
  ) {
    throw new CliError(
      "--format and --output only apply to the list and audit commands",
    );
  }

  return { kind: "args", args };
}

function openProject(args: CliArgs, env: NodeJS.ProcessEnv): ProjectContext {
  const { settings } = loadSettings({
    rootDir: args.rootDir,
    settingsPath: args.settingsPath ?? undefined,
    env,
  });
  const { source } = loadHardhatConfig(args.rootDir, settings.hardhat_config);
  const store = createDeploymentStore({
    rootDir: path.resolve(args.rootDir, settings.deployments_dir),
    recordFile: settings.record_file,
  });
  return { settings, store, configSource: source };
}

function reconcileProject(
  project: ProjectContext,
  logger: Pick<Console, "warn">,
): ReconciliationResult {
  return reconcileDeployments({
    networks: extractNetworks(project.configSource),
    store: project.store,
    excludedNetworks: project.settings.excluded_networks,
    logger,
  });
}

function formatFailure(error: unknown): string | null {
  if (error instanceof ZodError) {
    const issues = error.issues.map(
      (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`,
    );
    return `Invalid settings: ${issues.join("; ")}`;
  }
  if (error instanceof DeploymentInfoError) {
    return error.message;
  }
  return null;
}

async function runUpdate(
  args: CliArgs,
  context: CliContext,
  logger: Pick<Console, "log">,
  env: NodeJS.ProcessEnv,
): Promise<void> {
  const { settings } = loadSettings({
    rootDir: args.rootDir,
    settingsPath: args.settingsPath ?? undefined,
    env,
  });
  const result = await checkForUpdate(
    {
      packageName: settings.update.package_name,
      currentVersion: context.version,
      registryUrl: settings.update.registry_url,
    },
    context.fetch ? { fetch: context.fetch } : {},
  );

  if (!result.updateAvailable) {
    logger.log(`${CLI_NAME} ${result.currentVersion} is up to date`);
    return;
  }
  logger.log(
    `Update available: ${result.currentVersion} -> ${result.latestVersion}`,
  );
  logger.log(
    `Install it with: npm install -g ${settings.update.package_name}@${result.latestVersion}`,
  );
}

async function runCommand(
  args: CliArgs,
  context: CliContext,
  logger: Pick<Console, "log" | "warn">,
  env: NodeJS.ProcessEnv,
): Promise<void> {
  if (args.command === "update") {
    await runUpdate(args, context, logger, env);
    return;
  }

  const project = openProject(args, env);
  const outputPath = args.outputPath ?? undefined;

  switch (args.command) {
    case null:
      logger.log("No command provided. Use --help to see available commands.");
      return;
    case "count":
      logger.log(`Found ${project.store.countDeployments()} deployment(s)`);
      return;
    case "list": {
      const result = reconcileProject(project, logger);
      const content = renderListing(result, {
        format: args.format ?? project.settings.default_format,
        aggregate: args.aggregate ?? project.settings.aggregate,
        logger,
      });
      writeOutput(content, { outputPath, logger });
      return;
    }
    case "audit": {
      const result = reconcileProject(project, logger);
      const content = renderAudit(result, {
        format: args.format ?? project.settings.default_format,
        chainName: context.chainName ?? knownChainName,
      });
      writeOutput(content, { outputPath, logger });
      return;
    }
  }
}

/**
 * Runs one CLI invocation and returns its exit code. Errors never escape:
 * they are reported through the logger and mapped to exit code 1.
 */
export async function run(
  argv: string[],
  context: CliContext,
): Promise<number> {
  const logger = context.logger ?? console;
  const env = context.env ?? process.env;

  try {
    const parseResult = parseCliArgs(argv);
    if (parseResult.kind === "help") {
      logger.log(usage());
      return 0;
    }
    if (parseResult.kind === "version") {
      logger.log(context.version);
      return 0;
    }
    await runCommand(parseResult.args, context, logger, env);
    return 0;
  } catch (error) {
    if (error instanceof CliError) {
      logger.error(`Error: ${error.message}`);
      logger.error("");
      logger.error(usage());
      return 1;
    }
    const message = formatFailure(error);
    if (message !== null) {
      logger.error(`Error: ${message}`);
    } else {
      logger.error("Unexpected error:", error);
    }
    return 1;
  }
}
