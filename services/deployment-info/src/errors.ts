function formatCause(cause: unknown): string {
  if (cause instanceof Error && cause.message) {
    return cause.message;
  }

  return String(cause);
}

export class DeploymentInfoError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DeploymentInfoError";
  }
}

export class CliError extends DeploymentInfoError {
  constructor(message: string) {
    super(message);
    this.name = "CliError";
  }
}

export class ConfigNotFoundError extends DeploymentInfoError {
  readonly path: string;

  constructor(path: string) {
    super(`No hardhat config found at ${path}`);
    this.name = "ConfigNotFoundError";
    this.path = path;
  }
}

export class ConfigParseError extends DeploymentInfoError {
  readonly network: string;
  readonly rawValue: string;

  constructor(network: string, rawValue: string) {
    super(
      `Invalid chainId for network ${network}: expected an unsigned integer, got "${rawValue}"`,
    );
    this.name = "ConfigParseError";
    this.network = network;
    this.rawValue = rawValue;
  }
}

export class ConfigReadError extends DeploymentInfoError {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super(`Failed reading hardhat config at ${path}: ${formatCause(cause)}`, {
      cause,
    });
    this.name = "ConfigReadError";
    this.path = path;
  }
}

export class SettingsParseError extends DeploymentInfoError {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super(`Settings file is not valid YAML at ${path}: ${formatCause(cause)}`, {
      cause,
    });
    this.name = "SettingsParseError";
    this.path = path;
  }
}

export class StoreReadError extends DeploymentInfoError {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super(`Failed reading deployment store at ${path}: ${formatCause(cause)}`, {
      cause,
    });
    this.name = "StoreReadError";
    this.path = path;
  }
}

export class StoreParseError extends DeploymentInfoError {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super(`Deployment record is malformed at ${path}: ${formatCause(cause)}`, {
      cause,
    });
    this.name = "StoreParseError";
    this.path = path;
  }
}

export class SinkWriteError extends DeploymentInfoError {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super(`Failed writing output to ${path}: ${formatCause(cause)}`, { cause });
    this.name = "SinkWriteError";
    this.path = path;
  }
}

export class UpdateCheckError extends DeploymentInfoError {
  constructor(cause: unknown) {
    super(`Update check failed: ${formatCause(cause)}`, { cause });
    this.name = "UpdateCheckError";
  }
}

export function formatErrorMessage(error: unknown): string {
  return formatCause(error);
}
