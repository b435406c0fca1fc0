import { mkdirSync, writeFileSync } from "node:fs";
import path from "node:path";
import {
  type AggregationGroup,
  aggregateEntries,
  toTitleCase,
} from "./aggregate.js";
import type { ChainNameLookup } from "./chains.js";
import { SinkWriteError } from "./errors.js";
import type { ReconciliationResult } from "./reconcile.js";

export type OutputFormat = "table" | "json" | "csv";

export const OUTPUT_FORMATS: readonly OutputFormat[] = ["table", "json", "csv"];

export interface ListingRenderOptions {
  format: OutputFormat;
  aggregate: boolean;
  /** Told about networks that aggregated JSON cannot keep apart. */
  logger?: Pick<Console, "warn">;
}

export interface AuditRenderOptions {
  format: OutputFormat;
  chainName?: ChainNameLookup;
}

type ListingInput = Pick<ReconciliationResult, "found" | "missing">;
type AuditInput = Pick<
  ReconciliationResult,
  "missing" | "orphaned" | "networks"
>;

interface AuditMissingEntry {
  network: string;
  chain_id: number;
}

interface FoundMember {
  name: string;
  address: string;
}

const INDENT = "  ";
const COLUMN_GAP = 2;

function escapeCsvField(value: string): string {
  if (!/[",\r\n]/.test(value)) {
    return value;
  }
  return `"${value.replaceAll('"', '""')}"`;
}

function csvLine(fields: readonly string[]): string {
  return fields.map(escapeCsvField).join(",");
}

function columnWidth(header: string, values: readonly string[]): number {
  return (
    Math.max(header.length, ...values.map((value) => value.length)) +
    COLUMN_GAP
  );
}

function groupLabel<T>(group: AggregationGroup<T>): string {
  return toTitleCase(group.prefix);
}

function memberLabel<T>(group: AggregationGroup<T>, suffix: string): string {
  return `${groupLabel(group)} ${toTitleCase(suffix)}`;
}

function aggregateFound(result: ListingInput): AggregationGroup<string>[] {
  return aggregateEntries(
    result.found.map((entry) => ({ name: entry.name, value: entry.address })),
  );
}

function aggregateMissing(result: ListingInput): AggregationGroup<null>[] {
  return aggregateEntries(
    result.missing.map((name) => ({ name, value: null })),
  );
}

function renderListingJson(
  result: ListingInput,
  aggregate: boolean,
  logger: Pick<Console, "warn">,
): string {
  const document: Record<string, unknown> = {};

  if (aggregate) {
    // Distinct names can share a label, e.g. `ethereum` and `ethereumMainnet`;
    // the later name in group order keeps the JSON key.
    const deployments = new Map<string, Map<string, FoundMember>>();
    for (const group of aggregateFound(result)) {
      const label = groupLabel(group);
      const members =
        deployments.get(label) ?? new Map<string, FoundMember>();
      for (const member of group.members) {
        const suffix = toTitleCase(member.suffix);
        const previous = members.get(suffix);
        if (previous !== undefined) {
          logger.warn(
            `Aggregated JSON entry ${label}/${suffix} from ${previous.name} replaced by ${member.name}`,
          );
        }
        members.set(suffix, { name: member.name, address: member.value });
      }
      deployments.set(label, members);
    }
    document.deployments = Object.fromEntries(
      [...deployments].map(([label, members]) => [
        label,
        Object.fromEntries(
          [...members].map(([suffix, member]) => [suffix, member.address]),
        ),
      ]),
    );

    if (result.missing.length > 0) {
      const missing = new Map<string, string[]>();
      for (const group of aggregateMissing(result)) {
        const label = groupLabel(group);
        const suffixes = missing.get(label) ?? [];
        suffixes.push(
          ...group.members.map((member) => toTitleCase(member.suffix)),
        );
        missing.set(label, suffixes);
      }
      document.missing = Object.fromEntries(missing);
    }
  } else {
    document.deployments = Object.fromEntries(
      result.found.map((entry) => [entry.name, entry.address]),
    );
    if (result.missing.length > 0) {
      document.missing = [...result.missing];
    }
  }

  return JSON.stringify(document);
}

function renderListingCsv(result: ListingInput, aggregate: boolean): string {
  const lines = [csvLine(["Network", "Address"])];

  if (aggregate) {
    for (const group of aggregateFound(result)) {
      for (const member of group.members) {
        lines.push(csvLine([memberLabel(group, member.suffix), member.value]));
      }
    }
  } else {
    for (const entry of result.found) {
      lines.push(csvLine([entry.name, entry.address]));
    }
  }

  if (result.missing.length > 0) {
    lines.push("", "Missing Networks");
    if (aggregate) {
      for (const group of aggregateMissing(result)) {
        for (const member of group.members) {
          lines.push(csvLine([memberLabel(group, member.suffix)]));
        }
      }
    } else {
      for (const name of result.missing) {
        lines.push(csvLine([name]));
      }
    }
  }

  return lines.join("\n");
}

function renderListingTable(result: ListingInput, aggregate: boolean): string {
  const lines = [`Deployments (${result.found.length}):`];

  if (result.found.length === 0) {
    lines.push(`${INDENT}(none)`);
  } else if (aggregate) {
    const groups = aggregateFound(result);
    const width = columnWidth(
      "",
      groups.flatMap((group) =>
        group.members.map((member) => toTitleCase(member.suffix)),
      ),
    );
    for (const group of groups) {
      lines.push(`${INDENT}${groupLabel(group)}`);
      for (const member of group.members) {
        lines.push(
          `${INDENT}${INDENT}${toTitleCase(member.suffix).padEnd(width)}${member.value}`,
        );
      }
    }
  } else {
    const width = columnWidth(
      "Network",
      result.found.map((entry) => entry.name),
    );
    lines.push(`${INDENT}${"Network".padEnd(width)}Address`);
    for (const entry of result.found) {
      lines.push(`${INDENT}${entry.name.padEnd(width)}${entry.address}`);
    }
  }

  if (result.missing.length > 0) {
    lines.push("", `Missing deployments (${result.missing.length}):`);
    if (aggregate) {
      for (const group of aggregateMissing(result)) {
        lines.push(`${INDENT}${groupLabel(group)}`);
        for (const member of group.members) {
          lines.push(`${INDENT}${INDENT}${toTitleCase(member.suffix)}`);
        }
      }
    } else {
      for (const name of result.missing) {
        lines.push(`${INDENT}${name}`);
      }
    }
  }

  return lines.join("\n");
}

export function renderListing(
  result: ListingInput,
  options: ListingRenderOptions,
): string {
  switch (options.format) {
    case "json":
      return renderListingJson(
        result,
        options.aggregate,
        options.logger ?? console,
      );
    case "csv":
      return renderListingCsv(result, options.aggregate);
    case "table":
      return renderListingTable(result, options.aggregate);
  }
}

function auditMissingEntries(result: AuditInput): AuditMissingEntry[] {
  const entries: AuditMissingEntry[] = [];
  for (const network of result.missing) {
    const chainId = result.networks.get(network);
    if (chainId !== undefined) {
      entries.push({ network, chain_id: chainId });
    }
  }
  return entries;
}

function renderAuditTable(
  result: AuditInput,
  chainName: ChainNameLookup | undefined,
): string {
  const missing = auditMissingEntries(result);
  const lines = [`Config without deployment (${missing.length}):`];

  if (missing.length === 0) {
    lines.push(`${INDENT}(none)`);
  } else {
    const width = columnWidth(
      "Network",
      missing.map((entry) => entry.network),
    );
    lines.push(`${INDENT}${"Network".padEnd(width)}Chain ID`);
    for (const entry of missing) {
      lines.push(`${INDENT}${entry.network.padEnd(width)}${entry.chain_id}`);
    }
  }

  lines.push("", `Deployment without config (${result.orphaned.length}):`);
  if (result.orphaned.length === 0) {
    lines.push(`${INDENT}(none)`);
  }
  for (const chainId of result.orphaned) {
    const name = chainName?.(chainId);
    lines.push(name ? `${INDENT}${chainId} (${name})` : `${INDENT}${chainId}`);
  }

  return lines.join("\n");
}

export function renderAudit(
  result: AuditInput,
  options: AuditRenderOptions,
): string {
  switch (options.format) {
    case "json":
      return JSON.stringify({
        config_without_deployment: auditMissingEntries(result),
        deployment_without_config: [...result.orphaned],
      });
    case "csv":
      return [
        "Config Without Deployment",
        csvLine(["Network", "Chain ID"]),
        ...auditMissingEntries(result).map((entry) =>
          csvLine([entry.network, String(entry.chain_id)]),
        ),
        "",
        "Deployment Without Config",
        csvLine(["Chain ID"]),
        ...result.orphaned.map(String),
      ].join("\n");
    case "table":
      return renderAuditTable(result, options.chainName);
  }
}

export interface WriteOutputOptions {
  outputPath?: string;
  logger?: Pick<Console, "log">;
}

/**
 * Prints rendered content, or writes it to `outputPath` creating parent
 * directories as needed.
 */
export function writeOutput(
  content: string,
  options: WriteOutputOptions = {},
): void {
  const logger = options.logger ?? console;
  if (options.outputPath === undefined) {
    logger.log(content);
    return;
  }

  const filePath = path.resolve(options.outputPath);
  try {
    mkdirSync(path.dirname(filePath), { recursive: true });
    writeFileSync(filePath, `${content}\n`, "utf8");
  } catch (error) {
    throw new SinkWriteError(filePath, error);
  }
  logger.log(`Wrote output to ${filePath}`);
}
