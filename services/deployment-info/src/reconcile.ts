import { formatErrorMessage } from "./errors.js";
import type { DeploymentStore } from "./store.js";

export const ALWAYS_EXCLUDED_NETWORK = "hardhat";

export interface FoundDeployment {
  name: string;
  address: string;
}

export interface ReconciliationResult {
  found: FoundDeployment[];
  missing: string[];
  orphaned: number[];
  /** Networks that took part in reconciliation, exclusions removed. */
  networks: ReadonlyMap<string, number>;
}

export interface ReconcileDeploymentsOptions {
  networks: ReadonlyMap<string, number>;
  store: Pick<DeploymentStore, "lookup" | "listChainIds">;
  excludedNetworks?: Iterable<string>;
  logger?: Pick<Console, "warn">;
}

export function compareNames(left: string, right: string): number {
  if (left < right) {
    return -1;
  }
  return left > right ? 1 : 0;
}

/**
 * Cross-references config networks with deployment records by chain id.
 *
 * A failing record read only demotes that network to `missing`; failing to
 * enumerate the store itself propagates.
 */
export function reconcileDeployments(
  options: ReconcileDeploymentsOptions,
): ReconciliationResult {
  const logger = options.logger ?? console;
  const excluded = new Set(options.excludedNetworks ?? []);
  excluded.add(ALWAYS_EXCLUDED_NETWORK);

  const networks = new Map<string, number>();
  for (const [name, chainId] of options.networks) {
    if (!excluded.has(name)) {
      networks.set(name, chainId);
    }
  }

  const found: FoundDeployment[] = [];
  const missing: string[] = [];
  for (const [name, chainId] of networks) {
    let address: string | null;
    try {
      address = options.store.lookup(chainId);
    } catch (error) {
      logger.warn(
        `Skipping deployment record for network=${name} chain_id=${chainId}: ${formatErrorMessage(error)}`,
      );
      address = null;
    }

    if (address === null) {
      missing.push(name);
    } else {
      found.push({ name, address });
    }
  }

  const declaredChainIds = new Set(options.networks.values());
  const orphaned = options.store
    .listChainIds()
    .filter((chainId) => !declaredChainIds.has(chainId))
    .sort((left, right) => left - right);

  return {
    found: found.sort((left, right) => compareNames(left.name, right.name)),
    missing: missing.sort(compareNames),
    orphaned,
    networks,
  };
}
