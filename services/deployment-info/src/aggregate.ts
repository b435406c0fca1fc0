import { compareNames } from "./reconcile.js";

export const MAINNET_SUFFIX = "Mainnet";

export interface NetworkNameParts {
  prefix: string;
  suffix: string;
}

export interface AggregationMember<T> {
  suffix: string;
  name: string;
  value: T;
}

export interface AggregationGroup<T> {
  prefix: string;
  members: AggregationMember<T>[];
}

/**
 * Splits a camelCase network name at its first uppercase letter after the
 * first character. Names without one are the ecosystem's mainnet.
 */
export function splitNetworkName(name: string): NetworkNameParts {
  const boundary = name.slice(1).search(/[A-Z]/);
  if (boundary === -1) {
    return { prefix: name, suffix: MAINNET_SUFFIX };
  }
  return {
    prefix: name.slice(0, boundary + 1),
    suffix: name.slice(boundary + 1),
  };
}

function compareSuffixes(left: string, right: string): number {
  if (left === right) {
    return 0;
  }
  if (left === MAINNET_SUFFIX) {
    return -1;
  }
  if (right === MAINNET_SUFFIX) {
    return 1;
  }
  return compareNames(left, right);
}

export function aggregateEntries<T>(
  entries: Iterable<{ name: string; value: T }>,
): AggregationGroup<T>[] {
  const groups = new Map<string, AggregationMember<T>[]>();
  for (const entry of entries) {
    const { prefix, suffix } = splitNetworkName(entry.name);
    const members = groups.get(prefix) ?? [];
    members.push({ suffix, name: entry.name, value: entry.value });
    groups.set(prefix, members);
  }

  return [...groups.keys()].sort(compareNames).map((prefix) => ({
    prefix,
    members: (groups.get(prefix) ?? []).sort((left, right) =>
      compareSuffixes(left.suffix, right.suffix),
    ),
  }));
}

/** `arbitrumSepolia` -> `Arbitrum Sepolia`, display only. */
export function toTitleCase(token: string): string {
  return token
    .replace(/([a-z0-9])([A-Z])/g, "$1 $2")
    .split(" ")
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(" ");
}
