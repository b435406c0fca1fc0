import * as knownChains from "viem/chains";

export type ChainNameLookup = (chainId: number) => string | undefined;

function isNamedChain(value: unknown): value is { id: number; name: string } {
  return (
    typeof value === "object" &&
    value !== null &&
    "id" in value &&
    typeof value.id === "number" &&
    "name" in value &&
    typeof value.name === "string"
  );
}

let chainNames: Map<number, string> | undefined;

function buildChainNames(): Map<number, string> {
  const names = new Map<number, string>();
  const candidates: unknown[] = Object.values(knownChains);
  for (const candidate of candidates) {
    if (isNamedChain(candidate) && !names.has(candidate.id)) {
      names.set(candidate.id, candidate.name);
    }
  }
  return names;
}

/** Chain name from viem's chain registry, if viem knows the id. */
export const knownChainName: ChainNameLookup = (chainId) => {
  chainNames ??= buildChainNames();
  return chainNames.get(chainId);
};
