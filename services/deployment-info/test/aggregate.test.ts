import assert from "node:assert/strict";
import { describe, it } from "node:test";
import {
  aggregateEntries,
  splitNetworkName,
  toTitleCase,
} from "../src/aggregate.js";

describe("aggregate", () => {
  describe("splitNetworkName", () => {
    it("splits at the first internal uppercase letter", () => {
      assert.deepEqual(splitNetworkName("EthereumMainnet"), {
        prefix: "Ethereum",
        suffix: "Mainnet",
      });
      assert.deepEqual(splitNetworkName("arbitrumSepolia"), {
        prefix: "arbitrum",
        suffix: "Sepolia",
      });
    });

    it("uses the Mainnet suffix when there is no internal uppercase letter", () => {
      assert.deepEqual(splitNetworkName("Ethereum"), {
        prefix: "Ethereum",
        suffix: "Mainnet",
      });
      assert.deepEqual(splitNetworkName("base"), {
        prefix: "base",
        suffix: "Mainnet",
      });
    });

    it("keeps everything after the first boundary in the suffix", () => {
      assert.deepEqual(splitNetworkName("polygonZkEvmCardona"), {
        prefix: "polygon",
        suffix: "ZkEvmCardona",
      });
    });
  });

  describe("toTitleCase", () => {
    it("spaces and capitalizes camelCase words", () => {
      assert.equal(toTitleCase("arbitrumSepolia"), "Arbitrum Sepolia");
      assert.equal(toTitleCase("ZkEvmCardona"), "Zk Evm Cardona");
      assert.equal(toTitleCase("ethereum"), "Ethereum");
    });

    it("breaks after digits", () => {
      assert.equal(toTitleCase("base2Sepolia"), "Base2 Sepolia");
    });
  });

  describe("aggregateEntries", () => {
    it("orders prefixes and puts Mainnet first within a group", () => {
      const groups = aggregateEntries([
        { name: "ethereumSepolia", value: "0x2" },
        { name: "arbitrum", value: "0x3" },
        { name: "ethereumHolesky", value: "0x4" },
        { name: "ethereum", value: "0x1" },
      ]);

      assert.deepEqual(groups, [
        {
          prefix: "arbitrum",
          members: [{ suffix: "Mainnet", name: "arbitrum", value: "0x3" }],
        },
        {
          prefix: "ethereum",
          members: [
            { suffix: "Mainnet", name: "ethereum", value: "0x1" },
            { suffix: "Holesky", name: "ethereumHolesky", value: "0x4" },
            { suffix: "Sepolia", name: "ethereumSepolia", value: "0x2" },
          ],
        },
      ]);
    });

    it("groups explicit and implicit mainnet names under the same prefix", () => {
      const groups = aggregateEntries([
        { name: "arbitrumOne", value: null },
        { name: "Ethereum", value: null },
        { name: "EthereumMainnet", value: null },
      ]);

      assert.deepEqual(
        groups.map((group) => group.prefix),
        ["Ethereum", "arbitrum"],
      );
      assert.deepEqual(
        groups[0].members.map((member) => member.name),
        ["Ethereum", "EthereumMainnet"],
      );
    });

    it("returns no groups for no entries", () => {
      assert.deepEqual(aggregateEntries([]), []);
    });
  });
});
