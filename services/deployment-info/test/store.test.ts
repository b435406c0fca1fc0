import assert from "node:assert/strict";
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import path from "node:path";
import { describe, it } from "node:test";
import { StoreParseError, StoreReadError } from "../src/errors.js";
import { createDeploymentStore } from "../src/store.js";

const TOKEN = `0x${"1a".repeat(20)}`;
const VAULT = `0x${"2b".repeat(20)}`;

function makeTempStore() {
  const dir = mkdtempSync(path.join(tmpdir(), "deployment-info-store-"));
  const rootDir = path.join(dir, "ignition", "deployments");
  mkdirSync(rootDir, { recursive: true });
  return {
    rootDir,
    writeRecord(chainId: number, contents: string, fileName = "deployed_addresses.json") {
      const chainDir = path.join(rootDir, `chain-${chainId}`);
      mkdirSync(chainDir, { recursive: true });
      writeFileSync(path.join(chainDir, fileName), contents, "utf8");
    },
    cleanup: () => rmSync(dir, { recursive: true, force: true }),
  };
}

describe("deployment store", () => {
  it("returns the first address in record order", () => {
    const temp = makeTempStore();
    temp.writeRecord(
      137,
      JSON.stringify({ "TokenModule#Token": TOKEN, "VaultModule#Vault": VAULT }),
    );

    const store = createDeploymentStore({ rootDir: temp.rootDir });
    assert.equal(store.lookup(137), TOKEN);

    temp.cleanup();
  });

  it("orders integer-like labels ahead of the others", () => {
    const temp = makeTempStore();
    temp.writeRecord(10, '{"Mod#A":"0xaa","7":"0xbb"}');

    const store = createDeploymentStore({ rootDir: temp.rootDir });
    assert.equal(store.lookup(10), "0xbb");

    temp.cleanup();
  });

  it("skips values that are not addresses", () => {
    const temp = makeTempStore();
    temp.writeRecord(
      10,
      JSON.stringify({ note: "pending", empty: "0x", nested: { a: TOKEN }, vault: VAULT }),
    );

    const store = createDeploymentStore({ rootDir: temp.rootDir });
    assert.equal(store.lookup(10), VAULT);

    temp.cleanup();
  });

  it("returns null when the chain directory or record is absent", () => {
    const temp = makeTempStore();
    mkdirSync(path.join(temp.rootDir, "chain-5"));
    temp.writeRecord(8453, JSON.stringify({}));

    const store = createDeploymentStore({ rootDir: temp.rootDir });
    assert.equal(store.lookup(1), null);
    assert.equal(store.lookup(5), null);
    assert.equal(store.lookup(8453), null);

    temp.cleanup();
  });

  it("reads a custom record file name", () => {
    const temp = makeTempStore();
    temp.writeRecord(1, JSON.stringify({ token: TOKEN }), "addresses.json");

    const store = createDeploymentStore({
      rootDir: temp.rootDir,
      recordFile: "addresses.json",
    });
    assert.equal(store.recordPath(1), path.join(temp.rootDir, "chain-1", "addresses.json"));
    assert.equal(store.lookup(1), TOKEN);

    temp.cleanup();
  });

  it("throws StoreParseError for unreadable record structure", () => {
    const temp = makeTempStore();
    temp.writeRecord(1, "{bad-json");
    temp.writeRecord(2, JSON.stringify([TOKEN]));

    const store = createDeploymentStore({ rootDir: temp.rootDir });
    assert.throws(
      () => store.lookup(1),
      (error: unknown) =>
        error instanceof StoreParseError &&
        error.path === store.recordPath(1),
    );
    assert.throws(() => store.lookup(2), StoreParseError);

    temp.cleanup();
  });

  it("throws StoreReadError when the record cannot be read", () => {
    const temp = makeTempStore();
    mkdirSync(path.join(temp.rootDir, "chain-3", "deployed_addresses.json"), {
      recursive: true,
    });

    const store = createDeploymentStore({ rootDir: temp.rootDir });
    assert.throws(() => store.lookup(3), StoreReadError);

    temp.cleanup();
  });

  it("lists chain directories in ascending order", () => {
    const temp = makeTempStore();
    temp.writeRecord(80002, "{}");
    temp.writeRecord(137, "{}");
    temp.writeRecord(1, "{}");
    mkdirSync(path.join(temp.rootDir, "chain-abc"));
    mkdirSync(path.join(temp.rootDir, "scratch"));
    writeFileSync(path.join(temp.rootDir, "chain-42"), "not a directory", "utf8");

    const store = createDeploymentStore({ rootDir: temp.rootDir });
    assert.deepEqual(store.listChainIds(), [1, 137, 80002]);
    assert.equal(store.countDeployments(), 3);

    temp.cleanup();
  });

  it("treats a missing store root as empty", () => {
    const store = createDeploymentStore({
      rootDir: path.join(tmpdir(), "deployment-info-store-missing", "nope"),
    });
    assert.deepEqual(store.listChainIds(), []);
    assert.equal(store.countDeployments(), 0);
  });
});
