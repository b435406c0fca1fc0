import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { UpdateCheckError } from "../src/errors.js";
import {
  checkForUpdate,
  compareVersions,
  latestVersionUrl,
} from "../src/update.js";

const OPTIONS = {
  packageName: "evm-deployment-info",
  currentVersion: "0.1.0",
  registryUrl: "https://registry.npmjs.org",
};

function makeFetch(response: () => Response | Promise<Response>) {
  const urls: string[] = [];
  return {
    urls,
    fetch: async (input: string | URL | Request) => {
      urls.push(String(input));
      return response();
    },
  };
}

describe("update", () => {
  it("compares versions numerically", () => {
    assert.equal(compareVersions("0.2.0", "0.1.9"), 1);
    assert.equal(compareVersions("1.0.0", "1.0.0"), 0);
    assert.equal(compareVersions("v1.2.3", "1.10.0"), -1);
    assert.equal(compareVersions("1.2.3-beta.1", "1.2.3"), 0);
    assert.throws(() => compareVersions("latest", "1.0.0"), /Unrecognized version/);
  });

  it("builds the registry url for the latest version", () => {
    assert.equal(
      latestVersionUrl("https://registry.npmjs.org", "evm-deployment-info"),
      "https://registry.npmjs.org/evm-deployment-info/latest",
    );
    assert.equal(
      latestVersionUrl("http://127.0.0.1:4873/npm/", "evm-deployment-info"),
      "http://127.0.0.1:4873/npm/evm-deployment-info/latest",
    );
  });

  it("reports an available update after a single request", async () => {
    const fake = makeFetch(
      () => new Response(JSON.stringify({ name: "evm-deployment-info", version: "0.2.0" })),
    );
    const result = await checkForUpdate(OPTIONS, { fetch: fake.fetch });

    assert.deepEqual(result, {
      currentVersion: "0.1.0",
      latestVersion: "0.2.0",
      updateAvailable: true,
    });
    assert.deepEqual(fake.urls, [
      "https://registry.npmjs.org/evm-deployment-info/latest",
    ]);
  });

  it("reports up to date when the registry version is not newer", async () => {
    const fake = makeFetch(() => new Response(JSON.stringify({ version: "0.1.0" })));
    const result = await checkForUpdate(OPTIONS, { fetch: fake.fetch });
    assert.equal(result.updateAvailable, false);
  });

  it("wraps HTTP failures in UpdateCheckError", async () => {
    const fake = makeFetch(() => new Response("not found", { status: 404 }));
    await assert.rejects(
      () => checkForUpdate(OPTIONS, { fetch: fake.fetch }),
      (error: unknown) =>
        error instanceof UpdateCheckError &&
        error.message ===
          "Update check failed: GET https://registry.npmjs.org/evm-deployment-info/latest returned HTTP 404",
    );
  });

  it("wraps invalid payloads and network errors in UpdateCheckError", async () => {
    const invalid = makeFetch(() => new Response(JSON.stringify({ tag: "v1" })));
    await assert.rejects(
      () => checkForUpdate(OPTIONS, { fetch: invalid.fetch }),
      UpdateCheckError,
    );

    const cause = new Error("getaddrinfo ENOTFOUND registry.npmjs.org");
    const offline = makeFetch(() => Promise.reject(cause));
    await assert.rejects(
      () => checkForUpdate(OPTIONS, { fetch: offline.fetch }),
      (error: unknown) => error instanceof UpdateCheckError && error.cause === cause,
    );
    assert.equal(offline.urls.length, 1);
  });
});
