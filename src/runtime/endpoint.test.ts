import { describe, test } from "node:test";
import assert from "node:assert";
import { mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { pathToFileURL } from "node:url";

import {
  buildUserAgent,
  createRuntimeEndpoint,
  readPackageVersion,
} from "./endpoint.js";

describe("createRuntimeEndpoint", () => {
  const endpoint = createRuntimeEndpoint("127.0.0.1:9001");

  test("composes the next-event url", () => {
    assert.strictEqual(
      endpoint.nextUrl,
      "http://127.0.0.1:9001/2018-06-01/runtime/invocation/next",
    );
  });

  test("composes response and error urls per request id", () => {
    assert.strictEqual(
      endpoint.responseUrl("abc123"),
      "http://127.0.0.1:9001/2018-06-01/runtime/invocation/abc123/response",
    );
    assert.strictEqual(
      endpoint.errorUrl("abc123"),
      "http://127.0.0.1:9001/2018-06-01/runtime/invocation/abc123/error",
    );
  });

  test("encodes request ids", () => {
    assert.strictEqual(
      endpoint.responseUrl("a/b c"),
      "http://127.0.0.1:9001/2018-06-01/runtime/invocation/a%2Fb%20c/response",
    );
  });

  test("is frozen", () => {
    assert.ok(Object.isFrozen(endpoint));
  });
});

describe("buildUserAgent", () => {
  test("joins product, platform version and adapter version", () => {
    assert.strictEqual(
      buildUserAgent("v20.11.1", "0.3.0"),
      "function-runtime/v20.11.1-0.3.0",
    );
  });

  test("uses this package's version by default", () => {
    assert.strictEqual(
      buildUserAgent("v20.0.0"),
      `function-runtime/v20.0.0-${readPackageVersion()}`,
    );
  });
});

describe("readPackageVersion", () => {
  test("reads the version field", () => {
    const dir = mkdtempSync(join(tmpdir(), "fn-runtime-"));
    const file = join(dir, "package.json");
    writeFileSync(file, JSON.stringify({ name: "x", version: "1.2.3" }));

    assert.strictEqual(readPackageVersion(pathToFileURL(file)), "1.2.3");
  });

  test("falls back when the file is missing or has no version", () => {
    const dir = mkdtempSync(join(tmpdir(), "fn-runtime-"));
    const file = join(dir, "package.json");
    writeFileSync(file, JSON.stringify({ name: "x" }));

    assert.strictEqual(readPackageVersion(pathToFileURL(file)), "UNKNOWN-VERSION");
    assert.strictEqual(
      readPackageVersion(pathToFileURL(join(dir, "missing.json"))),
      "UNKNOWN-VERSION",
    );
  });
});
