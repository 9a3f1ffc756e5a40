import assert from "node:assert/strict";
import test from "node:test";

import { loadEnvConfig } from "./config.js";

test("loadEnvConfig reads and coerces PAGEVIEWS_ variables", () => {
  const config = loadEnvConfig({
    PAGEVIEWS_API_BASE: "http://localhost:9000/pageviews",
    PAGEVIEWS_USER_AGENT: "pageviews-tests/1.0",
    PAGEVIEWS_PARALLELISM: "8",
    PAGEVIEWS_TIMEOUT_MS: "30000",
    HOME: "/home/test"
  });

  assert.deepEqual(config, {
    apiBase: "http://localhost:9000/pageviews",
    userAgent: "pageviews-tests/1.0",
    parallelism: 8,
    callTimeoutMs: 30000
  });
});

test("loadEnvConfig treats missing and empty variables as unset", () => {
  assert.deepEqual(loadEnvConfig({ PAGEVIEWS_PARALLELISM: "" }), {
    apiBase: undefined,
    userAgent: undefined,
    parallelism: undefined,
    callTimeoutMs: undefined
  });
});

test("loadEnvConfig rejects values that are not positive integers", () => {
  assert.throws(
    () => loadEnvConfig({ PAGEVIEWS_PARALLELISM: "zero" }),
    /^Error: Invalid environment: PAGEVIEWS_PARALLELISM: /
  );
});

test("loadEnvConfig rejects a timeout longer than a timer can hold", () => {
  assert.throws(
    () => loadEnvConfig({ PAGEVIEWS_TIMEOUT_MS: "3000000000" }),
    /^Error: Invalid environment: PAGEVIEWS_TIMEOUT_MS: /
  );
});
