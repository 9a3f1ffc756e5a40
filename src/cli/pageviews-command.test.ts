import assert from "node:assert/strict";
import test from "node:test";

import { InvalidArgumentError } from "../pageviews/errors.js";
import { createStubUpstream, notFound, seriesBody, type StubUpstream } from "../pageviews/testing/stub-upstream.js";
import { isJsonModeArgv, runPageviewsCli, type PageviewsCliContext } from "./pageviews-command.js";

const API_BASE = "http://upstream.test/pageviews";

function contextFor(stub: StubUpstream, env: NodeJS.ProcessEnv = {}): { context: PageviewsCliContext; output: () => string } {
  const written: string[] = [];

  return {
    context: {
      fetch: stub.fetch,
      env: { PAGEVIEWS_API_BASE: API_BASE, ...env },
      stdout: (text) => {
        written.push(text);
      }
    },
    output: () => written.join("")
  };
}

test("isJsonModeArgv looks for the json flag anywhere", () => {
  assert.equal(isJsonModeArgv(["articles", "en.wikipedia", "Cat", "--json"]), true);
  assert.equal(isJsonModeArgv(["articles", "en.wikipedia", "Cat"]), false);
});

test("runPageviewsCli rejects unknown commands", async () => {
  await assert.rejects(runPageviewsCli(["bogus"]), {
    message: "Unknown command 'bogus'. Supported commands: articles, projects, top"
  });
});

test("articles --json --table prints totals and the per-day table", async () => {
  const stub = createStubUpstream((url) =>
    url.includes("/Selfie/") ? { body: seriesBody([["2024010100", 600], ["2024010200", 400]]) } : notFound()
  );
  const { context, output } = contextFor(stub);

  await runPageviewsCli(
    ["articles", "en.wikipedia", "Selfie", "Dog", "--start", "20240101", "--end", "20240102", "--json", "--table"],
    context
  );

  assert.deepEqual(JSON.parse(output()), {
    mode: "articles",
    ok: true,
    project: "en.wikipedia",
    range: {
      start: "2024-01-01T00:00:00.000Z",
      end: "2024-01-02T00:00:00.000Z",
      granularity: "daily"
    },
    counts: { ok: 1, notFound: 1, failed: 0 },
    requestCount: 2,
    results: {
      Selfie: { status: "ok", views: 1000 },
      Dog: { status: "not_found", views: null }
    },
    table: [
      { timestamp: "2024-01-01", Selfie: 600, Dog: null },
      { timestamp: "2024-01-02", Selfie: 400, Dog: null }
    ]
  });
  assert.deepEqual(stub.urls(), [
    `${API_BASE}/per-article/en.wikipedia/all-access/all-agents/Selfie/daily/2024010100/2024010200`,
    `${API_BASE}/per-article/en.wikipedia/all-access/all-agents/Dog/daily/2024010100/2024010200`
  ]);
});

test("top --json --limit keeps the highest ranked articles", async () => {
  const stub = createStubUpstream(() => ({
    body: {
      items: [
        {
          project: "en.wikipedia",
          access: "all-access",
          year: "2024",
          month: "03",
          day: "01",
          articles: [
            { article: "Main_Page", views: 9000, rank: 1 },
            { article: "Cat", views: 500, rank: 2 },
            { article: "Bee", views: 500, rank: 3 }
          ]
        }
      ]
    }
  }));
  const { context, output } = contextFor(stub);

  await runPageviewsCli(
    ["top", "en.wikipedia", "--year", "2024", "--month", "3", "--day", "1", "--limit", "2", "--json"],
    context
  );

  assert.deepEqual(JSON.parse(output()), {
    mode: "top",
    ok: true,
    project: "en.wikipedia",
    articles: [
      { article: "Main_Page", rank: 1, views: 9000 },
      { article: "Bee", rank: 3, views: 500 }
    ]
  });
  assert.deepEqual(stub.urls(), [`${API_BASE}/top/en.wikipedia/all-access/2024/03/01`]);
});

test("projects prints a summary and lets flags win over the environment", async () => {
  const stub = createStubUpstream((url) => ({
    delayMs: 20,
    body: seriesBody([["2024010100", url.includes("/ro.wikipedia/") ? 70 : 900]])
  }));
  const { context, output } = contextFor(stub, { PAGEVIEWS_PARALLELISM: "1" });

  await runPageviewsCli(
    ["projects", "ro.wikipedia", "de.wikipedia", "--start", "20240101", "--end", "20240101", "--parallelism", "2"],
    context
  );

  assert.equal(stub.peakInFlight(), 2);
  assert.equal(
    output(),
    [
      "",
      "=== Project views (2024-01-01 to 2024-01-01, daily) ===",
      "ro.wikipedia: 70",
      "de.wikipedia: 900",
      "",
      "Found: 2, not found: 0, failed: 0",
      "Wikimedia requests: 2",
      ""
    ].join("\n")
  );
});

test("a rejected argument fails the command before any request", async () => {
  const stub = createStubUpstream(() => ({ body: {} }));
  const { context, output } = contextFor(stub);
  const previousExitCode = process.exitCode;

  try {
    await assert.rejects(runPageviewsCli(["top", "en.wikipedia", "--limit", "0", "--json"], context), InvalidArgumentError);
  } finally {
    process.exitCode = previousExitCode;
  }

  assert.equal(stub.calls.length, 0);
  assert.equal(output(), "");
});
