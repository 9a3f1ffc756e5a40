import assert from "node:assert/strict";
import test from "node:test";

import { formatCommandError, printJson, toErrorMessage } from "./cli-output.js";

test("toErrorMessage accepts errors and other thrown values", () => {
  assert.equal(toErrorMessage(new Error("boom")), "boom");
  assert.equal(toErrorMessage("plain"), "plain");
});

test("formatCommandError wraps the message for JSON mode", () => {
  assert.equal(formatCommandError("top", new Error("boom"), false), "boom");
  assert.deepEqual(JSON.parse(formatCommandError("top", new Error("boom"), true)), {
    mode: "top",
    ok: false,
    error: { message: "boom" }
  });
});

test("printJson writes indented JSON and a newline", () => {
  const written: string[] = [];

  printJson({ mode: "top", ok: true }, (text) => written.push(text));

  assert.deepEqual(written, ['{\n  "mode": "top",\n  "ok": true\n}\n']);
});
