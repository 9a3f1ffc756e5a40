#!/usr/bin/env node

import { printCommandError } from "./cli-output.js";
import { isJsonModeArgv, runPageviewsCli } from "./cli/pageviews-command.js";

const argv = process.argv.slice(2);

void runPageviewsCli(argv).catch((error: unknown) => {
  printCommandError(argv[0] ?? "pageviews", error, isJsonModeArgv(argv));
  process.exitCode = 1;
});
