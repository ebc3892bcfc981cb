#!/usr/bin/env node
import "dotenv/config";
import { errorMessage } from "./errors.js";
import { runCli } from "./cli.js";

runCli(process.argv.slice(2)).catch((e: unknown) => {
  // eslint-disable-next-line no-console
  console.error(errorMessage(e));
  process.exit(1);
});
