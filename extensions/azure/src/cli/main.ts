#!/usr/bin/env node
import { formatErrorMessage } from "../retry.js";
import { runCli } from "./program.js";
import { theme } from "./theme.js";

runCli(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(theme.error(formatErrorMessage(error)));
    process.exitCode = 1;
  },
);
