#!/usr/bin/env node
import { runCli } from "./cli/program.js";

runCli(process.argv.slice(2), { handleSignals: true })
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error(err);
    process.exit(1);
  });
