#!/usr/bin/env node
import { runCli } from "../cli/program.js";

async function run() {
  process.exitCode = await runCli(process.argv.slice(2));
}

run().catch((error) => {
  console.error(error);
  process.exitCode = 1;
});
