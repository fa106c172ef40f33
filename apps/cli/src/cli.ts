#!/usr/bin/env node
import { defaultCliDeps, runCli } from "./program.js";

async function main() {
  process.exitCode = await runCli(process.argv.slice(2), defaultCliDeps());
}

main().catch((err) => {
  console.error("[filesmith] Unexpected error:", err);
  process.exit(1);
});
