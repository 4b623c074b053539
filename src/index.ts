#!/usr/bin/env node
/**
 * recdump CLI Entry Point
 */

import { HELP, parseArgs, run, type CLIOptions } from "./cli.js";

function parseOrExit(): CLIOptions {
  try {
    return parseArgs(process.argv.slice(2));
  } catch (err) {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    console.error("Use --help for more information.");
    process.exit(1);
  }
}

async function main(): Promise<void> {
  const options = parseOrExit();

  if (options.help) {
    console.log(HELP);
    return;
  }

  try {
    process.stdout.write(await run(options));
  } catch (err) {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  }
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
