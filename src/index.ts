#!/usr/bin/env node

import color from "picocolors";
import { migrateCommand, printHelp } from "./cli/commands/migrate";
import { PROGRAM, VERSION } from "./cli/ui";

function printVersion(): void {
  console.log(`${PROGRAM} v${VERSION}`);
}

async function main(): Promise<number> {
  const args = process.argv.slice(2);

  if (args.length === 0) {
    printHelp();
    return 1;
  }

  switch (args[0]) {
    case "-h":
    case "--help":
    case "help":
      printHelp();
      return 0;

    case "-v":
    case "--version":
    case "version":
      printVersion();
      return 0;

    default:
      return migrateCommand(args);
  }
}

main()
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    console.error(`${color.red("Fatal error:")}`, error);
    process.exit(1);
  });
