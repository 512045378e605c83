#!/usr/bin/env -S npx tsx

import color from "picocolors";
import { backupCommand } from "./cli/commands/backup";
import { ui, VERSION } from "./cli/ui";

function printVersion(): void {
  ui.intro(`dbshelf ${color.dim(`v${VERSION}`)}`);
  ui.outro(`Run ${color.cyan("dbshelf --help")} for usage`);
}

async function main(): Promise<number> {
  const args = process.argv.slice(2);

  if (args.includes("--version")) {
    printVersion();
    return 0;
  }

  return backupCommand(args);
}

main()
  .then((code) => process.exit(code))
  .catch((error) => {
    console.error(`${color.red("Fatal error:")}`, error);
    process.exit(1);
  });
