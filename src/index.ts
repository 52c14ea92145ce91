#!/usr/bin/env node

import * as p from "@clack/prompts";
import color from "picocolors";
import { backupCommand } from "./cli/commands/backup";
import { LOGO, VERSION } from "./cli/ui";

function printHelp(): void {
  console.log(color.bold(color.cyan(LOGO)));
  p.intro(`${color.cyan("Stowaway")} ${color.dim(`v${VERSION}`)} - Versioned backups of docker-compose services`);

  p.note(`${color.cyan("backup")}      Back up bind mounts, volumes and databases`, "Commands");

  p.note(
    `-h, --help      Show this help message
-V, --version   Show version`,
    "Options",
  );

  p.note(
    `stowaway backup ./backup scheme.yaml              ${color.dim("# Back up using ./docker-compose.yaml")}
stowaway backup ./backup scheme.yaml -r ./app     ${color.dim("# Compose file under ./app")}
stowaway backup ./backup scheme.yaml -n 3         ${color.dim("# Keep three versions per target")}`,
    "Examples",
  );

  p.outro(`Run ${color.cyan("stowaway <command> --help")} for command details`);
}

function printVersion(): void {
  console.log(`stowaway v${VERSION}`);
}

type Command = (args: string[]) => Promise<number>;

const COMMANDS: Record<string, Command> = {
  backup: backupCommand,
};

async function main(): Promise<number> {
  const [command, ...commandArgs] = process.argv.slice(2);

  if (command === undefined || ["-h", "--help", "help"].includes(command)) {
    printHelp();
    return 0;
  }

  if (["-V", "--version", "version"].includes(command)) {
    printVersion();
    return 0;
  }

  const run = COMMANDS[command];
  if (!run) {
    console.error(`${color.red("Error:")} Unknown command: ${command}`);
    console.error(`Run ${color.cyan("stowaway --help")} for usage information.`);
    return 1;
  }

  return run(commandArgs);
}

main()
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    console.error(`${color.red("Fatal error:")}`, error);
    process.exit(1);
  });
