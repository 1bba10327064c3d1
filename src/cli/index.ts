#!/usr/bin/env node
import { Command } from "commander";
import { buildIndexCommand } from "./commands/buildIndex";
import { lookupCommand } from "./commands/lookup";
import { searchCommand } from "./commands/search";
import { statsCommand } from "./commands/stats";
import { validateCommand } from "./commands/validate";
import { writeStderr } from "./utils/terminal";

const program = new Command();

program
  .name("aligned-retrieval")
  .description("Index, search and validate aligned English/Italian text")
  .version("0.1.0");

program.addCommand(buildIndexCommand());
program.addCommand(searchCommand());
program.addCommand(validateCommand());
program.addCommand(lookupCommand());
program.addCommand(statsCommand());

program.parseAsync(process.argv).catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  writeStderr(message);
  process.exit(1);
});
