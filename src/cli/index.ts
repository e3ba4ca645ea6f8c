#!/usr/bin/env tsx
import { Command } from "commander";
import { commands as scrapeCommands } from "./commands/scrape";
import { commands as viewCommands } from "./commands/view";
import { commands as runsCommands } from "./commands/runs";
import { commands as dbCommands } from "./commands/db";
import { commands as loginCommands } from "./commands/login";
import { logger } from "../core/logger";
import { errorCode, errorMessage } from "../core/errors";

const program = new Command();

program
  .name("timeline-harvester")
  .description("Incremental collector for X lists, profiles and threads")
  .version("0.1.0");

scrapeCommands(program);
viewCommands(program);
runsCommands(program);
dbCommands(program);
loginCommands(program);

program.parseAsync().catch((error: unknown) => {
  logger.error({ code: errorCode(error), error: errorMessage(error) }, "Command failed");
  process.exitCode = 1;
});
