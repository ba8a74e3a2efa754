#!/usr/bin/env node
import { Command } from "commander";
import { commands as accountsCommands } from "./commands/accounts";
import { commands as authCommands } from "./commands/auth";
import { commands as groupsCommands } from "./commands/groups";
import { commands as postsCommands } from "./commands/posts";
import { commands as profilesCommands } from "./commands/profiles";
import { commands as analysisCommands } from "./commands/analysis";
import { commands as configCommands } from "./commands/config";
import { commands as dbCommands } from "./commands/db";

const program = new Command();

program
  .name("fin-profiler")
  .description("Group and profile harvesting with LLM financial-status analysis")
  .version("0.1.0");

accountsCommands(program);
authCommands(program);
groupsCommands(program);
postsCommands(program);
profilesCommands(program);
analysisCommands(program);
configCommands(program);
dbCommands(program);

program.parseAsync().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
