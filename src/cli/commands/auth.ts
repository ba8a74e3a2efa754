import type { Command } from "commander";
import { z } from "zod";
import { logger } from "../../core/logger";
import { NotFoundError } from "../../core/errors";
import { cliId, withContainer } from "../context";

const idOptions = z.object({ id: cliId });

export const commands = (program: Command) => {
  program
    .command("auth:login")
    .description("Sign an account in through a visible browser window")
    .requiredOption("--id <id>", "Account ID")
    .action(async (raw) => {
      const { id } = idOptions.parse(raw);
      await withContainer(async ({ repos, sessions }) => {
        const account = await repos.accounts.findById(id);
        if (!account) throw new NotFoundError(`Account ${id} not found`);

        console.log("\n========================================");
        console.log("Complete the login in the browser window.");
        console.log("Close the window to stop waiting.");
        console.log("========================================\n");

        const ok = await sessions.login(account);
        if (ok) {
          logger.info({ accountId: id }, "Login complete");
        } else {
          logger.error({ accountId: id }, "Login failed");
          process.exitCode = 1;
        }
      });
    });

  program
    .command("auth:token")
    .description("Derive and store an API access token from the account's cookies")
    .requiredOption("--id <id>", "Account ID")
    .action(async (raw) => {
      const { id } = idOptions.parse(raw);
      await withContainer(async ({ repos, sessions }) => {
        const account = await repos.accounts.findById(id);
        if (!account) throw new NotFoundError(`Account ${id} not found`);

        const token = await sessions.deriveAccessToken(account);
        if (token) {
          logger.info({ accountId: id }, "Access token stored");
        } else {
          logger.error({ accountId: id }, "Access token could not be derived");
          process.exitCode = 1;
        }
      });
    });
};
