import type { Command } from "commander";
import { z } from "zod";
import { logger } from "../../core/logger";
import { NotFoundError } from "../../core/errors";
import { generateUserAgent } from "../../core/user-agent";
import { cliId, withContainer } from "../context";

const addOptions = z.object({
  username: z.string().min(1),
  email: z.string().email(),
  password: z.string().min(1),
  proxyServer: z.string().optional(),
  proxyUsername: z.string().optional(),
  proxyPassword: z.string().optional(),
});

const listOptions = z.object({ page: z.coerce.number().int().positive().default(1) });
const idOptions = z.object({ id: cliId });

export const commands = (program: Command) => {
  const accountsCmd = program.command("accounts");

  accountsCmd
    .command("add")
    .requiredOption("--username <username>", "Login username")
    .requiredOption("--email <email>", "Login email")
    .requiredOption("--password <password>", "Login password")
    .option("--proxy-server <url>", "Proxy server, e.g. http://host:port")
    .option("--proxy-username <username>", "Proxy username")
    .option("--proxy-password <password>", "Proxy password")
    .action(async (raw) => {
      const options = addOptions.parse(raw);
      await withContainer(async ({ repos }) => {
        const account = await repos.accounts.create({ ...options, ua: generateUserAgent() });
        logger.info({ accountId: account.id }, "Account created. Run 'auth:login' to sign it in.");
      });
    });

  accountsCmd
    .command("list")
    .option("--page <page>", "Page number", "1")
    .action(async (raw) => {
      const { page } = listOptions.parse(raw);
      await withContainer(async ({ repos }) => {
        const result = await repos.accounts.list(page);
        logger.info({ page: result.page, total: result.total }, "Accounts");
        for (const account of result.items) {
          const flags = [account.isBlocked ? "blocked" : "ok", account.accessToken ? "token" : "no-token"];
          console.log(`  [${account.id}] ${account.username} <${account.email}> (${flags.join(", ")})`);
        }
      });
    });

  for (const [name, isBlocked] of [
    ["block", true],
    ["unblock", false],
  ] as const) {
    accountsCmd
      .command(name)
      .requiredOption("--id <id>", "Account ID")
      .action(async (raw) => {
        const { id } = idOptions.parse(raw);
        await withContainer(async ({ repos }) => {
          const updated = await repos.accounts.setBlocked(id, isBlocked);
          if (!updated) throw new NotFoundError(`Account ${id} not found`);
        });
      });
  }
};
