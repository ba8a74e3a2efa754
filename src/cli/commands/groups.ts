import type { Command } from "commander";
import { z } from "zod";
import { logger } from "../../core/logger";
import { cliId, withContainer } from "../context";

const linkOptions = z.object({
  account: cliId,
  groupId: z.string().min(1),
  name: z.string().min(1),
  joined: z.boolean().default(false),
});
const joinOptions = z.object({ account: cliId, group: cliId });
const scanOptions = z.object({ groupId: z.string().min(1) });

export const commands = (program: Command) => {
  const groupsCmd = program.command("groups");

  groupsCmd
    .command("link")
    .requiredOption("--account <id>", "Owning account ID")
    .requiredOption("--group-id <externalId>", "Group ID on the network")
    .requiredOption("--name <name>", "Group name")
    .option("--joined", "Account is already a member")
    .action(async (raw) => {
      const options = linkOptions.parse(raw);
      await withContainer(async ({ scraper }) => {
        const account = await scraper.requireActiveAccount(options.account);
        const group = await scraper.linkGroup(account, options.groupId, options.name, options.joined);
        logger.info({ groupId: group.id, accountId: account.id }, "Group linked");
      });
    });

  groupsCmd
    .command("join")
    .description("Open the group page so the operator can join it")
    .requiredOption("--account <id>", "Account ID")
    .requiredOption("--group <id>", "Group row ID")
    .action(async (raw) => {
      const options = joinOptions.parse(raw);
      await withContainer(async ({ scraper }) => {
        const joined = await scraper.joinGroup(options.account, options.group);
        logger.info({ groupId: options.group, joined }, "Join finished");
      });
    });

  groupsCmd
    .command("scan")
    .requiredOption("--group-id <externalId>", "Group ID on the network")
    .action(async (raw) => {
      const { groupId } = scanOptions.parse(raw);
      await withContainer(async ({ scraper }) => {
        const posts = await scraper.scanGroup(groupId);
        logger.info({ externalGroupId: groupId, posts: posts.length }, "Group scanned");
        for (const post of posts) {
          console.log(`  [${post.externalId}] ${post.content.slice(0, 80).replace(/\s+/g, " ")}`);
        }
      });
    });
};
