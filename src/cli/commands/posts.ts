import type { Command } from "commander";
import { z } from "zod";
import { logger } from "../../core/logger";
import { withContainer } from "../context";

const scanOptions = z.object({ postId: z.string().min(1) });

export const commands = (program: Command) => {
  const postsCmd = program.command("posts");

  postsCmd
    .command("scan")
    .description("Fetch a post's comments and their authors")
    .requiredOption("--post-id <externalId>", "Post ID on the network")
    .action(async (raw) => {
      const { postId } = scanOptions.parse(raw);
      await withContainer(async ({ scraper }) => {
        const comments = await scraper.scanPost(postId);
        logger.info({ externalPostId: postId, comments: comments.length }, "Post scanned");
      });
    });
};
