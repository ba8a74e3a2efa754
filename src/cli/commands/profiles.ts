import type { Command } from "commander";
import { z } from "zod";
import { logger } from "../../core/logger";
import { cliId, withContainer } from "../context";

const scrapeOptions = z.object({
  account: cliId,
  url: z.string().url(),
  force: z.boolean().default(false),
});

const bulkOptions = z.object({
  account: cliId,
  urls: z
    .string()
    .transform((raw) => raw.split(",").map((s) => s.trim()).filter((s) => s.length > 0))
    .pipe(z.array(z.string().url()).min(1).max(20)),
  delay: z.coerce.number().int().min(1).max(30).default(5),
});

export const commands = (program: Command) => {
  const profilesCmd = program.command("profiles");

  profilesCmd
    .command("scrape")
    .requiredOption("--account <id>", "Account ID to browse with")
    .requiredOption("--url <url>", "Profile URL")
    .option("--force", "Ignore a fresh cached copy")
    .action(async (raw) => {
      const options = scrapeOptions.parse(raw);
      await withContainer(async ({ scraper }) => {
        const account = await scraper.requireActiveAccount(options.account);
        const profile = await scraper.scrapeProfile(options.url, account, options.force);
        if (!profile) {
          logger.error({ url: options.url }, "Profile could not be scraped");
          process.exitCode = 1;
          return;
        }
        logger.info({ profileId: profile.id, name: profile.name }, "Profile scraped");
      });
    });

  profilesCmd
    .command("scrape-bulk")
    .requiredOption("--account <id>", "Account ID to browse with")
    .requiredOption("--urls <urls>", "Comma-separated profile URLs (at most 20)")
    .option("--delay <seconds>", "Pause between profiles", "5")
    .action(async (raw) => {
      const options = bulkOptions.parse(raw);
      await withContainer(async ({ scraper }) => {
        const account = await scraper.requireActiveAccount(options.account);
        const profiles = await scraper.batchScrapeProfiles(options.urls, account, options.delay);
        logger.info({ requested: options.urls.length, scraped: profiles.length }, "Bulk scrape finished");
      });
    });
};
