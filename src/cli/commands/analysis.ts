import type { Command } from "commander";
import { z } from "zod";
import { logger } from "../../core/logger";
import { NotFoundError } from "../../core/errors";
import { cliId, cliIdList, withContainer } from "../context";

const analyzeOptions = z.object({ profile: cliId, force: z.boolean().default(false) });
const batchOptions = z.object({
  profiles: cliIdList,
  force: z.boolean().default(false),
  batchSize: z.coerce.number().int().min(1).max(20).optional(),
});
const needingOptions = z.object({ limit: z.coerce.number().int().positive().default(50) });

export const commands = (program: Command) => {
  const analysisCmd = program.command("analysis");

  analysisCmd
    .command("analyze")
    .requiredOption("--profile <id>", "Profile ID")
    .option("--force", "Analyze even when a recent analysis exists")
    .action(async (raw) => {
      const options = analyzeOptions.parse(raw);
      await withContainer(async ({ repos, analysis }) => {
        const profile = await repos.profiles.findById(options.profile);
        if (!profile) throw new NotFoundError(`Profile ${options.profile} not found`);

        const result = await analysis.analyzeProfile(profile, options.force);
        if (!result) {
          logger.warn({ profileId: profile.id }, "Profile has no analyzable text");
          return;
        }
        logger.info(
          { profileId: profile.id, financialStatus: result.financialStatus, confidenceScore: result.confidenceScore },
          result.analysisSummary
        );
      });
    });

  analysisCmd
    .command("batch")
    .requiredOption("--profiles <ids>", "Comma-separated profile IDs")
    .option("--force", "Analyze even when a recent analysis exists")
    .option("--batch-size <n>", "Profiles per LLM call")
    .action(async (raw) => {
      const options = batchOptions.parse(raw);
      await withContainer(async ({ analysis }) => {
        const result = await analysis.batchAnalyzeProfiles(options.profiles, options.force, options.batchSize);
        logger.info(
          {
            requested: result.profilesRequested,
            skipped: result.profilesSkipped,
            processed: result.profilesProcessed,
            failed: result.profilesFailed,
            totalTokens: result.totalTokens,
          },
          "Batch analysis finished"
        );
        for (const error of result.errors) {
          console.log(`  ${error.code} [${error.profileIds.join(", ")}]: ${error.message}`);
        }
      });
    });

  analysisCmd
    .command("needing")
    .description("List profiles with a bio and no recent analysis")
    .option("--limit <n>", "Maximum profiles", "50")
    .action(async (raw) => {
      const { limit } = needingOptions.parse(raw);
      await withContainer(async ({ analysis }) => {
        const profiles = await analysis.profilesNeedingAnalysis(limit);
        for (const profile of profiles) {
          console.log(`  [${profile.id}] ${profile.name ?? profile.facebookId}`);
        }
      });
    });

  analysisCmd.command("stats").action(async () => {
    await withContainer(async ({ analysis }) => {
      const stats = await analysis.stats();
      for (const row of stats.byStatus) {
        console.log(`  ${row.financialStatus}: ${row.count} (avg confidence ${row.averageConfidence.toFixed(2)})`);
      }
      console.log(`  total: ${stats.total}`);
    });
  });
};
