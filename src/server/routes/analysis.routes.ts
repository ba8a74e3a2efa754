import { Router } from "express";
import { z } from "zod";
import type { Container } from "../../app/container";
import type { FinancialAnalysis } from "../../db/schema";
import { NotFoundError } from "../../core/errors";
import { idParam, queryLimit } from "../http";

const scrapeProfileSchema = z.object({
  profileUrl: z.string().url(),
  accountId: z.number().int().positive(),
  forceRefresh: z.boolean().default(false),
});

const bulkScrapeSchema = z.object({
  profileUrls: z.array(z.string().url()).min(1).max(20),
  accountId: z.number().int().positive(),
  delaySeconds: z.number().int().min(1).max(30).default(5),
});

const analyzeProfileSchema = z.object({
  profileId: z.number().int().positive(),
  forceReanalysis: z.boolean().default(false),
});

const batchAnalyzeSchema = z.object({
  profileIds: z.array(z.number().int().positive()).min(1).max(100),
  forceReanalysis: z.boolean().default(false),
  batchSize: z.number().int().min(1).max(20).optional(),
});

function parseIndicators(json: string): unknown {
  try {
    return JSON.parse(json);
  } catch {
    return {};
  }
}

function toPublicAnalysis(analysis: FinancialAnalysis) {
  const { indicatorsJson, ...rest } = analysis;
  return { ...rest, indicators: parseIndicators(indicatorsJson) };
}

export function analysisRoutes(container: Container): Router {
  const router = Router();
  const { profiles, analyses } = container.repos;

  router.post("/scrape-profile", async (req, res, next) => {
    try {
      const body = scrapeProfileSchema.parse(req.body);
      const account = await container.scraper.requireActiveAccount(body.accountId);
      const profile = await container.scraper.scrapeProfile(body.profileUrl, account, body.forceRefresh);
      res.json({
        success: profile !== null,
        message: profile ? "Profile scraped" : "Profile could not be scraped",
        profile,
      });
    } catch (error) {
      next(error);
    }
  });

  router.post("/scrape-profiles/bulk", async (req, res, next) => {
    try {
      const body = bulkScrapeSchema.parse(req.body);
      const account = await container.scraper.requireActiveAccount(body.accountId);
      const job = container.jobs.enqueue("bulk-scrape", () =>
        container.scraper.batchScrapeProfiles(body.profileUrls, account, body.delaySeconds)
      );
      const estimatedMinutes = (body.profileUrls.length * body.delaySeconds) / 60;
      res.status(202).json({
        success: true,
        message: `Bulk scrape of ${body.profileUrls.length} profiles queued`,
        jobId: job.id,
        estimatedMinutes,
      });
    } catch (error) {
      next(error);
    }
  });

  router.post("/analyze-profile", async (req, res, next) => {
    try {
      const body = analyzeProfileSchema.parse(req.body);
      const profile = await profiles.findById(body.profileId);
      if (!profile) throw new NotFoundError(`Profile ${body.profileId} not found`);
      const analysis = await container.analysis.analyzeProfile(profile, body.forceReanalysis);
      res.json({
        success: analysis !== null,
        message: analysis ? "Profile analyzed" : "Profile has no analyzable text",
        analysis: analysis ? toPublicAnalysis(analysis) : null,
      });
    } catch (error) {
      next(error);
    }
  });

  router.post("/analyze-profiles/batch", async (req, res, next) => {
    try {
      const body = batchAnalyzeSchema.parse(req.body);
      const job = container.jobs.enqueue("batch-analysis", () =>
        container.analysis.batchAnalyzeProfiles(body.profileIds, body.forceReanalysis, body.batchSize)
      );
      const estimate = container.analysis.estimateBatch(body.profileIds.length, body.batchSize);
      res.status(202).json({
        success: true,
        message: `Batch analysis of ${body.profileIds.length} profiles queued`,
        jobId: job.id,
        estimatedChunks: estimate.chunks,
        estimatedDelaySeconds: estimate.delaySeconds,
      });
    } catch (error) {
      next(error);
    }
  });

  // Static routes before /profiles/:id
  router.get("/profiles", async (req, res, next) => {
    try {
      const accountId = req.query.accountId === undefined ? undefined : idParam.parse(req.query.accountId);
      res.json(await profiles.listRecent(queryLimit(req.query.limit), accountId));
    } catch (error) {
      next(error);
    }
  });

  router.get("/profiles/needing-analysis", async (req, res, next) => {
    try {
      res.json(await container.analysis.profilesNeedingAnalysis(queryLimit(req.query.limit)));
    } catch (error) {
      next(error);
    }
  });

  router.get("/profiles/:id/analyses", async (req, res, next) => {
    try {
      const id = idParam.parse(req.params.id);
      if (!(await profiles.findById(id))) throw new NotFoundError(`Profile ${id} not found`);
      const history = await analyses.listForProfile(id, queryLimit(req.query.limit, 20));
      res.json(history.map(toPublicAnalysis));
    } catch (error) {
      next(error);
    }
  });

  router.get("/profiles/:id", async (req, res, next) => {
    try {
      const id = idParam.parse(req.params.id);
      const profile = await profiles.findById(id);
      if (!profile) throw new NotFoundError(`Profile ${id} not found`);
      const latest = await analyses.latestForProfile(id);
      res.json({ ...profile, latestAnalysis: latest ? toPublicAnalysis(latest) : null });
    } catch (error) {
      next(error);
    }
  });

  router.get("/analyses/recent", async (req, res, next) => {
    try {
      const recent = await analyses.listRecent(queryLimit(req.query.limit));
      res.json(recent.map(toPublicAnalysis));
    } catch (error) {
      next(error);
    }
  });

  router.get("/analyses/stats", async (_req, res, next) => {
    try {
      res.json(await container.analysis.stats());
    } catch (error) {
      next(error);
    }
  });

  return router;
}
