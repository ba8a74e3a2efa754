import { avg, count, desc, eq } from "drizzle-orm";
import type { FinancialAnalysis, NewFinancialAnalysis } from "../schema";
import { financialAnalyses } from "../schema";
import type { AppDatabase } from "../client";
import { logger } from "../../core/logger";

export type FinancialStatus = FinancialAnalysis["financialStatus"];

export interface StatusStats {
  financialStatus: FinancialStatus;
  count: number;
  averageConfidence: number;
}

export interface AnalysisStats {
  byStatus: StatusStats[];
  total: number;
}

export class FinancialAnalysesRepository {
  constructor(private readonly db: AppDatabase) {}

  async create(data: NewFinancialAnalysis): Promise<FinancialAnalysis> {
    const [result] = await this.db.insert(financialAnalyses).values(data).returning();
    if (!result) {
      throw new Error("Failed to create financial analysis");
    }
    logger.debug({ analysisId: result.id, profileId: result.userProfileId }, "Analysis stored");
    return result;
  }

  /** All-or-nothing insert of one chunk's analyses. */
  createMany(items: NewFinancialAnalysis[]): FinancialAnalysis[] {
    if (items.length === 0) return [];
    return this.db.transaction((tx) =>
      items.map((item) => tx.insert(financialAnalyses).values(item).returning().get())
    );
  }

  async latestForProfile(userProfileId: number): Promise<FinancialAnalysis | null> {
    const [result] = await this.db
      .select()
      .from(financialAnalyses)
      .where(eq(financialAnalyses.userProfileId, userProfileId))
      .orderBy(desc(financialAnalyses.createdAt), desc(financialAnalyses.id))
      .limit(1);
    return result ?? null;
  }

  async listForProfile(userProfileId: number, limit = 20): Promise<FinancialAnalysis[]> {
    return this.db
      .select()
      .from(financialAnalyses)
      .where(eq(financialAnalyses.userProfileId, userProfileId))
      .orderBy(desc(financialAnalyses.createdAt), desc(financialAnalyses.id))
      .limit(limit);
  }

  async listRecent(limit = 50): Promise<FinancialAnalysis[]> {
    return this.db
      .select()
      .from(financialAnalyses)
      .orderBy(desc(financialAnalyses.createdAt), desc(financialAnalyses.id))
      .limit(limit);
  }

  async stats(): Promise<AnalysisStats> {
    const rows = await this.db
      .select({
        financialStatus: financialAnalyses.financialStatus,
        count: count(),
        averageConfidence: avg(financialAnalyses.confidenceScore),
      })
      .from(financialAnalyses)
      .groupBy(financialAnalyses.financialStatus)
      .orderBy(financialAnalyses.financialStatus);

    const byStatus = rows.map((row) => ({
      financialStatus: row.financialStatus,
      count: row.count,
      averageConfidence: row.averageConfidence === null ? 0 : Number(row.averageConfidence),
    }));
    return { byStatus, total: byStatus.reduce((sum, row) => sum + row.count, 0) };
  }
}
