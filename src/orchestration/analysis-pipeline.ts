import type { FinancialAnalysis, NewFinancialAnalysis, UserProfile } from "../db/schema";
import type { FinancialAnalysesRepository, AnalysisStats } from "../db/repositories/financial-analyses.repo";
import type { UserProfilesRepository } from "../db/repositories/user-profiles.repo";
import type { LLMClient, LLMCompletion, LLMPrompt } from "../llm/contracts";
import { buildBatchAnalysisPrompt, buildSingleAnalysisPrompt } from "../llm/prompts/financial-analysis";
import { parseAnalysis, parseBatch, type AnalysisOutput } from "../llm/response-parser";
import type { SettingsView } from "../services/session-manager";
import { LLMError, UpstreamError, errorMessage } from "../core/errors";
import { logger } from "../core/logger";
import { sleep as defaultSleep, unixNow, type Sleep } from "../core/retry";

export type BatchErrorCode =
  | "not_found"
  | "empty_profile"
  | "validation_error"
  | "unknown_profile"
  | "missing_result"
  | "chunk_failed";

export interface BatchError {
  code: BatchErrorCode;
  profileIds: number[];
  message: string;
  chunkIndex?: number;
}

export interface BatchResult {
  results: FinancialAnalysis[];
  errors: BatchError[];
  totalTokens: number;
  profilesRequested: number;
  profilesSkipped: number;
  profilesProcessed: number;
  profilesFailed: number;
}

interface PendingProfile {
  profile: UserProfile;
  text: string;
}

const PROFILE_TEXT_FIELDS: Array<[label: string, field: keyof UserProfile]> = [
  ["Name", "name"],
  ["Bio", "bio"],
  ["Work", "work"],
  ["Education", "education"],
  ["Location", "location"],
  ["Relationship Status", "relationshipStatus"],
  ["Recent Posts Sample", "postsSample"],
];

/** `Label: value` lines for every non-empty text field; empty string when there is nothing to analyze. */
export function buildProfileText(profile: UserProfile): string {
  const lines: string[] = [];
  for (const [label, field] of PROFILE_TEXT_FIELDS) {
    const value = profile[field];
    if (typeof value === "string" && value.trim().length > 0) {
      lines.push(`${label}: ${value.trim()}`);
    }
  }
  return lines.join("\n");
}

export function chunk<T>(items: T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

export interface AnalysisPipelineDeps {
  profiles: UserProfilesRepository;
  analyses: FinancialAnalysesRepository;
  llm: LLMClient;
  settings: SettingsView;
  sleep?: Sleep;
}

export class AnalysisPipeline {
  private readonly sleep: Sleep;

  constructor(private readonly deps: AnalysisPipelineDeps) {
    this.sleep = deps.sleep ?? defaultSleep;
  }

  async analyzeProfile(profile: UserProfile, forceReanalysis = false): Promise<FinancialAnalysis | null> {
    if (!forceReanalysis) {
      const latest = await this.deps.analyses.latestForProfile(profile.id);
      if (latest && this.isRecent(latest)) {
        logger.debug({ profileId: profile.id, analysisId: latest.id }, "Recent analysis exists; reusing it");
        return latest;
      }
    }

    const text = buildProfileText(profile);
    if (!text) {
      logger.info({ profileId: profile.id }, "Profile has no analyzable text");
      return null;
    }

    const completion = await this.callLLM(buildSingleAnalysisPrompt(text));
    const output = parseAnalysis(completion.text);
    const analysis = await this.deps.analyses.create(toRow(profile.id, output, completion, 1));
    logger.info(
      { profileId: profile.id, analysisId: analysis.id, financialStatus: analysis.financialStatus },
      "Profile analyzed"
    );
    return analysis;
  }

  async batchAnalyzeProfiles(
    profileIds: number[],
    forceReanalysis = false,
    batchSize: number = this.deps.settings.current.analysisBatchSize
  ): Promise<BatchResult> {
    const requested = [...new Set(profileIds)];
    const errors: BatchError[] = [];
    const results: FinancialAnalysis[] = [];
    let totalTokens = 0;
    let profilesSkipped = 0;

    const found = new Map((await this.deps.profiles.findByIds(requested)).map((p) => [p.id, p]));
    const pending: PendingProfile[] = [];

    for (const id of requested) {
      const profile = found.get(id);
      if (!profile) {
        errors.push({ code: "not_found", profileIds: [id], message: `Profile ${id} not found` });
        continue;
      }
      if (!forceReanalysis) {
        const latest = await this.deps.analyses.latestForProfile(id);
        if (latest && this.isRecent(latest)) {
          profilesSkipped++;
          continue;
        }
      }
      const text = buildProfileText(profile);
      if (!text) {
        errors.push({ code: "empty_profile", profileIds: [id], message: `Profile ${id} has no analyzable text` });
        continue;
      }
      pending.push({ profile, text });
    }

    const chunks = chunk(pending, Math.max(1, batchSize));
    for (const [chunkIndex, members] of chunks.entries()) {
      const memberIds = members.map((m) => m.profile.id);
      try {
        const completion = await this.callLLM(
          buildBatchAnalysisPrompt(members.map((m) => ({ profileId: m.profile.id, text: m.text })))
        );
        totalTokens += completion.usage?.totalTokens ?? 0;

        const { rows, chunkErrors } = this.collectChunk(chunkIndex, memberIds, completion);
        errors.push(...chunkErrors);
        results.push(...this.deps.analyses.createMany(rows));
        logger.info({ chunkIndex, profiles: memberIds.length, stored: rows.length }, "Analysis chunk processed");
      } catch (error) {
        logger.warn({ chunkIndex, profileIds: memberIds, err: errorMessage(error) }, "Analysis chunk failed");
        errors.push({ code: "chunk_failed", profileIds: memberIds, message: errorMessage(error), chunkIndex });
      }

      if (chunkIndex < chunks.length - 1) {
        await this.sleep(this.deps.settings.current.analysisBatchDelayMs);
      }
    }

    const requestedIds = new Set(requested);
    const failed = new Set(errors.flatMap((e) => e.profileIds).filter((id) => requestedIds.has(id)));
    for (const analysis of results) failed.delete(analysis.userProfileId);

    return {
      results,
      errors,
      totalTokens,
      profilesRequested: requested.length,
      profilesSkipped,
      profilesProcessed: results.length,
      profilesFailed: failed.size,
    };
  }

  async profilesNeedingAnalysis(limit = 50): Promise<UserProfile[]> {
    return this.deps.profiles.listNeedingAnalysis(this.recencyCutoff(), limit);
  }

  async stats(): Promise<AnalysisStats> {
    return this.deps.analyses.stats();
  }

  /** Number of LLM calls a batch of `profileCount` profiles needs and the pause time between them. */
  estimateBatch(profileCount: number, batchSize: number = this.deps.settings.current.analysisBatchSize) {
    const chunks = Math.ceil(profileCount / Math.max(1, batchSize));
    const delaySeconds = (Math.max(0, chunks - 1) * this.deps.settings.current.analysisBatchDelayMs) / 1000;
    return { chunks, delaySeconds };
  }

  private collectChunk(
    chunkIndex: number,
    memberIds: number[],
    completion: LLMCompletion
  ): { rows: NewFinancialAnalysis[]; chunkErrors: BatchError[] } {
    const members = new Set(memberIds);
    const accepted = new Map<number, AnalysisOutput>();
    const reported = new Set<number>();
    const chunkErrors: BatchError[] = [];

    for (const element of parseBatch(completion.text)) {
      if (!element.ok) {
        const ids = element.profileId !== null && members.has(element.profileId) ? [element.profileId] : [];
        ids.forEach((id) => reported.add(id));
        chunkErrors.push({
          code: "validation_error",
          profileIds: ids,
          message: `Element ${element.index}: ${element.reason}`,
          chunkIndex,
        });
        continue;
      }
      if (!members.has(element.profileId)) {
        chunkErrors.push({
          code: "unknown_profile",
          profileIds: [element.profileId],
          message: `Result for profile ${element.profileId} which was not in the chunk`,
          chunkIndex,
        });
        continue;
      }
      if (accepted.has(element.profileId)) {
        logger.warn({ chunkIndex, profileId: element.profileId }, "Duplicate result in chunk; keeping the first");
        continue;
      }
      accepted.set(element.profileId, element.value);
    }

    for (const id of memberIds) {
      if (!accepted.has(id) && !reported.has(id)) {
        chunkErrors.push({ code: "missing_result", profileIds: [id], message: `No result for profile ${id}`, chunkIndex });
      }
    }

    const rows = memberIds.flatMap((id) => {
      const output = accepted.get(id);
      return output ? [toRow(id, output, completion, memberIds.length)] : [];
    });
    return { rows, chunkErrors };
  }

  private async callLLM(prompt: LLMPrompt): Promise<LLMCompletion> {
    try {
      return await this.deps.llm.complete(prompt);
    } catch (error) {
      const code = error instanceof LLMError ? error.code : "llm_call_failed";
      throw new UpstreamError("LLM call failed", code, { cause: error });
    }
  }

  private recencyCutoff(): number {
    return unixNow() - Math.floor(this.deps.settings.current.analysisRecentDays * 86400);
  }

  private isRecent(analysis: FinancialAnalysis): boolean {
    return analysis.createdAt > this.recencyCutoff();
  }
}

function toRow(
  userProfileId: number,
  output: AnalysisOutput,
  completion: LLMCompletion,
  sharedCallSize: number
): NewFinancialAnalysis {
  return {
    userProfileId,
    financialStatus: output.financialStatus,
    confidenceScore: output.confidenceScore,
    analysisSummary: output.analysisSummary,
    indicatorsJson: JSON.stringify(output.indicators),
    modelName: completion.model,
    promptTokens: completion.usage?.promptTokens ?? null,
    completionTokens: completion.usage?.completionTokens ?? null,
    totalTokens: completion.usage?.totalTokens ?? null,
    sharedCallSize,
    createdAt: unixNow(),
  };
}
