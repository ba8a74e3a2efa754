import { z } from "zod";
import { ParseError, ValidationError } from "../core/errors";
import { logger } from "../core/logger";

export const FINANCIAL_STATUSES = ["low", "medium", "high"] as const;

export const AnalysisOutputSchema = z.object({
  financialStatus: z
    .string()
    .transform((s) => s.trim().toLowerCase())
    .pipe(z.enum(FINANCIAL_STATUSES)),
  confidenceScore: z.number().min(0).max(1),
  analysisSummary: z.string().min(1),
  indicators: z.record(z.unknown()).default({}),
});

export const BatchElementSchema = AnalysisOutputSchema.extend({
  profileId: z.union([z.number().int(), z.string().regex(/^\d+$/).transform(Number)]),
});

export type AnalysisOutput = z.infer<typeof AnalysisOutputSchema>;
export type BatchElement = z.infer<typeof BatchElementSchema>;

export type BatchElementResult =
  | { ok: true; profileId: number; value: AnalysisOutput }
  | { ok: false; profileId: number | null; index: number; reason: string };

/** Drops a leading fence line (```json or ```) and a trailing fence line. */
export function stripCodeFence(raw: string): string {
  let text = raw.trim();
  if (!text.startsWith("```")) return text;

  const lines = text.split("\n");
  lines.shift();
  const last = lines[lines.length - 1];
  if (last !== undefined && last.trim().startsWith("```")) {
    lines.pop();
  }
  text = lines.join("\n").trim();
  return text;
}

export function parseJson(raw: string): unknown {
  const cleaned = stripCodeFence(raw);
  try {
    return JSON.parse(cleaned);
  } catch {
    logger.debug({ length: raw.length }, "LLM response is not valid JSON");
    throw new ParseError("LLM response is not valid JSON");
  }
}

function describe(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join(".") || "value"}: ${issue.message}`).join("; ");
}

export function parseAnalysis(raw: string): AnalysisOutput {
  const result = AnalysisOutputSchema.safeParse(parseJson(raw));
  if (!result.success) {
    throw new ValidationError(`Invalid analysis: ${describe(result.error)}`);
  }
  return result.data;
}

/**
 * Parses a batch payload. The payload must be a JSON array (ParseError
 * otherwise); each element is validated on its own.
 */
export function parseBatch(raw: string): BatchElementResult[] {
  const payload = parseJson(raw);
  if (!Array.isArray(payload)) {
    throw new ParseError("Batch response is not a JSON array");
  }

  return payload.map((element: unknown, index): BatchElementResult => {
    const result = BatchElementSchema.safeParse(element);
    if (result.success) {
      const { profileId, ...value } = result.data;
      return { ok: true, profileId, value };
    }
    return { ok: false, profileId: profileIdOf(element), index, reason: describe(result.error) };
  });
}

function profileIdOf(element: unknown): number | null {
  if (typeof element !== "object" || element === null || !("profileId" in element)) return null;
  const id = element.profileId;
  if (typeof id === "number") return Number.isInteger(id) ? id : null;
  return typeof id === "string" && /^\d+$/.test(id) ? Number(id) : null;
}
