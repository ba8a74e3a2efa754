import { describe, it, expect } from "vitest";
import { parseAnalysis, parseBatch, stripCodeFence } from "../../src/llm/response-parser";
import { ParseError, ValidationError } from "../../src/core/errors";

const valid = {
  financialStatus: "HIGH",
  confidenceScore: 0.8,
  analysisSummary: "Executive role",
  indicators: { jobIndicators: ["CFO"] },
};

describe("stripCodeFence", () => {
  it("removes a json fence", () => {
    expect(stripCodeFence('```json\n{"a":1}\n```')).toBe('{"a":1}');
  });

  it("removes a bare fence", () => {
    expect(stripCodeFence('```\n[1, 2]\n```\n')).toBe("[1, 2]");
  });

  it("leaves unfenced text alone", () => {
    expect(stripCodeFence('  {"a":1} ')).toBe('{"a":1}');
  });
});

describe("parseAnalysis", () => {
  it("normalizes the status label", () => {
    const result = parseAnalysis("```json\n" + JSON.stringify(valid) + "\n```");
    expect(result).toEqual({
      financialStatus: "high",
      confidenceScore: 0.8,
      analysisSummary: "Executive role",
      indicators: { jobIndicators: ["CFO"] },
    });
  });

  it("defaults missing indicators to an empty object", () => {
    const { indicators: _indicators, ...rest } = valid;
    expect(parseAnalysis(JSON.stringify(rest)).indicators).toEqual({});
  });

  it("throws ParseError on non-JSON text", () => {
    expect(() => parseAnalysis("The person seems wealthy.")).toThrow(ParseError);
  });

  it("throws ValidationError on an out-of-range confidence", () => {
    expect(() => parseAnalysis(JSON.stringify({ ...valid, confidenceScore: 1.5 }))).toThrow(ValidationError);
  });

  it("throws ValidationError on an unknown status", () => {
    expect(() => parseAnalysis(JSON.stringify({ ...valid, financialStatus: "rich" }))).toThrow(ValidationError);
  });
});

describe("parseBatch", () => {
  it("validates each element on its own", () => {
    const payload = [
      { ...valid, profileId: 1 },
      { ...valid, profileId: 2, confidenceScore: 1.5 },
      { ...valid, profileId: 3 },
    ];
    const results = parseBatch(JSON.stringify(payload));

    expect(results.map((r) => r.ok)).toEqual([true, false, true]);
    expect(results[1]).toEqual({
      ok: false,
      profileId: 2,
      index: 1,
      reason: "confidenceScore: Number must be less than or equal to 1",
    });
  });

  it("reports a null profile id when the element carries none", () => {
    const [result] = parseBatch(JSON.stringify(["oops"]));
    expect(result).toMatchObject({ ok: false, profileId: null, index: 0 });
  });

  it("accepts numeric-string ids", () => {
    const [result] = parseBatch(JSON.stringify([{ ...valid, profileId: "42" }]));
    expect(result).toMatchObject({ ok: true, profileId: 42 });
  });

  it("rejects ids that are not integers instead of coercing them", () => {
    const payload = [null, "", false, true, 1.5].map((profileId) => ({ ...valid, profileId }));
    const results = parseBatch(JSON.stringify(payload));

    expect(results.map((r) => [r.ok, r.profileId])).toEqual([
      [false, null],
      [false, null],
      [false, null],
      [false, null],
      [false, null],
    ]);
  });

  it("throws ParseError when the payload is not an array", () => {
    expect(() => parseBatch(JSON.stringify({ ...valid, profileId: 1 }))).toThrow(ParseError);
  });
});
