import type { LLMPrompt } from "../contracts";

export interface ProfilePromptInput {
  profileId: number;
  text: string;
}

const ANALYSIS_FIELDS = `  "financialStatus": "low" | "medium" | "high",
  "confidenceScore": <number 0-1>,
  "analysisSummary": "<brief explanation of your assessment>",
  "indicators": {
    "jobIndicators": [<job-related indicators found>],
    "lifestyleIndicators": [<lifestyle indicators found>],
    "educationIndicators": [<education indicators found>],
    "locationIndicators": [<location-based indicators found>]
  }`;

const GUIDELINES = `Financial status guidelines:
- low: students, unemployed, entry-level jobs, financial struggles mentioned, budget constraints
- medium: standard employment, middle-class lifestyle, some discretionary spending
- high: executive positions, luxury lifestyle indicators, high-end education, expensive locations or activities

Consider:
1. Job titles and companies
2. Education level and institutions
3. Location (expensive areas indicate higher income)
4. Lifestyle posts (travel, dining, purchases, activities)
5. Language patterns indicating financial stress or success`;

export function buildSingleAnalysisPrompt(profileText: string): LLMPrompt {
  return {
    system: `You are a financial analyst. Estimate the likely financial status of the person behind a social network profile.

Your output must be a JSON object with this exact structure:
{
${ANALYSIS_FIELDS}
}

${GUIDELINES}

Respond ONLY with valid JSON. No explanation text outside the JSON.`,
    user: `## Profile to Analyze

${profileText}

Provide your JSON response:`,
  };
}

export function buildBatchAnalysisPrompt(profiles: ProfilePromptInput[]): LLMPrompt {
  const sections = profiles.map((p) => `PROFILE ${p.profileId}:\n${p.text}\n`).join("\n");

  return {
    system: `You are a financial analyst. Estimate the likely financial status of the people behind several social network profiles.

Your output must be a JSON array with one object per profile, each with this exact structure:
{
  "profileId": <the number after PROFILE>,
${ANALYSIS_FIELDS}
}

${GUIDELINES}

Respond ONLY with a valid JSON array. No explanation text outside the JSON.`,
    user: `## Profiles to Analyze

${sections}
Provide your JSON array:`,
  };
}
