import { randomInt } from "crypto";

const CHROME_MAJORS = [134, 135, 136, 137, 138];

/** Desktop Chrome on Windows, matching what a real operator's browser would send. */
export function generateUserAgent(pick: (max: number) => number = randomInt): string {
  const major = CHROME_MAJORS[pick(CHROME_MAJORS.length)] ?? CHROME_MAJORS[0];
  return `Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/${major}.0.0.0 Safari/537.36`;
}
