import { z } from "zod";
import { buildContainer, type Container } from "../app/container";
import { closeDb } from "../db/client";
import { logger } from "../core/logger";

export const cliId = z.coerce.number().int().positive();

export const cliIdList = z
  .string()
  .transform((raw) => raw.split(",").map((s) => s.trim()).filter((s) => s.length > 0))
  .pipe(z.array(cliId).min(1));

/** Builds the container, runs the command, and always releases the database. */
export async function withContainer(run: (container: Container) => Promise<void>): Promise<void> {
  try {
    const container = await buildContainer();
    await run(container);
  } catch (error) {
    logger.error({ err: error }, "Command failed");
    process.exitCode = 1;
  } finally {
    closeDb();
  }
}
