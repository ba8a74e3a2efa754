import type { Command } from "commander";
import { logger } from "../../core/logger";
import { SETTING_ENV_KEYS, isSettingKey } from "../../core/settings";
import { withContainer } from "../context";

export const commands = (program: Command) => {
  const configCmd = program.command("config");

  configCmd.command("list").action(async () => {
    await withContainer(async ({ settings }) => {
      for (const [key, value] of Object.entries(settings.current)) {
        const envKey = isSettingKey(key) ? SETTING_ENV_KEYS[key] : "";
        console.log(`  ${key} = ${String(value)}  (${envKey})`);
      }
    });
  });

  configCmd
    .command("set")
    .argument("<key>", "Setting name, e.g. analysisBatchSize")
    .argument("<value>", "New value")
    .action(async (key: string, value: string) => {
      await withContainer(async ({ settings }) => {
        await settings.set(key, value);
        logger.info({ key }, "Setting stored");
      });
    });

  configCmd.command("reload").action(async () => {
    await withContainer(async ({ settings }) => {
      await settings.reload();
      logger.info("Settings reloaded");
    });
  });
};
