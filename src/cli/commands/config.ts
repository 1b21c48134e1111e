import chalk from "chalk";
import {
  getDefaultConfig,
  logger,
  loadConfig,
  parseConfigAssignment,
  saveConfig,
  updateConfig,
} from "../../shared/index.js";

const SECRET_FIELDS = new Set(["apiKey", "identityApiKey"]);

export const configCommand = {
  show(): void {
    const config = loadConfig();

    logger.print(chalk.bold("\nCurrent Configuration:\n"));
    for (const [section, values] of Object.entries(config)) {
      logger.print(chalk.cyan(`${section}:`));
      for (const [field, value] of Object.entries(values)) {
        const shown = SECRET_FIELDS.has(field) ? (value ? "***" : "(not set)") : String(value);
        logger.print(`  ${field}: ${shown}`);
      }
      logger.print("");
    }
  },

  set(key: string, value: string): void {
    const result = parseConfigAssignment(loadConfig(), key, value);

    if (!result.ok) {
      logger.error(result.message);
      process.exit(1);
    }

    updateConfig(result.updates);
    logger.success(`Set ${key} = ${SECRET_FIELDS.has(key.split(".")[1] ?? "") ? "***" : value}`);
  },

  reset(): void {
    saveConfig(getDefaultConfig());
    logger.success("Configuration reset to defaults");
  },
};
