import chalk from "chalk";
import { DEFAULT_MODEL_SELECTION, MODELS, loadConfig } from "../../shared/index.js";
import type { ModelInfo } from "../../shared/index.js";
import { logger } from "../../shared/logger.js";

export async function modelsCommand(): Promise<void> {
  const { models: selection } = loadConfig();

  logger.print(chalk.bold("\nAvailable Models:\n"));

  // Group models by vendor
  const vendors = [...new Set(MODELS.map((m) => m.vendor))];
  for (const vendor of vendors) {
    logger.print(chalk.cyan(`${vendor}:`));
    displayModels(MODELS.filter((m) => m.vendor === vendor));
    logger.print("");
  }

  logger.print(chalk.bold("Default selection:"));
  logger.print(`  base:     ${selection.base}${selection.base === DEFAULT_MODEL_SELECTION.base ? "" : chalk.gray(" (configured)")}`);
  logger.print(`  planning: ${selection.planning}`);
  logger.print(`  coding:   ${selection.coding}`);
  logger.print("");

  // Display usage hint
  logger.print("Usage:");
  logger.print("  Use the model ID in your API requests");
  logger.print("  Example: curl http://127.0.0.1:28080/v1/chat/completions \\");
  logger.print('    -d \'{"model": "claude-4.1-opus", "messages": [...]}\'');
}

function displayModels(models: ModelInfo[]): void {
  for (const model of models) {
    const features = [`roles: ${model.roles.join("/")}`];
    if (model.vision) {
      features.push("vision");
    }

    logger.print(`  • ${model.id}`);
    logger.print(`    Name: ${model.name}`);
    logger.print(`    ${features.join(", ")}`);
  }
}
