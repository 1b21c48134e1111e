import chalk from "chalk";
import ora from "ora";
import { logger, loadConfig } from "../../shared/index.js";
import { createRuntime } from "../../server/app.js";

export async function usageCommand(): Promise<void> {
  const { usage } = createRuntime(loadConfig());
  const spinner = ora("Querying upstream usage...").start();

  try {
    const snapshot = await usage.snapshot();
    spinner.stop();

    logger.print(chalk.bold("\nUpstream Usage:\n"));
    if (snapshot.isUnlimited) {
      logger.print(`  ${chalk.green("unlimited")}`);
    } else {
      const ratio = snapshot.windowLimit > 0 ? snapshot.windowUsed / snapshot.windowLimit : 0;
      const color = ratio > 0.95 ? chalk.red : ratio > 0.8 ? chalk.yellow : chalk.green;
      logger.print(`  used:   ${color(`${snapshot.windowUsed}/${snapshot.windowLimit}`)} (${(ratio * 100).toFixed(0)}%)`);
    }
    logger.print(`  resets: ${new Date(snapshot.resetsAt).toLocaleString()}`);
    logger.print("");
  } catch (error) {
    spinner.fail("Usage query failed");
    logger.error("Usage error:", error);
    process.exit(1);
  }
}
