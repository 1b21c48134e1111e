import ora from "ora";
import { logger, loadConfig } from "../../shared/index.js";
import { createRuntime } from "../../server/app.js";

/**
 * Acquire (or refresh) the anonymous upstream credential ahead of time
 */
export async function loginCommand(): Promise<void> {
  const config = loadConfig();
  const { credentials } = createRuntime(config);

  const spinner = ora("Acquiring upstream credential...").start();

  try {
    const credential = await credentials.acquire();
    spinner.succeed("Upstream credential ready");

    logger.info(`Expires at: ${new Date(credential.expiresAt).toISOString()}`);
    if (!config.credentials.persist) {
      logger.warn("credentials.persist is false; the credential is not cached on disk");
    }
  } catch (error) {
    spinner.fail("Credential acquisition failed");
    logger.error("Acquisition error:", error);
    process.exit(1);
  }
}
