import { cac } from "cac";
import { startCommand } from "./commands/start.js";
import { loginCommand } from "./commands/login.js";
import { usageCommand } from "./commands/usage.js";
import { configCommand } from "./commands/config.js";
import { modelsCommand } from "./commands/models.js";
import { setLogLevel } from "../shared/logger.js";
import { VERSION } from "../shared/constants.js";

const cli = cac("chat-bridge");

// Global options
cli.option("--debug", "Enable debug logging");

// Commands
cli
  .command("start", "Start the bridge server")
  .option("-p, --port <port>", "Server port (default from config: 28080)")
  .option("-H, --host <host>", "Server host (default from config: 127.0.0.1)")
  .option("-k, --api-key <key>", "API key callers must present")
  .option("--codec-url <url>", "Base URL of the upstream codec service")
  .action(startCommand);

cli
  .command("login", "Acquire an anonymous upstream credential")
  .action(loginCommand);

cli
  .command("usage", "Show upstream request quota")
  .action(usageCommand);

cli
  .command("config [action] [key] [value]", "Manage configuration (show | set <key> <value> | reset)")
  .action((action?: string, key?: string, value?: string) => {
    if (!action || action === "show") {
      configCommand.show();
    } else if (action === "set") {
      if (!key || value === undefined) {
        console.error("Usage: chat-bridge config set <key> <value>");
        process.exit(1);
      }
      configCommand.set(key, value);
    } else if (action === "reset") {
      configCommand.reset();
    } else {
      console.error(`Unknown config action: ${action}`);
      process.exit(1);
    }
  });

cli
  .command("models", "List all available models")
  .action(modelsCommand);

// Help and version
cli.help();
cli.version(VERSION);

// Parse and run
export function run(): void {
  // Handle global options before any command runs
  if (process.argv.includes("--debug")) {
    setLogLevel("debug");
  }

  cli.parse();
}
