#!/usr/bin/env node
import { loadEnvFile, parseArgs, readOptionalString, resolveInitialView } from "./app/cli/cli";
import { runConfigCheckCommand } from "./app/commands/run-config-check-command";
import { runConfigInitCommand } from "./app/commands/run-config-init-command";
import { runDashboard } from "./app/dashboard/run-dashboard";
import { loadConfig } from "./config";

const runConfigCommand = (subcommand: string | undefined, configPath: string | null) => {
  switch (subcommand) {
    case "init":
      runConfigInitCommand({ configPath });
      return;
    case "check":
      runConfigCheckCommand({ configPath });
      return;
    default:
      throw new Error(`unknown config subcommand: ${subcommand ?? "(none)"}. Use init or check.`);
  }
};

export const main = async (argv = process.argv.slice(2)) => {
  const args = parseArgs(argv);
  const configPath = readOptionalString(args.config, "--config");

  if (args.command === "config") {
    runConfigCommand(args.subcommand, configPath);
    return;
  }
  if (args.command) {
    throw new Error(`unknown command: ${args.command}`);
  }

  const envFile = readOptionalString(args.envFile, "--env-file");
  if (envFile) {
    loadEnvFile(envFile);
  }

  const { config } = loadConfig({ configPath });
  await runDashboard({ config, initial: resolveInitialView(args) });
};

if (process.env.NODE_ENV !== "test") {
  main()
    .then(() => {
      // In-flight requests are abandoned on quit.
      process.exit(0);
    })
    .catch((error) => {
      console.error(error instanceof Error ? error.message : error);
      process.exit(1);
    });
}
