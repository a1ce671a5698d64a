import type { ProviderId, ResolvedConfig } from "@spendtop/shared";
import { resolveLogPath } from "@spendtop/shared";

import { PROVIDER_IDS } from "../../domain/fetch/session-store";
import { createProviderClientFactory } from "../../domain/providers/create-provider-client";
import { describeError } from "../../domain/providers/provider-error";
import { createFileLogger } from "../../logs";
import { keyToCommand } from "../../tui/keymap";
import { renderFrame } from "../../tui/render";
import { openTerminal } from "../../tui/terminal";
import {
  createDashboardController,
  type Credentials,
  type InitialView,
} from "./dashboard-controller";
import { createDashboardLoop } from "./dashboard-loop";

export const CREDENTIAL_ENV_VARS = {
  openai: "OPENAI_ADMIN_KEY",
  anthropic: "ANTHROPIC_ADMIN_KEY",
} as const satisfies Record<ProviderId, string>;

const ROTATE_INTERVAL_MS = 60_000;

export const readCredentialsFromEnv = (env: NodeJS.ProcessEnv): Credentials => {
  const credentials: Credentials = {};
  PROVIDER_IDS.forEach((provider) => {
    const value = env[CREDENTIAL_ENV_VARS[provider]]?.trim();
    if (value) {
      credentials[provider] = value;
    }
  });
  return credentials;
};

type RunDashboardOptions = {
  config: ResolvedConfig;
  initial: InitialView;
  env?: NodeJS.ProcessEnv;
};

type RunDashboardDeps = {
  openTerminal?: typeof openTerminal;
  createLogger?: typeof createFileLogger;
  fetchImpl?: typeof fetch;
  logPath?: string;
};

/**
 * Runs the interactive dashboard until the user quits or the process is
 * signalled. The terminal is restored on every way out.
 */
export const runDashboard = (
  { config, initial, env = process.env }: RunDashboardOptions,
  deps: RunDashboardDeps = {},
): Promise<void> => {
  const logger = (deps.createLogger ?? createFileLogger)({
    filePath: deps.logPath ?? resolveLogPath(),
    level: config.logging.level,
    maxBytes: config.logging.maxBytes,
    retainRotations: config.logging.retainRotations,
  });
  const terminal = (deps.openTerminal ?? openTerminal)();

  return new Promise<void>((resolve, reject) => {
    let dirty = true;
    let finished = false;

    const controller = createDashboardController({
      config,
      initial,
      credentials: readCredentialsFromEnv(env),
      createClient: createProviderClientFactory(config, deps.fetchImpl),
      logger,
      onChange: () => {
        dirty = true;
      },
      onQuit: () => finish(null),
    });

    const loop = createDashboardLoop({
      intervalMs: config.ui.tickMs,
      rotateIntervalMs: ROTATE_INTERVAL_MS,
      redrawIfDirty: () => {
        if (!dirty || finished) {
          return;
        }
        dirty = false;
        const { width, height } = terminal.size();
        terminal.draw(renderFrame(controller.frame(width, height)).serialize());
      },
      rotateLog: logger.rotate,
    });

    const onSignal = (signal: NodeJS.Signals) => {
      logger.info("signal received", { signal });
      finish(null);
    };
    const onFatal = (error: unknown) => {
      logger.error("dashboard crashed", { error: describeError(error) });
      finish(error instanceof Error ? error : new Error(describeError(error)));
    };

    const finish = (error: Error | null) => {
      if (finished) {
        return;
      }
      finished = true;
      loop.stop();
      terminal.restore();
      process.off("SIGINT", onSignal);
      process.off("SIGTERM", onSignal);
      process.off("uncaughtException", onFatal);
      process.off("unhandledRejection", onFatal);
      logger.info("dashboard stopped");
      void logger.flush().then(() => (error ? reject(error) : resolve()));
    };

    process.on("SIGINT", onSignal);
    process.on("SIGTERM", onSignal);
    process.on("uncaughtException", onFatal);
    process.on("unhandledRejection", onFatal);

    terminal.onKey((key) => {
      const command = keyToCommand(key, controller.state());
      if (command) {
        controller.dispatch(command);
      }
    });
    terminal.onResize(() => {
      dirty = true;
    });

    logger.info("dashboard started", { provider: controller.state().provider });
    controller.start();
    loop.start();
  });
};
