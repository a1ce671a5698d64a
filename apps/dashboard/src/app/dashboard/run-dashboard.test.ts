import { configDefaults } from "@spendtop/shared";
import { describe, expect, it, vi } from "vitest";

import type { FileLogger } from "../../logs";
import type { KeyPress } from "../../tui/keymap";
import type { Terminal } from "../../tui/terminal";
import { readCredentialsFromEnv, runDashboard } from "./run-dashboard";

describe("readCredentialsFromEnv", () => {
  it("reads trimmed admin keys and skips blank ones", () => {
    expect(
      readCredentialsFromEnv({
        OPENAI_ADMIN_KEY: " test-secret ",
        ANTHROPIC_ADMIN_KEY: "   ",
      }),
    ).toEqual({ openai: "test-secret" });
    expect(readCredentialsFromEnv({})).toEqual({});
  });
});

describe("runDashboard", () => {
  const createFakes = () => {
    let keyHandler: (key: KeyPress) => void = () => {};
    const terminal: Terminal = {
      size: () => ({ width: 100, height: 30 }),
      draw: vi.fn(),
      onKey: (handler) => {
        keyHandler = handler;
      },
      onResize: vi.fn(),
      restore: vi.fn(),
    };
    const logger: FileLogger = {
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
      rotate: vi.fn(async () => {}),
      flush: vi.fn(async () => {}),
    };
    return { terminal, logger, press: (key: KeyPress) => keyHandler(key) };
  };

  it("restores the terminal and resolves when the user quits", async () => {
    const { terminal, logger, press } = createFakes();
    const sigintListeners = process.listenerCount("SIGINT");

    const running = runDashboard(
      { config: configDefaults, initial: {}, env: {} },
      {
        openTerminal: () => terminal,
        createLogger: () => logger,
        logPath: "/tmp/spendtop-test.log",
      },
    );
    expect(process.listenerCount("SIGINT")).toBe(sigintListeners + 1);

    press({ name: "q" });
    press({ name: "escape" });
    press({ name: "c", ctrl: true });
    await running;

    expect(terminal.restore).toHaveBeenCalledTimes(1);
    expect(logger.info).toHaveBeenCalledWith("dashboard stopped");
    expect(logger.flush).toHaveBeenCalled();
    expect(process.listenerCount("SIGINT")).toBe(sigintListeners);
  });
});
