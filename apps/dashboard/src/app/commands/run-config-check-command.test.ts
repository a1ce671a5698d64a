import { beforeEach, describe, expect, it, vi } from "vitest";

const mocks = vi.hoisted(() => ({
  runConfigCheck: vi.fn(),
}));

vi.mock("../../config", () => ({
  runConfigCheck: mocks.runConfigCheck,
}));

import { runConfigCheckCommand } from "./run-config-check-command";

describe("runConfigCheckCommand", () => {
  beforeEach(() => {
    mocks.runConfigCheck.mockReset();
  });

  it("throws init guidance when the config file is missing", () => {
    mocks.runConfigCheck.mockReturnValue({ ok: false, configPath: null, issues: [] });

    expect(() => runConfigCheckCommand()).toThrow(/spendtop config init/);
  });

  it("prints success message when config has no issues", () => {
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    mocks.runConfigCheck.mockReturnValue({ ok: true, configPath: "/tmp/config.yml", issues: [] });

    runConfigCheckCommand({ configPath: "/tmp/config.yml" });

    expect(mocks.runConfigCheck).toHaveBeenCalledWith({ configPath: "/tmp/config.yml" });
    expect(logSpy).toHaveBeenCalledWith("[spendtop] Config check passed: /tmp/config.yml");
    logSpy.mockRestore();
  });

  it("lists every issue when validation fails", () => {
    mocks.runConfigCheck.mockReturnValue({
      ok: false,
      configPath: "/tmp/config.yml",
      issues: [
        { path: "fetch.timeoutMs", message: "Expected number, received string" },
        { path: "chart", message: "Unrecognized key(s) in object: 'colors'" },
      ],
    });

    expect(() => runConfigCheckCommand()).toThrow(
      [
        "config check failed: /tmp/config.yml",
        "- fetch.timeoutMs: Expected number, received string",
        "- chart: Unrecognized key(s) in object: 'colors'",
      ].join("\n"),
    );
  });
});
