import { type ConfigIssue, runConfigCheck } from "../../config";

const formatIssue = (issue: ConfigIssue) => `- ${issue.path}: ${issue.message}`;

export const runConfigCheckCommand = ({ configPath }: { configPath?: string | null } = {}) => {
  const result = runConfigCheck({ configPath });
  if (result.configPath == null) {
    throw new Error("config file is missing. Run `spendtop config init` first.");
  }

  if (result.ok) {
    console.log(`[spendtop] Config check passed: ${result.configPath}`);
    return;
  }

  const lines = result.issues.map((issue) => formatIssue(issue)).join("\n");
  throw new Error([`config check failed: ${result.configPath}`, lines].join("\n"));
};
