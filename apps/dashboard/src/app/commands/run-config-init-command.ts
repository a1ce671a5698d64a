import { initConfig } from "../../config";

export const runConfigInitCommand = ({ configPath }: { configPath?: string | null } = {}) => {
  const result = initConfig({ configPath });
  if (!result.created) {
    console.log(`[spendtop] Config already exists: ${result.configPath}`);
    return;
  }
  console.log(`[spendtop] Created config: ${result.configPath}`);
};
