import fs from "node:fs";
import path from "node:path";

export const CONFIG_FILE_BASENAMES = ["config.yml", "config.yaml", "config.json"] as const;

export const isMissingFileError = (error: unknown) =>
  error instanceof Error && "code" in error && error.code === "ENOENT";

const isRegularFile = (targetPath: string, readErrorPrefix: string) => {
  try {
    return fs.statSync(targetPath).isFile();
  } catch (error) {
    if (isMissingFileError(error)) {
      return false;
    }
    throw new Error(`${readErrorPrefix}: ${targetPath}`);
  }
};

/**
 * First candidate that exists as a regular file, or null. Directories and
 * other non-files are skipped; any other stat failure is reported with
 * `readErrorPrefix`.
 */
export const resolveFirstExistingPath = ({
  candidatePaths,
  readErrorPrefix,
}: {
  candidatePaths: readonly string[];
  readErrorPrefix: string;
}) => candidatePaths.find((candidate) => isRegularFile(candidate, readErrorPrefix)) ?? null;

export const resolveConfigFilePath = ({
  configDir,
  readErrorPrefix,
  basenames = CONFIG_FILE_BASENAMES,
}: {
  configDir: string;
  readErrorPrefix: string;
  basenames?: readonly string[];
}) =>
  resolveFirstExistingPath({
    candidatePaths: basenames.map((basename) => path.join(configDir, basename)),
    readErrorPrefix,
  });
