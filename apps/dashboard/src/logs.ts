import fs from "node:fs/promises";
import path from "node:path";

import type { LogLevel } from "@spendtop/shared";

export const ensureDir = async (dir: string) => {
  await fs.mkdir(dir, { recursive: true, mode: 0o700 });
};

export const rotateLogIfNeeded = async (
  filePath: string,
  maxBytes: number,
  retainRotations: number,
) => {
  const stat = await fs.stat(filePath).catch(() => null);
  if (!stat || stat.size <= maxBytes) {
    return;
  }

  const dir = path.dirname(filePath);
  const base = path.basename(filePath);
  const rotatedPath = path.join(dir, `${base}.${Date.now()}`);
  await fs.rename(filePath, rotatedPath);

  const files = await fs.readdir(dir);
  const rotations = files
    .filter((name) => name.startsWith(`${base}.`))
    .map((name) => ({ name, fullPath: path.join(dir, name) }));
  if (rotations.length > retainRotations) {
    const sorted = rotations.sort((a, b) => a.name.localeCompare(b.name));
    const toDelete = sorted.slice(0, rotations.length - retainRotations);
    await Promise.all(toDelete.map((entry) => fs.unlink(entry.fullPath).catch(() => null)));
  }
};

export type LogFields = Record<string, string | number | boolean | null>;

export type Logger = {
  debug: (message: string, fields?: LogFields) => void;
  info: (message: string, fields?: LogFields) => void;
  warn: (message: string, fields?: LogFields) => void;
  error: (message: string, fields?: LogFields) => void;
};

export type FileLogger = Logger & {
  rotate: () => Promise<void>;
  flush: () => Promise<void>;
};

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

type FileLoggerOptions = {
  filePath: string;
  level: LogLevel;
  maxBytes: number;
  retainRotations: number;
  now?: () => Date;
};

/**
 * Appends one JSON object per line. Writes are serialized so lines keep
 * call order; rotation runs inside the same queue.
 */
export const createFileLogger = ({
  filePath,
  level,
  maxBytes,
  retainRotations,
  now = () => new Date(),
}: FileLoggerOptions): FileLogger => {
  let queue: Promise<void> = ensureDir(path.dirname(filePath)).catch(() => undefined);

  const enqueue = (task: () => Promise<void>) => {
    queue = queue.then(task).catch(() => undefined);
  };

  const write = (entryLevel: LogLevel, message: string, fields?: LogFields) => {
    if (LEVEL_WEIGHT[entryLevel] < LEVEL_WEIGHT[level]) {
      return;
    }
    const entry = { ...fields, at: now().toISOString(), level: entryLevel, message };
    const line = `${JSON.stringify(entry)}\n`;
    enqueue(() => fs.appendFile(filePath, line, { encoding: "utf8", mode: 0o600 }));
  };

  return {
    debug: (message, fields) => write("debug", message, fields),
    info: (message, fields) => write("info", message, fields),
    warn: (message, fields) => write("warn", message, fields),
    error: (message, fields) => write("error", message, fields),
    rotate: () => {
      enqueue(() => rotateLogIfNeeded(filePath, maxBytes, retainRotations));
      return queue;
    },
    flush: () => queue,
  };
};
