import { metricSchema, providerIdSchema, rangeIdSchema } from "@spendtop/shared";
import type { ArgsDef, ParsedArgs as CittyParsedArgs } from "citty";
import { parseArgs as parseCittyArgs } from "citty";

import type { InitialView } from "../dashboard/dashboard-controller";

const cliArgDefinitions = {
  command: { type: "positional", required: false },
  subcommand: { type: "positional", required: false },
  envFile: { type: "string" },
  config: { type: "string" },
  provider: { type: "enum", options: [...providerIdSchema.options] },
  range: { type: "enum", options: [...rangeIdSchema.options] },
  metric: { type: "enum", options: [...metricSchema.options] },
} satisfies ArgsDef;

export type ParsedArgs = CittyParsedArgs<typeof cliArgDefinitions>;

const normalizeRawArgv = (argv: string[]) => argv.filter((token) => token !== "--");

export const parseArgs = (argv = process.argv.slice(2)): ParsedArgs =>
  parseCittyArgs<typeof cliArgDefinitions>(normalizeRawArgv(argv), cliArgDefinitions);

export const readOptionalString = (value: unknown, flag: string): string | null => {
  if (value == null) {
    return null;
  }
  if (value === true) {
    throw new Error(`${flag} requires a value.`);
  }
  if (typeof value !== "string") {
    return null;
  }
  const trimmed = value.trim();
  if (trimmed.length === 0) {
    throw new Error(`${flag} must not be empty.`);
  }
  return trimmed;
};

export const resolveInitialView = (args: ParsedArgs): InitialView => {
  const initial: InitialView = {};
  if (args.provider) {
    initial.provider = args.provider;
  }
  if (args.metric) {
    initial.metric = args.metric;
  }
  if (args.range) {
    initial.range = args.range;
  }
  return initial;
};

/**
 * Loads `KEY=value` lines into `process.env`. A file that cannot be read
 * is reported and skipped; variables already set win.
 */
export const loadEnvFile = (
  filePath: string,
  loader: (path: string) => void = (path) => process.loadEnvFile(path),
) => {
  try {
    loader(filePath);
    return true;
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    console.warn(`[spendtop] Failed to load env file: ${filePath} (${detail})`);
    return false;
  }
};
