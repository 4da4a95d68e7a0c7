// apps/optcheck/src/optcheck.ts
//
// Shows how an option specification parses an argument vector.
// optcheck's own options are parsed with shortopt as well.

import path from "node:path";
import type { OptionTemplate } from "shared-types";
import {
  UsageError,
  createRegistry,
  describeOption,
  findOption,
  formatVerbose,
  getString,
  setOptionList,
  setOptions,
  trackArgs,
  useOption,
} from "shortopt";
import { buildReport } from "./report";

export const OPTCHECK_SPEC = "hjs:l:d:";

export const HELP_TEXT = `
Usage:
  optcheck [-h] [-j] (-s <spec> | -l <file>) [-d <name>:<format>:<text>]... -- <args...>

Options:
  -h                        Show this help
  -j                        Print a JSON report instead of the verbose table
  -s <spec>                 Compact option spec, e.g. "vn:f:h" (':' = takes an argument)
  -l <file>                 JSON option list: { "options": [{ "name", "takesArgument", "description", "format" }] }
  -d <name>:<format>:<text> Attach a value format (int|float|string|bool or %d|%lf|%s|%b) and help text; repeatable

Everything after the first "--" is the argument vector to analyse.

Environment:
  OPTCHECK_OUTPUT           table (default) or json
  INIT_CWD                  Root for relative -l paths (set by npm; default: cwd)

Exit codes:
  0   success
  1   runtime error
  2   bad arguments / usage
  70  invalid option spec, list or description

Examples:
  optcheck -s "vn:f:b:p:h" -d n:int:Number -d f:%s:Filename -- -vn 42 -fdata.txt
  optcheck -j -l options.json -- -t 1 -t 2
`.trim();

export type OutputMode = "table" | "json";

export type DescribeEntry = {
  name: string;
  format: string | null;
  description: string | null;
};

export type OptcheckConfig = {
  help: boolean;
  output: OutputMode;
  spec: string | null;
  listPath: string | null;
  describe: DescribeEntry[];
  /** Target argv, program name included. */
  targetArgv: string[];
};

export class CliUsageError extends Error {
  public readonly exitCode = 2;
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

export function parseOutputMode(raw: string | undefined): OutputMode {
  if (raw === undefined || raw === "") return "table";
  if (raw === "table" || raw === "json") return raw;
  throw new CliUsageError(`OPTCHECK_OUTPUT must be one of: table, json (got '${raw}')\n\n${HELP_TEXT}`);
}

/** `n:int:Count` -> name n, format int, description Count. Format and text are optional. */
export function parseDescribeEntry(raw: string): DescribeEntry {
  const first = raw.indexOf(":");
  if (first === -1) return { name: raw, format: null, description: null };
  const second = raw.indexOf(":", first + 1);
  const name = raw.slice(0, first);
  if (second === -1) return { name, format: raw.slice(first + 1), description: null };
  return { name, format: raw.slice(first + 1, second), description: raw.slice(second + 1) };
}

export function parseOptcheckArgs(argv: string[], env: NodeJS.ProcessEnv = process.env): OptcheckConfig {
  const sep = argv.indexOf("--");
  const own = sep === -1 ? argv : argv.slice(0, sep);
  const target = sep === -1 ? [] : argv.slice(sep + 1);

  const reg = createRegistry();
  setOptions(reg, OPTCHECK_SPEC);
  describeOption(reg, "s", "string", null);
  describeOption(reg, "l", "string", null);
  describeOption(reg, "d", "string", null);
  try {
    trackArgs(reg, ["optcheck", ...own]);
  } catch (err) {
    if (err instanceof UsageError) throw new CliUsageError(`${err.message}\n\n${HELP_TEXT}`);
    throw err;
  }

  const help = useOption(reg, "h") !== undefined;
  const spec = getString(reg, "s") ?? null;
  const listPath = getString(reg, "l") ?? null;
  if (!help) {
    if (spec === null && listPath === null) {
      throw new CliUsageError(`One of -s or -l is required.\n\n${HELP_TEXT}`);
    }
    if (spec !== null && listPath !== null) {
      throw new CliUsageError(`-s and -l cannot be combined.\n\n${HELP_TEXT}`);
    }
  }

  const describe = (useOption(reg, "d")?.values ?? []).map(parseDescribeEntry);

  return {
    help,
    output: useOption(reg, "j") ? "json" : parseOutputMode(env.OPTCHECK_OUTPUT),
    spec,
    listPath,
    describe,
    targetArgv: ["prog", ...target],
  };
}

export function resolveFromRoot(projectRoot: string, p: string): string {
  if (path.isAbsolute(p)) return p;
  return path.resolve(projectRoot, p);
}

/**
 * Registers, describes and tracks; returns the text to print.
 * Usage errors from the target argv propagate as shortopt UsageError.
 */
export function runOptcheck(cfg: OptcheckConfig, list: OptionTemplate[] | null): string {
  const reg = createRegistry();
  if (list !== null) setOptionList(reg, list);
  else setOptions(reg, cfg.spec ?? "");

  for (const d of cfg.describe) {
    // a -d without text keeps the description from the list
    describeOption(reg, d.name, d.format, d.description ?? findOption(reg, d.name)?.description);
  }

  trackArgs(reg, cfg.targetArgv);

  if (cfg.output === "json") return JSON.stringify(buildReport(reg, cfg.targetArgv), null, 2);
  return formatVerbose(reg);
}
