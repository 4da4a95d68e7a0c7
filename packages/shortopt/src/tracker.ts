// packages/shortopt/src/tracker.ts
//
// Single left-to-right pass over argv. Marks options as used and collects
// their values. Only the last option of a combined group (-vf) may take an
// argument; its value is either the rest of the token (-fdata.txt) or the
// next argument (-f data.txt).

import { UsageError } from "./errors";
import { findOption, type Registry } from "./registry";

export const OPTION_MARKER = "-";

export type TrackResult = { ok: true } | { ok: false; error: UsageError };

/**
 * Tracks `argv` (argv[0] is the program name and is skipped).
 * Throws UsageError on an unknown option or a missing argument; options seen
 * before the failure stay marked.
 */
export function trackArgs(registry: Registry, argv: readonly string[]): void {
  for (let i = 1; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined || !arg.startsWith(OPTION_MARKER)) continue;

    const names = [...arg].slice(1);
    let pendingIdx = -1;
    for (let j = 0; j < names.length; j++) {
      const name = names[j];
      if (name === undefined) break;
      const opt = findOption(registry, name);
      if (!opt) throw new UsageError("unknown_option", name, arg);
      opt.used = true;

      if (opt.takesArgument) {
        const rest = names.slice(j + 1).join("");
        if (rest.length > 0) opt.values.push(rest);
        else pendingIdx = j;
        break;
      }
    }

    if (pendingIdx === -1) continue;

    i++;
    const value = argv[i];
    if (value === undefined) {
      throw new UsageError("missing_argument", names[pendingIdx] ?? "", arg);
    }
    // scanning stopped at the first argument-taking option, so it owns the value
    for (const name of names) {
      const opt = findOption(registry, name);
      if (opt?.takesArgument) {
        opt.values.push(value);
        break;
      }
    }
  }
}

/** Like trackArgs, but hands usage errors back instead of throwing them. */
export function tryTrackArgs(registry: Registry, argv: readonly string[]): TrackResult {
  try {
    trackArgs(registry, argv);
    return { ok: true };
  } catch (err) {
    if (err instanceof UsageError) return { ok: false, error: err };
    throw err;
  }
}
