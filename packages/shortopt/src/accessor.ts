// packages/shortopt/src/accessor.ts
//
// Typed reads from the value store. A miss is `undefined`, never an error,
// and reads never touch stored values.

import type { OptionValue } from "shared-types";
import { convertValue } from "./formats";
import { findOption, type Registry } from "./registry";

/**
 * Converts the index-th value of an option with its registered format.
 * Misses: unknown or unused option, flag, no format, index out of range,
 * nothing parsable.
 */
export function getValue(registry: Registry, name: string, index = 0): OptionValue | undefined {
  const opt = findOption(registry, name);
  if (!opt || !opt.used || !opt.takesArgument || !opt.format) return undefined;
  if (!Number.isInteger(index) || index < 0 || index >= opt.values.length) return undefined;
  const raw = opt.values[index];
  if (raw === undefined) return undefined;
  return convertValue(raw, opt.format);
}

export function getString(registry: Registry, name: string, index = 0): string | undefined {
  const v = getValue(registry, name, index);
  return typeof v === "string" ? v : undefined;
}

export function getNumber(registry: Registry, name: string, index = 0): number | undefined {
  const v = getValue(registry, name, index);
  return typeof v === "number" ? v : undefined;
}

export function getBoolean(registry: Registry, name: string, index = 0): boolean | undefined {
  const v = getValue(registry, name, index);
  return typeof v === "boolean" ? v : undefined;
}

/** Converted values from index 0 up to the first miss. */
export function* eachValue(registry: Registry, name: string): Generator<OptionValue, void, undefined> {
  for (let i = 0; ; i++) {
    const v = getValue(registry, name, i);
    if (v === undefined) return;
    yield v;
  }
}
