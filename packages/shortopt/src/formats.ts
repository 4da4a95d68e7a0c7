// packages/shortopt/src/formats.ts
//
// Value formats: the closed set of conversions an option value can go through.

import type { OptionValue, ValueFormat } from "shared-types";
import { ProgrammerError } from "./errors";

export const VALUE_FORMATS: readonly ValueFormat[] = ["int", "float", "string", "bool"];

/** scanf-style spellings accepted wherever a format is registered. */
const FORMAT_ALIASES: Record<string, ValueFormat> = {
  "%d": "int",
  "%i": "int",
  "%ld": "int",
  "%f": "float",
  "%lf": "float",
  "%s": "string",
  "%b": "bool",
};

const TRUTHY = new Set(["true", "yes", "1", "on"]);

const INT_PREFIX = /^\s*([+-]?\d+)/;
const FLOAT_PREFIX = /^\s*([+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?)/;
const FLOAT_SPECIAL = /^\s*([+-]?)(infinity|inf|nan)/i;

export function isValueFormat(value: string): value is ValueFormat {
  return (VALUE_FORMATS as readonly string[]).includes(value);
}

/**
 * Normalizes a registered format. Empty and absent formats mean "no format";
 * anything else that is neither a known format nor an alias is rejected.
 */
export function resolveFormat(raw: string | null | undefined): ValueFormat | undefined {
  if (raw === null || raw === undefined || raw === "") return undefined;
  if (isValueFormat(raw)) return raw;
  const alias = FORMAT_ALIASES[raw];
  if (alias === undefined) throw new ProgrammerError(`unknown value format: '${raw}'`);
  return alias;
}

function parseIntPrefix(raw: string): number | undefined {
  const m = INT_PREFIX.exec(raw);
  if (!m?.[1]) return undefined;
  const n = Number.parseInt(m[1], 10);
  // beyond 2^53 the digits would be rounded
  return Number.isSafeInteger(n) ? n : undefined;
}

function parseFloatPrefix(raw: string): number | undefined {
  const special = FLOAT_SPECIAL.exec(raw);
  if (special?.[2]) {
    const sign = special[1] === "-" ? -1 : 1;
    return special[2].toLowerCase() === "nan" ? Number.NaN : sign * Number.POSITIVE_INFINITY;
  }
  const m = FLOAT_PREFIX.exec(raw);
  if (!m?.[1]) return undefined;
  return Number.parseFloat(m[1]);
}

/** Converts one raw value. undefined when nothing could be parsed. */
export function convertValue(raw: string, format: ValueFormat): OptionValue | undefined {
  switch (format) {
    case "string":
      return raw;
    case "bool":
      return TRUTHY.has(raw);
    case "int":
      return parseIntPrefix(raw);
    case "float":
      return parseFloatPrefix(raw);
  }
}
