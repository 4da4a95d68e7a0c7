// apps/optcheck/src/report.ts
import type { OptcheckReport, OptionReport, OptionValue } from "shared-types";
import { eachValue, type Registry } from "shortopt";

/** JSON has no Infinity or NaN; those are written as strings. */
function jsonSafe(value: OptionValue): OptionValue {
  return typeof value === "number" && !Number.isFinite(value) ? String(value) : value;
}

export function buildReport(registry: Registry, argv: string[]): OptcheckReport {
  const options: OptionReport[] = registry.options.map((opt) => ({
    name: opt.name,
    takesArgument: opt.takesArgument,
    description: opt.description ?? null,
    format: opt.format ?? null,
    used: opt.used,
    values: [...opt.values],
    converted: [...eachValue(registry, opt.name)].map(jsonSafe),
  }));
  return { argv, options };
}
