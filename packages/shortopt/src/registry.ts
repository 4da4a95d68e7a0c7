// packages/shortopt/src/registry.ts
//
// Option registry: compiles a compact spec string or an explicit template list
// into descriptors, keeps the name -> descriptor lookup next to them.

import type { OptionDescriptor, OptionTemplate } from "shared-types";
import { ProgrammerError } from "./errors";
import { resolveFormat } from "./formats";

export const ARG_DELIMITER = ":";

export type Registry = {
  /** Registration order; help and verbose output follow it. */
  options: OptionDescriptor[];
  byName: Map<string, OptionDescriptor>;
};

export function createRegistry(): Registry {
  return { options: [], byName: new Map() };
}

function isSeparator(ch: string): boolean {
  return /\s/.test(ch);
}

function assertValidName(name: string): void {
  if ([...name].length !== 1) {
    throw new ProgrammerError(`option name must be a single character, got '${name}'`);
  }
  if (name === ARG_DELIMITER || isSeparator(name)) {
    throw new ProgrammerError(`'${name}' cannot be used as an option name`);
  }
}

function assertEmpty(registry: Registry): void {
  if (registry.options.length > 0) {
    throw new ProgrammerError("registry already holds options; reset it before registering again");
  }
}

function register(registry: Registry, opt: OptionDescriptor): void {
  assertValidName(opt.name);
  if (registry.byName.has(opt.name)) {
    throw new ProgrammerError(`duplicate option: '-${opt.name}'`);
  }
  registry.options.push(opt);
  registry.byName.set(opt.name, opt);
}

/**
 * Registers options from a compact spec such as `"vn:f:h"`.
 * A character directly followed by `:` takes an argument, any other character
 * is a flag. Whitespace only separates groups.
 */
export function setOptions(registry: Registry, spec: string): void {
  assertEmpty(registry);
  const chars = [...spec];
  for (let i = 0; i < chars.length; i++) {
    const ch = chars[i];
    if (ch === undefined || isSeparator(ch)) continue;
    if (ch === ARG_DELIMITER) {
      throw new ProgrammerError(`'${ARG_DELIMITER}' without an option in spec "${spec}" (position ${i})`);
    }
    const takesArgument = chars[i + 1] === ARG_DELIMITER;
    register(registry, { name: ch, takesArgument, used: false, values: [] });
    if (takesArgument) i++;
  }
}

/** Registers options verbatim from an explicit list. */
export function setOptionList(registry: Registry, templates: readonly OptionTemplate[]): void {
  assertEmpty(registry);
  for (const t of templates) {
    const opt: OptionDescriptor = { name: t.name, takesArgument: t.takesArgument, used: false, values: [] };
    if (t.description !== undefined) opt.description = t.description;
    if (t.format !== undefined) opt.format = t.format;
    register(registry, opt);
  }
}

export function findOption(registry: Registry, name: string): OptionDescriptor | undefined {
  return registry.byName.get(name);
}

/** Attaches a value format and help text. Both may be left out. */
export function describeOption(
  registry: Registry,
  name: string,
  format: string | null | undefined,
  description: string | null | undefined
): void {
  const opt = findOption(registry, name);
  if (!opt) throw new ProgrammerError(`cannot describe unknown option: '-${name}'`);
  const resolved = resolveFormat(format);
  if (resolved === undefined) delete opt.format;
  else opt.format = resolved;
  if (description === null || description === undefined) delete opt.description;
  else opt.description = description;
}

/** Returns the descriptor when the option appeared on the command line. */
export function useOption(registry: Registry, name: string): OptionDescriptor | undefined {
  const opt = findOption(registry, name);
  return opt?.used ? opt : undefined;
}

export function valueCount(registry: Registry, name: string): number {
  return findOption(registry, name)?.values.length ?? 0;
}

/** Teardown. The registry can be registered again afterwards. */
export function resetRegistry(registry: Registry): void {
  for (const opt of registry.options) opt.values.length = 0;
  registry.options.length = 0;
  registry.byName.clear();
}
