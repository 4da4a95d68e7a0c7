// packages/shortopt/src/render.ts
//
// Help and verbose listings. Pure string rendering; print* only forward the
// text to a sink.

import { OPTION_MARKER } from "./tracker";
import type { Registry } from "./registry";

const DESC_WIDTH = 20;
const VALUE_WIDTH = 10;
const ELLIPSIS = "...";

export type LineWriter = (text: string) => void;

function truncate(text: string, width: number): string {
  return text.length > width ? text.slice(0, width - ELLIPSIS.length) + ELLIPSIS : text;
}

function row(cells: string[]): string {
  return cells.join("  ").trimEnd();
}

/** `*` marks options that take an argument. */
export function formatHelp(registry: Registry): string {
  return registry.options
    .map((opt) => `${opt.takesArgument ? "*" : " "} ${OPTION_MARKER}${opt.name}    ${opt.description ?? ""}`.trimEnd())
    .join("\n");
}

export function formatVerbose(registry: Registry): string {
  const lines = [
    "",
    row(["Option", "Description".padEnd(DESC_WIDTH), "Used  ", "Type".padEnd(10), "Argument"]),
    row(["------", "-----------".padEnd(DESC_WIDTH), "----  ", "----".padEnd(10), "--------"]),
  ];
  for (const opt of registry.options) {
    lines.push(
      row([
        `${OPTION_MARKER}${opt.name}`.padEnd(6),
        truncate(opt.description ?? "", DESC_WIDTH).padEnd(DESC_WIDTH),
        (opt.used ? "yes" : "no").padEnd(6),
        (opt.takesArgument ? "with-arg" : "flag").padEnd(10),
        opt.values.map((v) => truncate(v, VALUE_WIDTH)).join(","),
      ])
    );
  }
  return lines.join("\n");
}

export function printHelp(registry: Registry, write: LineWriter = console.log): void {
  write(formatHelp(registry));
}

export function printVerbose(registry: Registry, write: LineWriter = console.log): void {
  write(formatVerbose(registry));
}
