// packages/shortopt/src/errors.ts
//
// Error taxonomy. UsageError comes from the command line and is recoverable;
// ProgrammerError means the registration does not match how it is used.
// A "no value" outcome is never an error: accessors return undefined.

import type { UsageErrorKind } from "shared-types";

export class ShortoptError extends Error {
  public readonly exitCode: number;
  constructor(message: string, exitCode: number) {
    super(message);
    this.name = "ShortoptError";
    this.exitCode = exitCode;
  }
}

export class ProgrammerError extends ShortoptError {
  constructor(message: string) {
    super(message, 70);
    this.name = "ProgrammerError";
  }
}

export class UsageError extends ShortoptError {
  public readonly kind: UsageErrorKind;
  public readonly option: string;
  public readonly arg: string;

  constructor(kind: UsageErrorKind, option: string, arg: string) {
    super(
      kind === "unknown_option"
        ? `unknown option: '-${option}'`
        : `option '${arg}' require argument but not supply`,
      2
    );
    this.name = "UsageError";
    this.kind = kind;
    this.option = option;
    this.arg = arg;
  }
}
