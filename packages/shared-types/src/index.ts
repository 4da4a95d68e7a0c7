// packages/shared-types/src/index.ts
//
// Canonical contract types shared across shortopt and optcheck.
// NO runtime logic — only types.

/* ------------------------------------------------------------------ */
/*  Primitives                                                         */
/* ------------------------------------------------------------------ */

export type ValueFormat = "int" | "float" | "string" | "bool";

export type OptionValue = number | string | boolean;

export type UsageErrorKind = "unknown_option" | "missing_argument";

/* ------------------------------------------------------------------ */
/*  Options                                                            */
/* ------------------------------------------------------------------ */

/** Registration input for one option (explicit list form). */
export type OptionTemplate = {
    name: string;
    takesArgument: boolean;
    description?: string;
    format?: ValueFormat;
};

/** Registry record for one option. `values` is in command-line order. */
export type OptionDescriptor = {
    name: string;
    takesArgument: boolean;
    description?: string;
    format?: ValueFormat;
    used: boolean;
    values: string[];
};

/* ------------------------------------------------------------------ */
/*  optcheck report                                                    */
/* ------------------------------------------------------------------ */

export type OptionReport = {
    name: string;
    takesArgument: boolean;
    description: string | null;
    format: ValueFormat | null;
    used: boolean;
    values: string[];
    converted: OptionValue[];
};

export type OptcheckReport = {
    argv: string[];
    options: OptionReport[];
};

export type OptionListFile = {
    options: OptionTemplate[];
};
