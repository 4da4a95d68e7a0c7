// apps/optcheck/src/optionList.ts
//
// JSON option-list files: { "options": [{ name, takesArgument, description?, format? }] }

import { readFile } from "node:fs/promises";
import Ajv from "ajv";
import type { ErrorObject } from "ajv";
import type { OptionListFile, OptionTemplate } from "shared-types";
import { ProgrammerError, VALUE_FORMATS } from "shortopt";

export const OPTION_LIST_SCHEMA = {
  type: "object",
  required: ["options"],
  additionalProperties: false,
  properties: {
    options: {
      type: "array",
      items: {
        type: "object",
        required: ["name", "takesArgument"],
        additionalProperties: false,
        properties: {
          name: { type: "string", minLength: 1, maxLength: 1 },
          takesArgument: { type: "boolean" },
          description: { type: "string" },
          format: { type: "string", enum: [...VALUE_FORMATS] },
        },
      },
    },
  },
};

export class OptionListError extends ProgrammerError {
  constructor(message: string) {
    super(message);
    this.name = "OptionListError";
  }
}

const ajv = new Ajv({ allErrors: true, strict: false });
const validateOptionList = ajv.compile<OptionListFile>(OPTION_LIST_SCHEMA);

function describeErrors(errors: ErrorObject[] | null | undefined): string {
  return (errors ?? []).map((e) => `${e.instancePath || "/"} ${e.message ?? "is invalid"}`).join("; ");
}

/** Validates already-parsed JSON. */
export function parseOptionList(data: unknown, source = "option list"): OptionTemplate[] {
  if (!validateOptionList(data)) {
    throw new OptionListError(`Invalid ${source}: ${describeErrors(validateOptionList.errors)}`);
  }
  return data.options;
}

export async function readOptionList(filePath: string): Promise<OptionTemplate[]> {
  const raw = await readFile(filePath, "utf-8");
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    throw new OptionListError(`Invalid JSON in ${filePath}: ${err instanceof Error ? err.message : String(err)}`);
  }
  return parseOptionList(data, filePath);
}
