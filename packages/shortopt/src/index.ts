// packages/shortopt/src/index.ts
//
// Short-option parser: register options, track argv, read typed values.

export type {
  OptionDescriptor,
  OptionTemplate,
  OptionValue,
  UsageErrorKind,
  ValueFormat,
} from "shared-types";

export { ProgrammerError, ShortoptError, UsageError } from "./errors";
export { VALUE_FORMATS, convertValue, isValueFormat, resolveFormat } from "./formats";
export {
  ARG_DELIMITER,
  createRegistry,
  describeOption,
  findOption,
  resetRegistry,
  setOptionList,
  setOptions,
  useOption,
  valueCount,
} from "./registry";
export type { Registry } from "./registry";
export { OPTION_MARKER, trackArgs, tryTrackArgs } from "./tracker";
export type { TrackResult } from "./tracker";
export { eachValue, getBoolean, getNumber, getString, getValue } from "./accessor";
export { formatHelp, formatVerbose, printHelp, printVerbose } from "./render";
export type { LineWriter } from "./render";
