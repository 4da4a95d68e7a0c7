// scripts/shortopt-list-example.ts
//
//   tsx scripts/shortopt-list-example.ts -h
//   tsx scripts/shortopt-list-example.ts -v -n 42 -f data.txt -b true -d 3.14
//   tsx scripts/shortopt-list-example.ts -vn 42 -fdata.txt -b1 -d2.5
import type { OptionTemplate } from "shared-types";
import { createRegistry, getBoolean, getNumber, getString, printHelp, setOptionList, tryTrackArgs, useOption } from "../packages/shortopt/src";

const options: OptionTemplate[] = [
  { name: "h", takesArgument: false, description: "Show help" },
  { name: "v", takesArgument: false, description: "Verbose mode" },
  { name: "n", takesArgument: true, description: "Number (int)", format: "int" },
  { name: "f", takesArgument: true, description: "Filename (string)", format: "string" },
  { name: "b", takesArgument: true, description: "Boolean flag", format: "bool" },
  { name: "d", takesArgument: true, description: "Double value", format: "float" },
];

const reg = createRegistry();
setOptionList(reg, options);

const tracked = tryTrackArgs(reg, process.argv.slice(1));
if (!tracked.ok) {
  console.error(`ERROR: ${tracked.error.message}`);
  printHelp(reg, console.error);
  process.exit(tracked.error.exitCode);
}

if (useOption(reg, "h")) {
  printHelp(reg);
  process.exit(0);
}

console.log("=== Parsing Results ===");

if (useOption(reg, "v")) console.log("Verbose mode: ON");

const number = getNumber(reg, "n");
if (number !== undefined) console.log(`Number: ${number}`);

const filename = getString(reg, "f");
if (filename !== undefined) console.log(`Filename: ${filename}`);

const flag = getBoolean(reg, "b");
if (flag !== undefined) console.log(`Boolean flag: ${flag ? "true" : "false"}`);

const value = getNumber(reg, "d");
if (value !== undefined) console.log(`Double value: ${value.toFixed(2)}`);

if (!useOption(reg, "x")) console.log("Option -x not used");
