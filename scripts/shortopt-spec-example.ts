// scripts/shortopt-spec-example.ts
//
//   tsx scripts/shortopt-spec-example.ts -h
//   tsx scripts/shortopt-spec-example.ts -v -n 42 -f data.txt -b true -p 3.14
//   tsx scripts/shortopt-spec-example.ts -vn 42 -fdata.txt -b1 -t 1 -t 2
import {
  ShortoptError,
  createRegistry,
  describeOption,
  eachValue,
  getBoolean,
  getNumber,
  getString,
  printHelp,
  printVerbose,
  resetRegistry,
  setOptions,
  trackArgs,
  useOption,
} from "../packages/shortopt/src";

function main(): void {
  const reg = createRegistry();
  setOptions(reg, "vn:f:b:p:t:h");

  describeOption(reg, "h", null, "Show this help message with detailed information about all options");
  describeOption(reg, "v", null, "Enable verbose output mode for debugging purposes");
  describeOption(reg, "n", "%d", "Number (int)");
  describeOption(reg, "f", "%s", "Filename (string)");
  describeOption(reg, "b", "%b", "Boolean (yes/no)");
  describeOption(reg, "p", "%lf", "Precision (float)");
  describeOption(reg, "t", "%d", "Tag, repeat for more (int)");

  // argv[0] is the script path
  trackArgs(reg, process.argv.slice(1));

  if (useOption(reg, "h")) {
    printHelp(reg);
  } else {
    const filename = getString(reg, "f");
    if (filename !== undefined) console.log(`filename: ${filename}`);

    const number = getNumber(reg, "n");
    if (number !== undefined) console.log(`number: ${number}`);

    const flag = getBoolean(reg, "b");
    if (flag !== undefined) console.log(`boolean: ${flag}`);

    const precision = getNumber(reg, "p");
    if (precision !== undefined) console.log(`precision: ${precision.toFixed(2)}`);

    let i = 0;
    for (const tag of eachValue(reg, "t")) console.log(`tag[${i++}]: ${tag}`);

    if (useOption(reg, "v")) printVerbose(reg);
  }

  resetRegistry(reg);
}

try {
  main();
} catch (err) {
  if (!(err instanceof ShortoptError)) throw err;
  console.error(`ERROR: ${err.message}`);
  process.exit(err.exitCode);
}
