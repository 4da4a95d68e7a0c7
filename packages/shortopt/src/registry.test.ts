// packages/shortopt/src/registry.test.ts
import { describe, it, expect } from "vitest";
import { ProgrammerError } from "./errors";
import {
  createRegistry,
  describeOption,
  findOption,
  resetRegistry,
  setOptionList,
  setOptions,
  useOption,
  valueCount,
} from "./registry";
import { trackArgs } from "./tracker";

function kinds(spec: string): Array<[string, boolean]> {
  const reg = createRegistry();
  setOptions(reg, spec);
  return reg.options.map((o): [string, boolean] => [o.name, o.takesArgument]);
}

describe("setOptions", () => {
  it("marks options followed by ':' as taking an argument", () => {
    expect(kinds("vn:f:b:p:h")).toEqual([
      ["v", false],
      ["n", true],
      ["f", true],
      ["b", true],
      ["p", true],
      ["h", false],
    ]);
  });

  it("treats a trailing ':' as an argument marker for the last option", () => {
    expect(kinds("hvn:f:")).toEqual([
      ["h", false],
      ["v", false],
      ["n", true],
      ["f", true],
    ]);
  });

  it("ignores whitespace between groups", () => {
    expect(kinds("ab c: d")).toEqual([
      ["a", false],
      ["b", false],
      ["c", true],
      ["d", false],
    ]);
  });

  it("builds an empty registry from an empty spec", () => {
    expect(kinds("")).toEqual([]);
  });

  it("rejects a delimiter with no option before it", () => {
    expect(() => kinds(":a")).toThrow(ProgrammerError);
    expect(() => kinds("a::")).toThrow(ProgrammerError);
  });

  it("rejects duplicate option names", () => {
    expect(() => kinds("aba:")).toThrow("duplicate option: '-a'");
  });

  it("refuses to register twice without a reset", () => {
    const reg = createRegistry();
    setOptions(reg, "a");
    expect(() => setOptions(reg, "b")).toThrow(ProgrammerError);
  });
});

describe("setOptionList", () => {
  it("registers templates verbatim", () => {
    const reg = createRegistry();
    setOptionList(reg, [
      { name: "h", takesArgument: false, description: "Show help" },
      { name: "n", takesArgument: true, description: "Number (int)", format: "int" },
      { name: "z", takesArgument: true },
    ]);
    expect(reg.options).toEqual([
      { name: "h", takesArgument: false, description: "Show help", used: false, values: [] },
      { name: "n", takesArgument: true, description: "Number (int)", format: "int", used: false, values: [] },
      { name: "z", takesArgument: true, used: false, values: [] },
    ]);
  });

  it("rejects names that are not a single character", () => {
    const reg = createRegistry();
    expect(() => setOptionList(reg, [{ name: "ab", takesArgument: false }])).toThrow(
      "option name must be a single character, got 'ab'"
    );
    expect(() => setOptionList(createRegistry(), [{ name: "", takesArgument: false }])).toThrow(ProgrammerError);
    expect(() => setOptionList(createRegistry(), [{ name: ":", takesArgument: false }])).toThrow(ProgrammerError);
  });
});

describe("describeOption", () => {
  it("attaches format and description, accepting scanf aliases", () => {
    const reg = createRegistry();
    setOptions(reg, "n:f:h");
    describeOption(reg, "n", "%d", "Number (int)");
    describeOption(reg, "f", "string", "Filename");
    describeOption(reg, "h", null, "Help");
    expect(findOption(reg, "n")).toMatchObject({ format: "int", description: "Number (int)" });
    expect(findOption(reg, "f")).toMatchObject({ format: "string", description: "Filename" });
    expect(findOption(reg, "h")?.format).toBeUndefined();
  });

  it("fails on an unknown option", () => {
    const reg = createRegistry();
    setOptions(reg, "a");
    expect(() => describeOption(reg, "x", "%d", "nope")).toThrow("cannot describe unknown option: '-x'");
  });

  it("fails on an unknown format", () => {
    const reg = createRegistry();
    setOptions(reg, "a:");
    expect(() => describeOption(reg, "a", "%q", "nope")).toThrow("unknown value format: '%q'");
  });
});

describe("lookup and teardown", () => {
  it("useOption only returns used options", () => {
    const reg = createRegistry();
    setOptions(reg, "ab");
    trackArgs(reg, ["prog", "-a"]);
    expect(useOption(reg, "a")?.name).toBe("a");
    expect(useOption(reg, "b")).toBeUndefined();
    expect(useOption(reg, "x")).toBeUndefined();
  });

  it("valueCount is 0 for unknown names", () => {
    expect(valueCount(createRegistry(), "q")).toBe(0);
  });

  it("reset then re-register leaves nothing from the previous session", () => {
    const reg = createRegistry();
    setOptions(reg, "ab:");
    trackArgs(reg, ["prog", "-a", "-b", "x"]);
    resetRegistry(reg);
    resetRegistry(reg);
    setOptions(reg, "c:");
    expect(reg.options.map((o) => o.name)).toEqual(["c"]);
    expect(findOption(reg, "a")).toBeUndefined();
    expect(findOption(reg, "b")).toBeUndefined();
    expect(useOption(reg, "c")).toBeUndefined();
    expect(valueCount(reg, "c")).toBe(0);
  });

  it("keeps independent registries apart", () => {
    const one = createRegistry();
    const two = createRegistry();
    setOptions(one, "a");
    setOptions(two, "a");
    trackArgs(one, ["prog", "-a"]);
    expect(useOption(one, "a")).toBeDefined();
    expect(useOption(two, "a")).toBeUndefined();
  });
});
