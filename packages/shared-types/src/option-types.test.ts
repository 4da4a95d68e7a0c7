// packages/shared-types/src/option-types.test.ts
//
// Shape checks for the option contract types.
// Confirms: optional metadata, report nulls instead of missing fields.

import { describe, it, expect } from "vitest";
import type { OptcheckReport, OptionDescriptor, OptionTemplate } from "./index";

describe("option contract types", () => {
    it("OptionTemplate is valid without description and format", () => {
        const t: OptionTemplate = { name: "v", takesArgument: false };
        expect(t.description).toBeUndefined();
        expect(t.format).toBeUndefined();
    });

    it("OptionDescriptor carries state and raw values", () => {
        const d: OptionDescriptor = {
            name: "t",
            takesArgument: true,
            format: "int",
            used: true,
            values: ["1", "2"],
        };
        expect(d.values).toHaveLength(2);
        expect(d.format).toBe("int");
    });

    it("OptcheckReport uses null for absent metadata", () => {
        const r: OptcheckReport = {
            argv: ["prog", "-v"],
            options: [
                {
                    name: "v",
                    takesArgument: false,
                    description: null,
                    format: null,
                    used: true,
                    values: [],
                    converted: [],
                },
            ],
        };
        expect(JSON.parse(JSON.stringify(r))).toEqual(r);
    });
});
