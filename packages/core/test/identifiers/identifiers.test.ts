import { describe, it, expect } from "vitest";
import { TemplateCompileError } from "../../src/errors.js";
import { quoteIdentifier } from "../../src/identifiers.js";

describe("quoteIdentifier", () => {
    it("should wrap names in double quotes and double embedded quotes", () => {
        expect(quoteIdentifier("jobs")).toBe('"jobs"');
        expect(quoteIdentifier('say "hi"')).toBe('"say ""hi"""');
        expect(quoteIdentifier("Mixed Case")).toBe('"Mixed Case"');
    });

    it("should reject empty, overlong and NUL-bearing names", () => {
        expect(() => quoteIdentifier("")).toThrow(TemplateCompileError);
        expect(() => quoteIdentifier("x".repeat(64))).toThrow(TemplateCompileError);
        expect(() => quoteIdentifier("a\0b")).toThrow(TemplateCompileError);
        expect(quoteIdentifier("x".repeat(63))).toBe(`"${"x".repeat(63)}"`);
    });
});
