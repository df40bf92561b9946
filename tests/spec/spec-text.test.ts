import { describe, it, expect } from "vitest";
import { parseSpecText, formatSpecText, formatDecimal } from "../../src/spec/spec-text.js";
import { buildChildSpec } from "../../src/spec/child-spec.js";
import { MalformedSpecError } from "../../src/errors.js";
import { UNBOUNDED } from "../../src/constants.js";

/** Run `fn` and return the MalformedSpecError it throws */
function malformed(fn: () => unknown): MalformedSpecError {
  try {
    fn();
  } catch (err) {
    if (err instanceof MalformedSpecError) return err;
    throw err;
  }
  throw new Error("expected MalformedSpecError");
}

describe("spec text", () => {
  describe("parseSpecText", () => {
    it("parses all eleven fields", () => {
      const spec = parseSpecText(
        "CENTER 1.0 2.0 3.0 4.0 PERCENT ABSOLUTE 50.0 40.0 300 2147483647"
      );
      expect(spec).toEqual({
        alignment: "center",
        margin: { left: 1, right: 2, top: 3, bottom: 4 },
        width: { type: "percent", value: 50 },
        height: { type: "absolute", value: 40 },
        maxWidth: 300,
        maxHeight: UNBOUNDED,
      });
    });

    it("maps LEFT and RIGHT to start and end", () => {
      const left = parseSpecText("LEFT 0 0 0 0 ABSOLUTE ABSOLUTE 1 1 10 10");
      const right = parseSpecText("RIGHT 0 0 0 0 ABSOLUTE ABSOLUTE 1 1 10 10");
      expect(left.alignment).toBe("start");
      expect(right.alignment).toBe("end");
    });

    it("drops the value of square and rest sizes", () => {
      const spec = parseSpecText("CENTER 0 0 0 0 SQUARE REST 7.0 9.0 10 10");
      expect(spec.width).toEqual({ type: "square" });
      expect(spec.height).toEqual({ type: "rest" });
    });

    it("keeps the value of ratio sizes", () => {
      const spec = parseSpecText("CENTER 0 0 0 0 RATIO ABSOLUTE 1.5 20 10 10");
      expect(spec.width).toEqual({ type: "ratio", value: 1.5 });
    });

    it("accepts extra whitespace between fields", () => {
      const spec = parseSpecText("  CENTER\t0 0  0 0 ABSOLUTE ABSOLUTE 5 6 10 10\n");
      expect(spec.width).toEqual({ type: "absolute", value: 5 });
      expect(spec.height).toEqual({ type: "absolute", value: 6 });
    });

    it("accepts the negative intrinsic-size sentinel and exponents", () => {
      const spec = parseSpecText("CENTER 0 0 0 0 ABSOLUTE ABSOLUTE -1.0 1e2 10 10");
      expect(spec.width).toEqual({ type: "absolute", value: -1 });
      expect(spec.height).toEqual({ type: "absolute", value: 100 });
    });

    it("returns a frozen spec", () => {
      const spec = parseSpecText("CENTER 0 0 0 0 ABSOLUTE ABSOLUTE 5 6 10 10");
      expect(Object.isFrozen(spec)).toBe(true);
      expect(Object.isFrozen(spec.margin)).toBe(true);
    });

    it("rejects the wrong number of fields", () => {
      const err = malformed(() => parseSpecText("CENTER 0 0 0 0 ABSOLUTE ABSOLUTE 5"));
      expect(err.detail).toBe("expected 11 fields, got 8");
      expect(err.text).toBe("CENTER 0 0 0 0 ABSOLUTE ABSOLUTE 5");
    });

    it("rejects an empty string", () => {
      const err = malformed(() => parseSpecText(""));
      expect(err.detail).toBe("expected 11 fields, got 0");
    });

    it("rejects an unknown alignment name", () => {
      const err = malformed(() =>
        parseSpecText("TOP 0 0 0 0 ABSOLUTE ABSOLUTE 5 6 10 10")
      );
      expect(err.detail.startsWith("ALIGN: ")).toBe(true);
    });

    it("rejects lower-case size type names", () => {
      const err = malformed(() =>
        parseSpecText("CENTER 0 0 0 0 absolute ABSOLUTE 5 6 10 10")
      );
      expect(err.detail.startsWith("WIDTHTYPE: ")).toBe(true);
    });

    it("rejects a non-numeric value", () => {
      const err = malformed(() =>
        parseSpecText("CENTER 0 0 0 0 ABSOLUTE ABSOLUTE abc 6 10 10")
      );
      expect(err.detail).toBe("WIDTH: not a decimal number");
    });

    it("rejects a fractional max size", () => {
      const err = malformed(() =>
        parseSpecText("CENTER 0 0 0 0 ABSOLUTE ABSOLUTE 5 6 1.5 10")
      );
      expect(err.detail).toBe("MAXW: not an integer");
    });

    it("rejects a max size outside int32", () => {
      const err = malformed(() =>
        parseSpecText("CENTER 0 0 0 0 ABSOLUTE ABSOLUTE 5 6 10 2147483648")
      );
      expect(err.detail.startsWith("MAXH: ")).toBe(true);
    });

    it("rejects a negative margin", () => {
      const err = malformed(() =>
        parseSpecText("CENTER 0 0 -2 0 ABSOLUTE ABSOLUTE 5 6 10 10")
      );
      expect(err.detail.startsWith("TOP: ")).toBe(true);
    });
  });

  describe("formatSpecText", () => {
    it("writes integral decimals with a trailing .0", () => {
      const spec = buildChildSpec(
        "end",
        { left: 1.5, right: 0, top: 2, bottom: 0 },
        { type: "ratio", value: 0.5 },
        { type: "absolute", value: -1 },
        120
      );
      expect(formatSpecText(spec)).toBe(
        "RIGHT 1.5 0.0 2.0 0.0 RATIO ABSOLUTE 0.5 -1.0 120 2147483647"
      );
    });

    it("writes 0.0 for square and rest values", () => {
      const spec = buildChildSpec(
        "start",
        { left: 0, right: 0, top: 0, bottom: 0 },
        { type: "square" },
        { type: "rest" }
      );
      expect(formatSpecText(spec)).toBe(
        "LEFT 0.0 0.0 0.0 0.0 SQUARE REST 0.0 0.0 2147483647 2147483647"
      );
    });

    it("produces text that parses back to the same spec", () => {
      const spec = buildChildSpec(
        "center",
        { left: 3, right: 4.25, top: 0, bottom: 8 },
        { type: "percent", value: 33.3 },
        { type: "square" },
        640,
        480
      );
      expect(parseSpecText(formatSpecText(spec))).toEqual(spec);
    });
  });

  describe("formatDecimal", () => {
    it("formats integers and fractions", () => {
      expect(formatDecimal(12)).toBe("12.0");
      expect(formatDecimal(-3)).toBe("-3.0");
      expect(formatDecimal(0.25)).toBe("0.25");
    });
  });
});
