import { describe, it, expect } from "vitest";
import * as fs from "node:fs";
import { fileURLToPath } from "node:url";
import { ZodError } from "zod";
import { parseLayoutDocument } from "../../src/schema/document.js";
import { runLayoutDocument } from "../../src/document/run-document.js";
import { MalformedSpecError, MultipleRestError } from "../../src/errors.js";

function loadFixture(name: string): unknown {
  const file = fileURLToPath(new URL(`../fixtures/${name}`, import.meta.url));
  return JSON.parse(fs.readFileSync(file, "utf-8"));
}

describe("layout documents", () => {
  describe("runLayoutDocument", () => {
    it("lays out the toolbar fixture", () => {
      const result = runLayoutDocument(parseLayoutDocument(loadFixture("toolbar.json")));

      expect(result.preferred).toEqual({ w: 400, h: 32 });
      expect(result.minimum).toEqual({ w: 92, h: 26 });
      expect(result.maximum).toEqual({ w: 400, h: 82 });
      expect(result.placements).toEqual([
        { id: "logo", x: 0, y: 4, w: 32, h: 32 },
        { id: "title", x: 36, y: 6, w: 120, h: 20 },
        { id: "fill", x: 156, y: 20, w: 216, h: 0 },
        { id: "close", x: 372, y: 16, w: 24, h: 24 },
      ]);
    });

    it("centres children without a spec at their preferred size", () => {
      const doc = parseLayoutDocument({
        region: { w: 100, h: 100 },
        children: [{ id: "only", preferred: { w: 30, h: 10 } }],
      });
      expect(runLayoutDocument(doc).placements).toEqual([
        { id: "only", x: 35, y: 45, w: 30, h: 10 },
      ]);
    });

    it("names the child whose spec text is malformed", () => {
      const doc = parseLayoutDocument({
        region: { w: 100, h: 100 },
        children: [{ id: "bad", spec: "CENTER 1 2" }],
      });
      expect(() => runLayoutDocument(doc)).toThrow(MalformedSpecError);
      expect(() => runLayoutDocument(doc)).toThrow('child "bad": expected 11 fields, got 3');
    });

    it("propagates MultipleRestError", () => {
      const rest = { width: { type: "rest" }, height: { type: "absolute", value: 5 } };
      const doc = parseLayoutDocument({
        region: { w: 100, h: 20 },
        axis: "horizontal",
        children: [
          { id: "a", spacer: rest },
          { id: "b", spacer: rest },
        ],
      });
      expect(() => runLayoutDocument(doc)).toThrow(MultipleRestError);
    });
  });

  describe("parseLayoutDocument", () => {
    it("rejects duplicate ids", () => {
      expect(() =>
        parseLayoutDocument({
          region: { w: 10, h: 10 },
          children: [{ id: "a" }, { id: "a" }],
        })
      ).toThrow("Duplicate id found in children");
    });

    it("rejects a child with both spec and spacer", () => {
      expect(() =>
        parseLayoutDocument({
          region: { w: 10, h: 10 },
          children: [
            {
              id: "a",
              spec: "CENTER 0 0 0 0 ABSOLUTE ABSOLUTE 1 1 10 10",
              spacer: { width: { type: "rest" }, height: { type: "rest" } },
            },
          ],
        })
      ).toThrow("A child cannot have both spec and spacer");
    });

    it("rejects a negative region", () => {
      expect(() =>
        parseLayoutDocument({ region: { w: -1, h: 10 }, children: [] })
      ).toThrow(ZodError);
    });
  });
});
