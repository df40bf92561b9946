#!/usr/bin/env node
/**
 * layout.ts: Lay out a JSON layout document and print the bounds.
 *
 * Usage:
 *   npx tsx scripts/layout.ts <document.json> [--sizes]
 *
 * Options:
 *   --sizes   Also print preferred/minimum/maximum sizes
 *
 * Output (stdout):
 *   { "placements": [{ id, x, y, w, h }, ...] } in placement order.
 *
 * Exit codes:
 *   0 = laid out
 *   1 = layout error (invalid JSON or document, malformed spec text, multiple rest)
 *   2 = usage error or file not found
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { ZodError } from "zod";
import { parseLayoutDocument } from "../src/schema/document.js";
import { runLayoutDocument, type DocumentResult } from "../src/document/run-document.js";
import { MalformedSpecError, MultipleRestError } from "../src/errors.js";

// ── Parse args ──
const args = process.argv.slice(2);
const positional: string[] = [];
let showSizes = false;

for (const arg of args) {
  if (arg === "--sizes") {
    showSizes = true;
  } else {
    positional.push(arg);
  }
}

const docPath = positional[0];

if (!docPath) {
  const prog = process.argv[1];
  console.error(`Usage: ${prog} <document.json> [--sizes]`);
  console.error("");
  console.error("Lays out the children described by the document and prints their bounds.");
  console.error("Exit 0 = laid out, exit 1 = layout error, exit 2 = usage error.");
  process.exit(2);
}

if (!fs.existsSync(docPath)) {
  console.error(`Error: document not found: ${docPath}`);
  process.exit(2);
}

// ── Run ──
function main(file: string): number {
  const text = fs.readFileSync(path.resolve(file), "utf-8");

  let result: DocumentResult;
  try {
    const raw: unknown = JSON.parse(text);
    result = runLayoutDocument(parseLayoutDocument(raw));
  } catch (err) {
    if (err instanceof SyntaxError) {
      console.error(`Invalid JSON in ${file}: ${err.message}`);
      return 1;
    }
    if (err instanceof ZodError) {
      for (const issue of err.issues) {
        console.error(`Invalid document at ${issue.path.join(".") || "<root>"}: ${issue.message}`);
      }
      return 1;
    }
    if (err instanceof MalformedSpecError || err instanceof MultipleRestError) {
      console.error(`${err.name}: ${err.message}`);
      return 1;
    }
    throw err;
  }

  const output = showSizes
    ? result
    : { placements: result.placements };
  console.log(JSON.stringify(output, null, 2));
  return 0;
}

try {
  process.exit(main(docPath));
} catch (err) {
  console.error("Error:", err instanceof Error ? err.message : err);
  process.exit(2);
}
