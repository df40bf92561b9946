import type { Rect, Size } from "../schema/geometry.js";
import type { LayoutHost } from "../schema/layout.js";
import type { DocumentChild, LayoutDocument } from "../schema/document.js";
import { buildChildSpec } from "../spec/child-spec.js";
import { MalformedSpecError } from "../errors.js";
import {
  addChild,
  addSpacer,
  createBoxLayout,
  layoutChildren,
  maximumSize,
  minimumSize,
  preferredSize,
  type BoxLayout,
} from "../engine/box-layout.js";

/** Bounds of one document child, keyed by its id */
export interface DocumentPlacement extends Rect {
  id: string;
}

export interface DocumentResult {
  preferred: Size;
  minimum: Size;
  maximum: Size;
  placements: DocumentPlacement[];
}

const NO_SIZE: Size = { w: 0, h: 0 };

function register(layout: BoxLayout<string>, child: DocumentChild): void {
  if (child.spacer) {
    addSpacer(layout, child.id, child.spacer.width, child.spacer.height);
    return;
  }

  const { spec } = child;
  if (spec === undefined || typeof spec === "string") {
    try {
      addChild(layout, child.id, spec);
    } catch (err) {
      if (err instanceof MalformedSpecError) {
        throw new MalformedSpecError(err.text, `child "${child.id}": ${err.detail}`);
      }
      throw err;
    }
    return;
  }

  addChild(
    layout,
    child.id,
    buildChildSpec(
      spec.alignment,
      spec.margin,
      spec.width,
      spec.height,
      spec.maxWidth,
      spec.maxHeight
    )
  );
}

/**
 * Lay out a parsed document. Children are identified by id; their intrinsic
 * sizes come from the document, and applied bounds are collected in order.
 */
export function runLayoutDocument(doc: LayoutDocument): DocumentResult {
  const byId = new Map<string, DocumentChild>();
  for (const child of doc.children) {
    byId.set(child.id, child);
  }

  const placements: DocumentPlacement[] = [];
  const host: LayoutHost<string> = {
    intrinsicPreferredSize: (id) => byId.get(id)?.preferred ?? NO_SIZE,
    intrinsicMinimumSize: (id) => byId.get(id)?.minimum ?? NO_SIZE,
    applyBounds: (id, bounds) => {
      placements.push({ id, ...bounds });
    },
  };

  const layout = createBoxLayout(host, { axis: doc.axis, spacing: doc.spacing });
  for (const child of doc.children) {
    register(layout, child);
  }

  const preferred = preferredSize(layout, doc.region);
  const minimum = minimumSize(layout, doc.region);
  const maximum = maximumSize(layout, doc.region);
  layoutChildren(layout, doc.region);

  return { preferred, minimum, maximum, placements };
}
