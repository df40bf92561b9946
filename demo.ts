/**
 * Demo: lay out a dialog's button row and a form column.
 *
 * Usage: npx tsx demo.ts
 *
 * Prints, for each layout:
 *   - preferred / minimum / maximum size
 *   - the bounds handed to the host, one line per child
 *   - each child's spec written back as spec text
 */

import {
  addChild,
  addSpacer,
  children,
  createBoxLayout,
  getChildSpec,
  layoutChildren,
  maximumSize,
  minimumSize,
  preferredSize,
  type BoxLayout,
} from "./src/engine/box-layout.js";
import { formatSpecText } from "./src/spec/spec-text.js";
import type { LayoutRegion, Rect, Size } from "./src/schema/geometry.js";
import type { LayoutHost } from "./src/schema/layout.js";

interface Widget {
  name: string;
  preferred: Size;
  minimum: Size;
  bounds?: Rect;
}

function widget(name: string, w: number, h: number): Widget {
  return { name, preferred: { w, h }, minimum: { w: Math.ceil(w / 2), h } };
}

const host: LayoutHost<Widget> = {
  intrinsicPreferredSize: (w) => w.preferred,
  intrinsicMinimumSize: (w) => w.minimum,
  applyBounds: (w, bounds) => {
    w.bounds = bounds;
  },
};

function fmt(size: Size): string {
  return `${size.w}x${size.h}`;
}

function report(title: string, layout: BoxLayout<Widget>, region: LayoutRegion): void {
  console.log(`\n── ${title} (${fmt(region)}, ${layout.options.axis}, ${layout.options.spacing}) ──`);
  console.log(`  preferred ${fmt(preferredSize(layout, region))}`);
  console.log(`  minimum   ${fmt(minimumSize(layout, region))}`);
  console.log(`  maximum   ${fmt(maximumSize(layout, region))}`);

  for (const { child, bounds } of layoutChildren(layout, region)) {
    console.log(`  ${child.name.padEnd(8)} x=${bounds.x} y=${bounds.y} w=${bounds.w} h=${bounds.h}`);
  }
  for (const child of children(layout)) {
    const spec = getChildSpec(layout, child);
    if (spec) console.log(`  ${child.name.padEnd(8)} ${formatSpecText(spec)}`);
  }
}

// Button row: help on the left, a rest spacer pushing OK/Cancel to the right
const buttons = createBoxLayout(host, { axis: "horizontal", spacing: "pack-start" });
addChild(buttons, widget("help", 60, 24), "CENTER 8.0 0.0 0.0 0.0 ABSOLUTE ABSOLUTE -1.0 -1.0 2147483647 2147483647");
addSpacer(buttons, widget("spacer", 0, 0), { type: "rest" }, { type: "absolute", value: 0 });
addChild(buttons, widget("ok", 72, 24), "CENTER 0.0 6.0 0.0 0.0 ABSOLUTE ABSOLUTE -1.0 -1.0 2147483647 2147483647");
addChild(buttons, widget("cancel", 72, 24), "CENTER 0.0 8.0 0.0 0.0 ABSOLUTE ABSOLUTE -1.0 -1.0 2147483647 2147483647");
report("Button row", buttons, { w: 480, h: 40 });

// Form column: full-width fields, a square avatar and a clamped notes box
const form = createBoxLayout(host, { axis: "vertical", spacing: "space-between" });
addChild(form, widget("avatar", 64, 64), "LEFT 12.0 0.0 12.0 0.0 SQUARE PERCENT 0.0 20.0 2147483647 2147483647");
addChild(form, widget("name", 200, 28), "CENTER 12.0 12.0 0.0 0.0 PERCENT ABSOLUTE 100.0 28.0 2147483647 2147483647");
addChild(form, widget("notes", 200, 80), "CENTER 12.0 12.0 8.0 8.0 PERCENT REST 100.0 0.0 360 160");
addChild(form, widget("status", 120, 16));
report("Form", form, { w: 320, h: 400, insets: { top: 4, left: 0, bottom: 4, right: 0 } });
