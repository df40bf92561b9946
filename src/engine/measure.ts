import type { Size } from "../schema/geometry.js";
import type { Axis } from "../schema/layout.js";
import type { ChildSpec } from "../schema/spec.js";
import { marginSpan, toPixels } from "./resolve.js";

/**
 * Stack children along `axis`: the primary dimension sums each margin box,
 * the cross dimension takes the widest one.
 */
export function stackedSize<C>(
  specs: ReadonlyMap<C, ChildSpec>,
  axis: Axis,
  sizeOf: (child: C) => Size
): Size {
  let w = 0;
  let h = 0;
  for (const [child, spec] of specs) {
    const size = sizeOf(child);
    const boxW = size.w + marginSpan(spec, "w");
    const boxH = size.h + marginSpan(spec, "h");
    if (axis === "vertical") {
      w = Math.max(w, boxW);
      h += boxH;
    } else {
      h = Math.max(h, boxH);
      w += boxW;
    }
  }
  return { w: toPixels(w), h: toPixels(h) };
}

/**
 * Sum every margin box on both dimensions, ignoring the axis. Each box is
 * rounded up to whole pixels before it is added.
 */
export function summedSize<C>(
  specs: ReadonlyMap<C, ChildSpec>,
  sizeOf: (child: C) => Size
): Size {
  let w = 0;
  let h = 0;
  for (const [child, spec] of specs) {
    const size = sizeOf(child);
    w += Math.ceil(size.w + marginSpan(spec, "w"));
    h += Math.ceil(size.h + marginSpan(spec, "h"));
  }
  return { w, h };
}
