import { z } from "zod";
import type { Rect, Size } from "./geometry.js";
import { DEFAULT_AXIS, DEFAULT_SPACING } from "../constants.js";

/** Direction children are stacked in */
export const Axis = z.enum(["vertical", "horizontal"]);
export type Axis = z.infer<typeof Axis>;

/** How free space on the primary axis is distributed */
export const Spacing = z.enum([
  "space-around",
  "space-between",
  "pack-start",
  "pack-center",
  "pack-end",
]);
export type Spacing = z.infer<typeof Spacing>;

export const LayoutOptionsSchema = z.object({
  axis: Axis.default(DEFAULT_AXIS),
  spacing: Spacing.default(DEFAULT_SPACING),
});
export type LayoutOptions = z.infer<typeof LayoutOptionsSchema>;
export type LayoutOptionsInput = z.input<typeof LayoutOptionsSchema>;

/** Final bounds computed for one child by a layout pass */
export interface Placement<C> {
  child: C;
  bounds: Rect;
}

/**
 * The windowing side of a layout. The engine never measures children itself;
 * it asks the host for intrinsic sizes and hands final bounds back to it.
 */
export interface LayoutHost<C> {
  intrinsicPreferredSize(child: C): Size;
  intrinsicMinimumSize(child: C): Size;
  applyBounds(child: C, bounds: Rect): void;
}
