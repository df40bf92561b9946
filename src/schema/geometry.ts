import { z } from "zod";

/** A width/height pair in pixels */
export const SizeSchema = z.object({
  w: z.number().nonnegative(),
  h: z.number().nonnegative(),
});
export type Size = z.infer<typeof SizeSchema>;

export const InsetsSchema = z.object({
  top: z.number().nonnegative().default(0),
  left: z.number().nonnegative().default(0),
  bottom: z.number().nonnegative().default(0),
  right: z.number().nonnegative().default(0),
});
export type Insets = z.infer<typeof InsetsSchema>;

/**
 * The parent region handed to a layout pass. Percent and rest sizing use the
 * full `w`/`h`; children are placed inside the area left after `insets`.
 */
export const LayoutRegionSchema = SizeSchema.extend({
  insets: InsetsSchema.optional(),
});
export type LayoutRegion = z.infer<typeof LayoutRegionSchema>;

/** A rectangle in parent-local coordinates */
export interface Rect {
  x: number;
  y: number;
  w: number;
  h: number;
}
