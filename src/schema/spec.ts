import { z } from "zod";
import { DEFAULT_ALIGNMENT, UNBOUNDED } from "../constants.js";
import { buildChildSpec } from "../spec/child-spec.js";

export const Alignment = z.enum(["start", "center", "end"]);
export type Alignment = z.infer<typeof Alignment>;

export const SizeType = z.enum(["percent", "absolute", "square", "ratio", "rest"]);
export type SizeType = z.infer<typeof SizeType>;

/**
 * How one axis of a child is sized.
 * - percent: share of the parent extent (0-100 scale)
 * - absolute: fixed pixels; a negative value means "use the intrinsic preferred size"
 * - square: copy the other axis
 * - ratio: other axis times `value`
 * - rest: whatever the siblings leave free
 */
export const SizeSpecSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("percent"), value: z.number().finite() }),
  z.object({ type: z.literal("absolute"), value: z.number().finite() }),
  z.object({ type: z.literal("square") }),
  z.object({ type: z.literal("ratio"), value: z.number().finite() }),
  z.object({ type: z.literal("rest") }),
]);
export type SizeSpec = z.infer<typeof SizeSpecSchema>;

export const MarginsSchema = z.object({
  left: z.number().finite().nonnegative().default(0),
  right: z.number().finite().nonnegative().default(0),
  top: z.number().finite().nonnegative().default(0),
  bottom: z.number().finite().nonnegative().default(0),
});
export type Margins = z.infer<typeof MarginsSchema>;

const MaxSchema = z.number().int().default(UNBOUNDED);

export const ChildSpecSchema = z.object({
  alignment: Alignment.default(DEFAULT_ALIGNMENT),
  margin: MarginsSchema.default({}),
  width: SizeSpecSchema,
  height: SizeSpecSchema,
  maxWidth: MaxSchema,
  maxHeight: MaxSchema,
});

/** One child's sizing, alignment and margins. Frozen once built. */
export interface ChildSpec {
  readonly alignment: Alignment;
  readonly margin: Readonly<Margins>;
  readonly width: Readonly<SizeSpec>;
  readonly height: Readonly<SizeSpec>;
  readonly maxWidth: number;
  readonly maxHeight: number;
}

/** Parse and validate a JSON child spec. Throws ZodError on invalid input. */
export function parseChildSpec(data: unknown): ChildSpec {
  const parsed = ChildSpecSchema.parse(data);
  return buildChildSpec(
    parsed.alignment,
    parsed.margin,
    parsed.width,
    parsed.height,
    parsed.maxWidth,
    parsed.maxHeight
  );
}
