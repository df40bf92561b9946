/** Max-size sentinel meaning "no ceiling" (largest int32, as written in spec text) */
export const UNBOUNDED = 2147483647;

/** Smallest value accepted for an integer max field in spec text */
export const INT32_MIN = -2147483648;

/** Number of whitespace-separated fields in a spec text */
export const SPEC_TOKEN_COUNT = 11;

/** Primary axis used when a layout is created without one */
export const DEFAULT_AXIS = "vertical" as const;

/** Spacing policy used when a layout is created without one */
export const DEFAULT_SPACING = "pack-center" as const;

/** Cross-axis alignment for children registered without a spec */
export const DEFAULT_ALIGNMENT = "center" as const;

/** Region insets applied when a region does not declare any */
export const ZERO_INSETS = Object.freeze({ top: 0, left: 0, bottom: 0, right: 0 });

/** Wire names for alignments. LEFT/RIGHT double as TOP/BOTTOM in horizontal layouts. */
export const ALIGNMENT_TOKENS = {
  start: "LEFT",
  center: "CENTER",
  end: "RIGHT",
} as const;

/** Wire names for size types */
export const SIZE_TYPE_TOKENS = {
  percent: "PERCENT",
  absolute: "ABSOLUTE",
  square: "SQUARE",
  ratio: "RATIO",
  rest: "REST",
} as const;
