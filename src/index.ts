// Constants
export {
  UNBOUNDED,
  SPEC_TOKEN_COUNT,
  DEFAULT_AXIS,
  DEFAULT_SPACING,
  DEFAULT_ALIGNMENT,
  ZERO_INSETS,
} from "./constants.js";

// Errors
export {
  MalformedSpecError,
  MultipleRestError,
  UnknownChildError,
  LayoutBusyError,
} from "./errors.js";

// Schema types
export type { Size, Insets, LayoutRegion, Rect } from "./schema/geometry.js";
export { SizeSchema, InsetsSchema, LayoutRegionSchema } from "./schema/geometry.js";

export type { SizeSpec, Margins, ChildSpec } from "./schema/spec.js";
export {
  Alignment,
  SizeType,
  SizeSpecSchema,
  MarginsSchema,
  ChildSpecSchema,
  parseChildSpec,
} from "./schema/spec.js";

export type {
  LayoutOptions,
  LayoutOptionsInput,
  Placement,
  LayoutHost,
} from "./schema/layout.js";
export { Axis, Spacing, LayoutOptionsSchema } from "./schema/layout.js";

export type { DocumentChild, LayoutDocument } from "./schema/document.js";
export { parseLayoutDocument, LayoutDocumentSchema } from "./schema/document.js";

// Child specs
export {
  buildChildSpec,
  defaultChildSpec,
  spacerSpec,
  cloneChildSpec,
} from "./spec/child-spec.js";
export { parseSpecText, formatSpecText, formatDecimal } from "./spec/spec-text.js";

// Engine
export {
  createBoxLayout,
  addChild,
  addSpacer,
  removeChild,
  getChildSpec,
  children,
  resolveChildSize,
  preferredSize,
  minimumSize,
  maximumSize,
  layoutChildren,
} from "./engine/box-layout.js";
export type { BoxLayout } from "./engine/box-layout.js";

// Engine internals (for hosts that drive passes themselves)
export { createResolver, toPixels } from "./engine/resolve.js";
export type { SizeResolver, ResolveContext, Dimension } from "./engine/resolve.js";
export { stackedSize, summedSize } from "./engine/measure.js";
export { computePlacements, distribute, crossOffset } from "./engine/placement.js";

// Documents
export { runLayoutDocument } from "./document/run-document.js";
export type { DocumentPlacement, DocumentResult } from "./document/run-document.js";
