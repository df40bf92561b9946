import type { LayoutRegion, Rect, Size } from "../schema/geometry.js";
import type { Axis, Placement, Spacing } from "../schema/layout.js";
import type { Alignment, ChildSpec } from "../schema/spec.js";
import { ZERO_INSETS } from "../constants.js";
import type { Dimension, SizeResolver } from "./resolve.js";

export interface PlacementInput<C> {
  specs: ReadonlyMap<C, ChildSpec>;
  axis: Axis;
  spacing: Spacing;
  region: LayoutRegion;
  resolver: SizeResolver<C>;
  /** Preferred size of the whole child set for this region */
  preferred: Size;
}

/** Start and end edges of the region's inner area along one dimension */
export interface Span {
  start: number;
  end: number;
}

function innerSpan(region: LayoutRegion, dim: Dimension): Span {
  const insets = region.insets ?? ZERO_INSETS;
  return dim === "w"
    ? { start: Math.trunc(insets.left), end: Math.trunc(region.w - insets.right) }
    : { start: Math.trunc(insets.top), end: Math.trunc(region.h - insets.bottom) };
}

function leadingMargin(spec: ChildSpec, dim: Dimension): number {
  return dim === "w" ? spec.margin.left : spec.margin.top;
}

function trailingMargin(spec: ChildSpec, dim: Dimension): number {
  return dim === "w" ? spec.margin.right : spec.margin.bottom;
}

/**
 * Cross-axis offset of a child's content box. `center` centres the margin
 * box, so the content itself starts at the margin box's leading edge.
 */
export function crossOffset(
  alignment: Alignment,
  span: Span,
  content: number,
  leading: number,
  trailing: number
): number {
  switch (alignment) {
    case "start":
      return span.start + Math.trunc(leading);
    case "end":
      return span.end - Math.trunc(trailing) - content;
    case "center": {
      const center = Math.trunc((span.start + span.end) / 2);
      return center - Math.trunc((content + leading + trailing) / 2);
    }
  }
}

export interface Distribution {
  /** Primary-axis cursor before the first child's leading margin */
  start: number;
  /** Extra space after each child */
  gap: number;
}

/**
 * Where the first child starts and how much free space follows each child.
 * `space-between` with fewer than two children has nothing to separate and
 * leaves the child at the start edge.
 */
export function distribute(
  spacing: Spacing,
  span: Span,
  available: number,
  preferred: number,
  count: number
): Distribution {
  const excess = Math.max(available - preferred, 0);
  switch (spacing) {
    case "space-around": {
      const gap = excess / (count + 1);
      return { start: span.start + gap, gap };
    }
    case "space-between":
      return { start: span.start, gap: count > 1 ? excess / (count - 1) : 0 };
    case "pack-start":
      return { start: span.start, gap: 0 };
    case "pack-center":
      return { start: Math.trunc((span.start + span.end) / 2) - preferred / 2, gap: 0 };
    case "pack-end":
      return { start: span.end - preferred, gap: 0 };
  }
}

/**
 * Compute bounds for every child in registration order. Pure: nothing is
 * handed to the host here, so a failure leaves no child half-placed.
 */
export function computePlacements<C>(input: PlacementInput<C>): Placement<C>[] {
  const { specs, axis, spacing, region, resolver, preferred } = input;
  const primary: Dimension = axis === "vertical" ? "h" : "w";
  const cross: Dimension = primary === "h" ? "w" : "h";
  const primarySpan = innerSpan(region, primary);
  const crossSpan = innerSpan(region, cross);

  const { start, gap } = distribute(
    spacing,
    primarySpan,
    region[primary],
    preferred[primary],
    specs.size
  );

  const placements: Placement<C>[] = [];
  let cursor = start;
  for (const [child, spec] of specs) {
    const size = resolver.resolveSize(child);
    cursor += leadingMargin(spec, primary);
    const along = Math.trunc(cursor);
    const across = crossOffset(
      spec.alignment,
      crossSpan,
      size[cross],
      leadingMargin(spec, cross),
      trailingMargin(spec, cross)
    );

    const bounds: Rect =
      primary === "h"
        ? { x: across, y: along, w: size.w, h: size.h }
        : { x: along, y: across, w: size.w, h: size.h };
    placements.push({ child, bounds });

    cursor += trailingMargin(spec, primary) + size[primary] + gap;
  }
  return placements;
}
