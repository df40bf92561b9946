import type { Size } from "../schema/geometry.js";
import type { Axis, LayoutHost } from "../schema/layout.js";
import type { ChildSpec, SizeSpec } from "../schema/spec.js";
import { UNBOUNDED } from "../constants.js";
import { MultipleRestError, UnknownChildError } from "../errors.js";

/** One side of a size: "w" or "h" */
export type Dimension = keyof Size;

export interface ResolveContext<C> {
  specs: ReadonlyMap<C, ChildSpec>;
  region: Size;
  axis: Axis;
  host: Pick<LayoutHost<C>, "intrinsicPreferredSize" | "intrinsicMinimumSize">;
}

/** Resolves child content boxes (margins excluded) for a single pass */
export interface SizeResolver<C> {
  resolveSize(child: C): Size;
  resolveMinimumSize(child: C): Size;
}

/** The axis a dimension runs along */
export function axisOf(dim: Dimension): Axis {
  return dim === "w" ? "horizontal" : "vertical";
}

export function sizeSpecOf(spec: ChildSpec, dim: Dimension): SizeSpec {
  return dim === "w" ? spec.width : spec.height;
}

/** Sum of both margins along a dimension */
export function marginSpan(spec: ChildSpec, dim: Dimension): number {
  return dim === "w"
    ? spec.margin.left + spec.margin.right
    : spec.margin.top + spec.margin.bottom;
}

/** Truncate toward zero and floor at 0, the way sizes reach the host */
export function toPixels(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.max(0, Math.trunc(Math.min(value, UNBOUNDED)));
}

/** Percent and absolute sizing; everything else is deferred to later passes (0 for now) */
function independentExtent(
  size: SizeSpec,
  parentExtent: number,
  max: number,
  intrinsic: () => number
): number {
  switch (size.type) {
    case "percent":
      return Math.min((parentExtent * size.value) / 100, max);
    case "absolute":
      return size.value < 0 ? intrinsic() : size.value;
    case "square":
    case "ratio":
    case "rest":
      return 0;
  }
}

/**
 * Create a resolver bound to one pass. Results are memoised per child and
 * dimension for the lifetime of the resolver, which must not outlive the pass:
 * the specs and region it was built from are assumed frozen meanwhile.
 */
export function createResolver<C>(ctx: ResolveContext<C>): SizeResolver<C> {
  const preferredCache = new Map<C, Size>();
  const minimumCache = new Map<C, Size>();
  const coupledCache = new Map<C, Size>();
  const extentCache: Record<Dimension, Map<C, number>> = {
    w: new Map<C, number>(),
    h: new Map<C, number>(),
  };

  function specOf(child: C): ChildSpec {
    const spec = ctx.specs.get(child);
    if (!spec) throw new UnknownChildError();
    return spec;
  }

  function intrinsicPreferred(child: C): Size {
    let size = preferredCache.get(child);
    if (!size) {
      size = ctx.host.intrinsicPreferredSize(child);
      preferredCache.set(child, size);
    }
    return size;
  }

  // Passes 1 and 2: independent axes, then square/ratio coupling. The four
  // coupling checks are not exclusive and run width-before-height, so a spec
  // that is square (or ratio) on both axes resolves in that order.
  function coupled(child: C, spec: ChildSpec): Size {
    const cached = coupledCache.get(child);
    if (cached) return cached;

    let w = independentExtent(spec.width, ctx.region.w, spec.maxWidth, () => intrinsicPreferred(child).w);
    let h = independentExtent(spec.height, ctx.region.h, spec.maxHeight, () => intrinsicPreferred(child).h);

    if (spec.width.type === "square") w = h;
    if (spec.height.type === "square") h = w;
    if (spec.width.type === "ratio") w = h * spec.width.value;
    if (spec.height.type === "ratio") h = w * spec.height.value;

    const size = { w, h };
    coupledCache.set(child, size);
    return size;
  }

  // Pass 3: parent extent minus every sibling's margin box and our own margins.
  function restExtent(child: C, spec: ChildSpec, dim: Dimension): number {
    let used = marginSpan(spec, dim);
    for (const [other, otherSpec] of ctx.specs) {
      if (other === child) continue;
      if (sizeSpecOf(otherSpec, dim).type === "rest") {
        if (ctx.axis === axisOf(dim)) {
          throw new MultipleRestError(ctx.axis);
        }
        // Cross-axis duplicates are tolerated; each one solves for its own
        // content, so only the sibling's margins count against us.
        used += marginSpan(otherSpec, dim);
        continue;
      }
      used += extent(other, dim) + marginSpan(otherSpec, dim);
    }
    const max = dim === "w" ? spec.maxWidth : spec.maxHeight;
    return Math.min(ctx.region[dim] - used, max);
  }

  function extent(child: C, dim: Dimension): number {
    const cache = extentCache[dim];
    const cached = cache.get(child);
    if (cached !== undefined) return cached;

    const spec = specOf(child);
    const raw =
      sizeSpecOf(spec, dim).type === "rest"
        ? restExtent(child, spec, dim)
        : coupled(child, spec)[dim];
    const value = toPixels(raw);
    cache.set(child, value);
    return value;
  }

  return {
    resolveSize(child: C): Size {
      return { w: extent(child, "w"), h: extent(child, "h") };
    },

    resolveMinimumSize(child: C): Size {
      const cached = minimumCache.get(child);
      if (cached) return cached;

      const spec = specOf(child);
      let intrinsic: Size | undefined;
      const fallback = (dim: Dimension): number => {
        const measured = intrinsic ?? ctx.host.intrinsicMinimumSize(child);
        intrinsic = measured;
        return measured[dim];
      };
      const pick = (size: SizeSpec, dim: Dimension): number =>
        size.type === "absolute" && size.value >= 0 ? size.value : fallback(dim);

      const size = {
        w: toPixels(pick(spec.width, "w")),
        h: toPixels(pick(spec.height, "h")),
      };
      minimumCache.set(child, size);
      return size;
    },
  };
}
