import type { LayoutRegion, Size } from "../schema/geometry.js";
import {
  LayoutOptionsSchema,
  type LayoutHost,
  type LayoutOptions,
  type LayoutOptionsInput,
  type Placement,
} from "../schema/layout.js";
import type { ChildSpec, SizeSpec } from "../schema/spec.js";
import { cloneChildSpec, defaultChildSpec, spacerSpec } from "../spec/child-spec.js";
import { parseSpecText } from "../spec/spec-text.js";
import {
  createRegistry,
  deleteSpec,
  putSpec,
  runPass,
  type ChildRegistry,
} from "./registry.js";
import { createResolver, type SizeResolver } from "./resolve.js";
import { stackedSize, summedSize } from "./measure.js";
import { computePlacements } from "./placement.js";

/** A box layout: its options, its host and the ordered children it places */
export interface BoxLayout<C> {
  readonly options: Readonly<LayoutOptions>;
  readonly host: LayoutHost<C>;
  readonly registry: ChildRegistry<C>;
}

/**
 * Create a layout. Options are validated; axis defaults to vertical and
 * spacing to pack-center.
 */
export function createBoxLayout<C>(
  host: LayoutHost<C>,
  options: LayoutOptionsInput = {}
): BoxLayout<C> {
  return {
    options: Object.freeze(LayoutOptionsSchema.parse(options)),
    host,
    registry: createRegistry<C>(),
  };
}

/**
 * Register a child, or replace the spec of one already registered (its
 * position in placement order is kept). A spec object is stored as a frozen
 * copy, so later edits to the caller's object have no effect. A string is parsed as spec text; an
 * empty string or no spec centres the child at its intrinsic preferred size.
 * Throws MalformedSpecError without touching the registry when text is bad.
 */
export function addChild<C>(
  layout: BoxLayout<C>,
  child: C,
  spec?: ChildSpec | string
): ChildSpec {
  let resolved: ChildSpec;
  if (typeof spec === "object") {
    resolved = cloneChildSpec(spec);
  } else if (spec === undefined || spec.trim() === "") {
    resolved = defaultChildSpec(layout.host.intrinsicPreferredSize(child));
  } else {
    resolved = parseSpecText(spec);
  }
  putSpec(layout.registry, child, resolved);
  return resolved;
}

/** Register an empty placeholder that only takes up space */
export function addSpacer<C>(
  layout: BoxLayout<C>,
  handle: C,
  width: SizeSpec,
  height: SizeSpec
): ChildSpec {
  const spec = spacerSpec(width, height);
  putSpec(layout.registry, handle, spec);
  return spec;
}

/** Remove a child. Returns false when it was not registered. */
export function removeChild<C>(layout: BoxLayout<C>, child: C): boolean {
  return deleteSpec(layout.registry, child);
}

export function getChildSpec<C>(layout: BoxLayout<C>, child: C): ChildSpec | undefined {
  return layout.registry.specs.get(child);
}

/** Registered children in placement order */
export function children<C>(layout: BoxLayout<C>): C[] {
  return [...layout.registry.specs.keys()];
}

function withResolver<C, T>(
  layout: BoxLayout<C>,
  region: LayoutRegion,
  fn: (resolver: SizeResolver<C>, specs: ReadonlyMap<C, ChildSpec>) => T
): T {
  return runPass(layout.registry, (specs) => {
    const resolver = createResolver({
      specs,
      region: { w: region.w, h: region.h },
      axis: layout.options.axis,
      host: layout.host,
    });
    return fn(resolver, specs);
  });
}

/** Content size of one child. Throws UnknownChildError for an unregistered child. */
export function resolveChildSize<C>(layout: BoxLayout<C>, child: C, region: LayoutRegion): Size {
  return withResolver(layout, region, (resolver) => resolver.resolveSize(child));
}

/** Size the children want: summed along the axis, widest across it */
export function preferredSize<C>(layout: BoxLayout<C>, region: LayoutRegion): Size {
  return withResolver(layout, region, (resolver, specs) =>
    stackedSize(specs, layout.options.axis, (child) => resolver.resolveSize(child))
  );
}

/** Like preferredSize, but only absolute sizes are honoured; the rest use intrinsic minimums */
export function minimumSize<C>(layout: BoxLayout<C>, region: LayoutRegion): Size {
  return withResolver(layout, region, (resolver, specs) =>
    stackedSize(specs, layout.options.axis, (child) => resolver.resolveMinimumSize(child))
  );
}

/** Every child's margin box summed on both dimensions, regardless of axis */
export function maximumSize<C>(layout: BoxLayout<C>, region: LayoutRegion): Size {
  return withResolver(layout, region, (resolver, specs) =>
    summedSize(specs, (child) => resolver.resolveSize(child))
  );
}

/**
 * Place every child inside `region` and push the bounds to the host.
 * All bounds are computed before the first one is applied, so a resolution
 * error (e.g. MultipleRestError) leaves the host untouched.
 */
export function layoutChildren<C>(layout: BoxLayout<C>, region: LayoutRegion): Placement<C>[] {
  return withResolver(layout, region, (resolver, specs) => {
    const { axis, spacing } = layout.options;
    const preferred = stackedSize(specs, axis, (child) => resolver.resolveSize(child));
    const placements = computePlacements({
      specs,
      axis,
      spacing,
      region,
      resolver,
      preferred,
    });
    for (const { child, bounds } of placements) {
      layout.host.applyBounds(child, bounds);
    }
    return placements;
  });
}
