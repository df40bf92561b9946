import type { ChildSpec } from "../schema/spec.js";
import { LayoutBusyError } from "../errors.js";

/**
 * Insertion-ordered child → spec table. Order is placement order; replacing
 * the spec of a registered child keeps its slot (Map.set semantics).
 */
export interface ChildRegistry<C> {
  readonly specs: Map<C, ChildSpec>;
  /** @internal Number of size/placement passes currently open */
  passDepth: number;
}

export function createRegistry<C>(): ChildRegistry<C> {
  return { specs: new Map<C, ChildSpec>(), passDepth: 0 };
}

function assertIdle<C>(registry: ChildRegistry<C>, operation: string): void {
  if (registry.passDepth > 0) {
    throw new LayoutBusyError(operation);
  }
}

export function putSpec<C>(registry: ChildRegistry<C>, child: C, spec: ChildSpec): void {
  assertIdle(registry, "register a child");
  registry.specs.set(child, spec);
}

export function deleteSpec<C>(registry: ChildRegistry<C>, child: C): boolean {
  assertIdle(registry, "remove a child");
  return registry.specs.delete(child);
}

/**
 * Run `fn` as one pass over the registry. Passes nest, so a host callback may
 * query the layout again, but registration is refused until every pass closes.
 */
export function runPass<C, T>(
  registry: ChildRegistry<C>,
  fn: (specs: ReadonlyMap<C, ChildSpec>) => T
): T {
  registry.passDepth++;
  try {
    return fn(registry.specs);
  } finally {
    registry.passDepth--;
  }
}
