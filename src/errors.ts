import type { Axis } from "./schema/layout.js";

/** Spec text that could not be parsed. Nothing is registered when this is thrown. */
export class MalformedSpecError extends Error {
  readonly text: string;
  readonly detail: string;

  constructor(text: string, detail: string) {
    super(`Malformed child spec "${text}": ${detail}`);
    this.name = "MalformedSpecError";
    this.text = text;
    this.detail = detail;
  }
}

/** Two children asked for the remaining space on the layout's primary axis */
export class MultipleRestError extends Error {
  readonly axis: Axis;

  constructor(axis: Axis) {
    super(`Only one child may use rest sizing on the ${axis} axis`);
    this.name = "MultipleRestError";
    this.axis = axis;
  }
}

/** A resolver was asked about a child the layout does not track */
export class UnknownChildError extends Error {
  constructor() {
    super("Child is not registered with this layout");
    this.name = "UnknownChildError";
  }
}

/** The child set was mutated while a size query or placement pass was running */
export class LayoutBusyError extends Error {
  constructor(operation: string) {
    super(`Cannot ${operation} while a layout pass is in progress`);
    this.name = "LayoutBusyError";
  }
}
