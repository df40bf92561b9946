import { z } from "zod";
import { LayoutRegionSchema, SizeSchema } from "./geometry.js";
import { Axis, Spacing } from "./layout.js";
import { ChildSpecSchema, SizeSpecSchema } from "./spec.js";

export const DocumentChildSchema = z
  .object({
    id: z.string().min(1),
    /** Spec text, or a spec object; omitted means "centre at preferred size" */
    spec: z.union([z.string(), ChildSpecSchema]).optional(),
    spacer: z
      .object({
        width: SizeSpecSchema,
        height: SizeSpecSchema,
      })
      .optional(),
    preferred: SizeSchema.default({ w: 0, h: 0 }),
    minimum: SizeSchema.default({ w: 0, h: 0 }),
  })
  .refine((child) => !(child.spec !== undefined && child.spacer !== undefined), {
    message: "A child cannot have both spec and spacer",
  });
export type DocumentChild = z.infer<typeof DocumentChildSchema>;

export const LayoutDocumentSchema = z
  .object({
    region: LayoutRegionSchema,
    axis: Axis.optional(),
    spacing: Spacing.optional(),
    children: z.array(DocumentChildSchema),
  })
  .refine(
    (doc) => {
      const ids = doc.children.map((c) => c.id);
      return new Set(ids).size === ids.length;
    },
    { message: "Duplicate id found in children" }
  );
export type LayoutDocument = z.infer<typeof LayoutDocumentSchema>;

/** Parse and validate a layout document. Throws ZodError on invalid input. */
export function parseLayoutDocument(data: unknown): LayoutDocument {
  return LayoutDocumentSchema.parse(data);
}
