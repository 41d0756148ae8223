import { z } from "zod";
import type { GraphSnapshot } from "@/domain/graph/GraphTypes";

export const layoutEdgeSchema = z.object({
  from: z.number().int().nonnegative(),
  to: z.number().int().nonnegative(),
  tag: z.number().int().catch(0),
  curvature: z
    .number()
    .nullish()
    .transform((value) => (value !== null && value !== undefined && Number.isFinite(value) ? value : 0))
});

export const nodeSizeSchema = z.object({
  width: z.number().nonnegative(),
  height: z.number().nonnegative()
});

export const graphSnapshotSchema = z
  .object({
    nodeCount: z.number().int().nonnegative(),
    edges: z.array(layoutEdgeSchema),
    nodeSizes: z.array(nodeSizeSchema).optional(),
    hiddenTags: z
      .array(z.number().int())
      .nullish()
      .transform((value) => [...new Set(value ?? [])].sort((a, b) => a - b))
  })
  .superRefine((snapshot, ctx) => {
    snapshot.edges.forEach((edge, index) => {
      if (edge.from >= snapshot.nodeCount || edge.to >= snapshot.nodeCount) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["edges", index],
          message: `edge endpoint out of range (${edge.from} -> ${edge.to}, nodeCount ${snapshot.nodeCount})`
        });
      }
    });
    if (snapshot.nodeSizes && snapshot.nodeSizes.length !== snapshot.nodeCount) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["nodeSizes"],
        message: `expected ${snapshot.nodeCount} node sizes, got ${snapshot.nodeSizes.length}`
      });
    }
  });

export function parseGraphSnapshot(raw: unknown): GraphSnapshot {
  const parsed = graphSnapshotSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`[layout-engine] Invalid graph snapshot: ${parsed.error.message}`);
  }
  return parsed.data;
}
