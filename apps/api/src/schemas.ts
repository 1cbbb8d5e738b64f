import { z } from "zod";
import { CRITERION_KINDS } from "@wprank/shared";

export const criterionSchema = z.object({
  name: z.string().optional(),
  weight: z.number(),
  kind: z.string().trim().toLowerCase().pipe(z.enum(CRITERION_KINDS)),
});

export const alternativeSchema = z.object({
  label: z.string(),
  scores: z.array(z.number()),
});

/** Raw shape, shared by the HTTP body and the MCP tool input. */
export const structuredRankShape = {
  alternatives: z.array(alternativeSchema),
  criteria: z.array(criterionSchema),
};

export const structuredRankSchema = z.object(structuredRankShape);

export const formRankSchema = z.object({
  table: z.array(z.array(z.union([z.string(), z.number(), z.null()]))),
  hasHeader: z.boolean().optional(),
  weights: z.string(),
  types: z.string(),
});

export const rankRequestSchema = z.union([structuredRankSchema, formRankSchema]);

export type StructuredRankRequest = z.infer<typeof structuredRankSchema>;
export type FormRankRequest = z.infer<typeof formRankSchema>;
export type RankRequest = z.infer<typeof rankRequestSchema>;
