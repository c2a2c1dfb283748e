import { z } from "zod";

export const inventoryUpdateSchema = z.object({
  item: z.string(),
  change: z.number().int().safe()
});

export const processQuerySchema = z.object({
  query: z.string()
});

export const inventorySchema = z.object({
  tshirts: z.number().int(),
  pants: z.number().int()
});

export const errorBodySchema = z.object({
  detail: z.string(),
  error: z.string().optional()
});

export const rawIntentSchema = z.record(z.unknown());

export const intentFieldsSchema = z.object({
  operation: z.string(),
  item: z.string().nullish(),
  change: z.number().int().safe().nullish(),
  reasoning: z.string().nullish()
});

export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}
