import { z, type ZodIssue } from "zod";

export const CatalogMatchRulesSchema = z
  .object({
    packages: z.array(z.string()).default([]),
    namespaces: z.array(z.string()).default([]),
    object_types: z.array(z.string()).default([]),
  })
  .strict();

export const CatalogAppSchema = z.object({
  app_id: z.string().trim().min(1),
  display_name: z.string().optional(),
  criticality: z.number().min(0).default(0.5),
  priority: z.number().int().default(0),
  tags: z.array(z.string()).default([]),
  match_rules: CatalogMatchRulesSchema.default({ packages: [], namespaces: [], object_types: [] }),
});

export const CatalogRuleSchema = z
  .object({
    app_id: z.string().trim().min(1),
    match_pattern: z.string().trim().min(1),
    priority: z.number().int().default(0),
    criticality: z.number().min(0).default(0.5),
    object_types: z.array(z.string()).optional(),
  })
  .strict();

export const CatalogFileSchema = z.object({
  version: z
    .union([z.string(), z.number()])
    .transform((value) => String(value))
    .default("0"),
  unowned_criticality: z.number().positive().optional(),
  apps: z.array(CatalogAppSchema).default([]),
  rules: z.array(CatalogRuleSchema).default([]),
});

export type CatalogApp = z.infer<typeof CatalogAppSchema>;
export type CatalogRule = z.infer<typeof CatalogRuleSchema>;
export type CatalogFile = z.infer<typeof CatalogFileSchema>;

export function formatCatalogIssues(issues: ZodIssue[]): string[] {
  return issues.map((issue) => {
    const location = issue.path.length > 0 ? issue.path.join(".") : "<root>";

    if (issue.code === "invalid_type") {
      return `${location}: Expected ${issue.expected}, received ${issue.received}`;
    }
    if (issue.code === "unrecognized_keys") {
      return `${location}: Unrecognized keys: ${issue.keys.join(", ")}`;
    }

    return `${location}: ${issue.message}`;
  });
}
