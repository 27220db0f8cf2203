import { z } from "zod";

export const changesetBumpSchema = z.enum(["major", "minor", "patch"]);
export const changesetStatusSchema = z.enum(["pending", "applied"]);

/** A changeset file under changesets.directory. */
export const changesetSchema = z.object({
  id: z.string().uuid(),
  package: z.string().min(1),
  bump: changesetBumpSchema,
  description: z.string(),
  branch: z.string(),
  environments: z.array(z.string()).default([]),
  author: z.string(),
  createdAt: z.string().datetime({ offset: true }),
  status: changesetStatusSchema.default("pending"),
  appliedAt: z.string().datetime({ offset: true }).optional(),
});

export type Changeset = z.infer<typeof changesetSchema>;
export type ChangesetBump = z.infer<typeof changesetBumpSchema>;
export type ChangesetStatus = z.infer<typeof changesetStatusSchema>;
