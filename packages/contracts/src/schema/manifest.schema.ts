import { z } from "zod";

export const dependencyMapSchema = z.record(z.string(), z.string());

export const personSchema = z.union([
  z.string(),
  z
    .object({
      name: z.string(),
      email: z.string().optional(),
      url: z.string().optional(),
    })
    .passthrough(),
]);

export const repositorySchema = z.union([
  z.string(),
  z
    .object({
      type: z.string().optional(),
      url: z.string(),
      directory: z.string().optional(),
    })
    .passthrough(),
]);

export const workspacesDeclarationSchema = z.union([
  z.array(z.string()),
  z
    .object({
      packages: z.array(z.string()),
      nohoist: z.array(z.string()).optional(),
    })
    .passthrough(),
]);

/**
 * package.json as read from disk. Only the fields monoweave interprets are
 * typed; everything else passes through untouched.
 */
export const rawManifestSchema = z
  .object({
    name: z.string(),
    version: z.string(),
    description: z.string().optional(),
    license: z.string().optional(),
    main: z.string().optional(),
    private: z.boolean().optional(),
    author: personSchema.optional(),
    repository: repositorySchema.optional(),
    dependencies: dependencyMapSchema.optional(),
    devDependencies: dependencyMapSchema.optional(),
    peerDependencies: dependencyMapSchema.optional(),
    optionalDependencies: dependencyMapSchema.optional(),
    scripts: z.record(z.string(), z.string()).optional(),
    workspaces: workspacesDeclarationSchema.nullable().optional(),
  })
  .passthrough();

export type RawManifest = z.infer<typeof rawManifestSchema>;
export type WorkspacesDeclaration = z.infer<typeof workspacesDeclarationSchema>;
export type ManifestPerson = z.infer<typeof personSchema>;
export type ManifestRepository = z.infer<typeof repositorySchema>;
