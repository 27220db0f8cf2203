import { z } from "zod";

/** lerna.json */
export const lernaConfigSchema = z
  .object({
    packages: z.array(z.string()).optional(),
    useWorkspaces: z.boolean().optional(),
    version: z.string().optional(),
  })
  .passthrough();

/** pnpm-workspace.yaml */
export const pnpmWorkspaceSchema = z
  .object({
    packages: z.array(z.string()).default([]),
  })
  .passthrough();

const nxProjectSchema = z.union([
  z.string(),
  z
    .object({
      root: z.string().optional(),
    })
    .passthrough(),
]);

/** nx.json, workspace.json and angular.json share the projects shape. */
export const nxConfigSchema = z
  .object({
    projects: z.record(z.string(), nxProjectSchema).optional(),
  })
  .passthrough();

/** rush.json */
export const rushConfigSchema = z
  .object({
    projects: z.array(
      z
        .object({
          packageName: z.string(),
          projectFolder: z.string(),
        })
        .passthrough(),
    ),
  })
  .passthrough();

export type LernaConfig = z.infer<typeof lernaConfigSchema>;
export type PnpmWorkspaceConfig = z.infer<typeof pnpmWorkspaceSchema>;
export type NxConfig = z.infer<typeof nxConfigSchema>;
export type RushConfig = z.infer<typeof rushConfigSchema>;
