import type { AffectedPackages, ChangeAnalysis, ExecutionContext } from "@monoweave/contracts";

export function emptyAffected(): AffectedPackages {
  return { directlyAffected: new Set(), dependentsAffected: new Set(), totalAffectedCount: 0 };
}

function processEnvironment(): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [key, value] of Object.entries(process.env)) {
    if (value !== undefined) { env[key] = value; }
  }
  return env;
}

/**
 * Context for condition checks and task runs. The process environment is
 * read here and nowhere deeper; pass `environment` to pin it.
 */
export function createExecutionContext(
  analysis?: ChangeAnalysis,
  overrides: Partial<ExecutionContext> = {},
): ExecutionContext {
  return {
    changedFiles: analysis ? analysis.changedFiles.map((f) => f.path) : [],
    affectedPackages: analysis ? analysis.affectedPackages : emptyAffected(),
    packageChanges: analysis?.packageChanges,
    ...overrides,
    environment: overrides.environment ?? processEnvironment(),
  };
}
