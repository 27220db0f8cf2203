import type { EnvironmentName } from "@monoweave/contracts";

const KNOWN: Record<string, EnvironmentName> = {
  development: "development",
  dev: "development",
  staging: "staging",
  stage: "staging",
  integration: "integration",
  int: "integration",
  production: "production",
  prod: "production",
};

/** Lowercases and maps common aliases onto the known environment names. */
export function normalizeEnvironment(raw: string): EnvironmentName {
  const value = raw.trim().toLowerCase();
  return KNOWN[value] ?? value;
}

/** NODE_ENV, then ENVIRONMENT; development when neither is set. */
export function detectEnvironment(environment: Record<string, string | undefined>): EnvironmentName {
  const raw = environment.NODE_ENV || environment.ENVIRONMENT;
  return raw ? normalizeEnvironment(raw) : "development";
}
