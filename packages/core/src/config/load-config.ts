import { join } from "node:path";
import { ConfigError, monoweaveConfigSchema } from "@monoweave/contracts";
import type { MonoweaveConfig, MonoweaveConfigInput } from "@monoweave/contracts";
import type { FileSystem } from "@monoweave/adapters";
import { createLogger } from "@monoweave/adapters";

const log = createLogger("config");

export const CONFIG_FILE = "monoweave.config.json";

/** Validates a partial configuration and fills every default. */
export function resolveConfig(input: unknown = {}): MonoweaveConfig {
  const parsed = monoweaveConfigSchema.safeParse(input ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`);
    throw new ConfigError(`Invalid monoweave configuration:\n  ${issues.join("\n  ")}`, {
      context: { issues },
    });
  }
  return parsed.data;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Section-wise merge: override sections replace individual fields of the base. */
export function mergeConfigInput(base: unknown, overrides: MonoweaveConfigInput = {}): unknown {
  if (!isRecord(base)) { return overrides; }
  const out: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(overrides)) {
    const current = out[key];
    out[key] = isRecord(current) && isRecord(value) ? { ...current, ...value } : value;
  }
  return out;
}

async function readJson(fs: FileSystem, path: string): Promise<unknown> {
  const text = await fs.readFile(path);
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`${path} is not valid JSON`, { cause: error, context: { path } });
  }
}

/** The file configuration is read from, when there is one. */
export async function configSource(fs: FileSystem, root: string): Promise<string | undefined> {
  const configPath = join(root, CONFIG_FILE);
  if (await fs.exists(configPath)) { return configPath; }
  const manifestPath = join(root, "package.json");
  if (await fs.exists(manifestPath)) {
    const manifest = await readJson(fs, manifestPath);
    if (isRecord(manifest) && manifest.monoweave !== undefined) { return manifestPath; }
  }
  return undefined;
}

/**
 * Reads monoweave.config.json, else the "monoweave" key of the root
 * package.json, else nothing; then applies overrides.
 */
export async function loadConfig(fs: FileSystem, root: string, overrides?: MonoweaveConfigInput): Promise<MonoweaveConfig> {
  const configPath = join(root, CONFIG_FILE);
  const manifestPath = join(root, "package.json");
  let fromDisk: unknown = {};

  if (await fs.exists(configPath)) {
    fromDisk = await readJson(fs, configPath);
    log.debug("loaded config file", { path: configPath });
  } else if (await fs.exists(manifestPath)) {
    const manifest = await readJson(fs, manifestPath);
    if (isRecord(manifest) && manifest.monoweave !== undefined) {
      fromDisk = manifest.monoweave;
      log.debug("loaded config from package.json");
    }
  }

  return resolveConfig(mergeConfigInput(fromDisk, overrides));
}
