import fsp from "node:fs/promises";
import { parse as parseYaml } from "yaml";
import { z } from "zod";

const pluginConfigSchema = z.object({
  application: z.object({
    name: z.string().min(1),
    version: z.string().min(1),
  }),
  polling: z.object({
    timeoutSeconds: z.number().int().positive(),
    maxIntervalSeconds: z.number().int().positive(),
  }),
  compute: z.object({
    defaultInstanceNamePrefix: z.string().min(1),
    imageAliases: z.record(z.string().url()).default({}),
  }),
  database: z.object({
    defaultInstanceNamePrefix: z.string().min(1),
    databaseVersion: z.string().min(1),
    regionAliases: z.record(z.string()).default({}),
  }),
});

export type PluginConfig = z.infer<typeof pluginConfigSchema>;

/**
 * Load the plugin defaults file. Unlike the server environment, a missing
 * or malformed file is fatal at startup.
 */
export async function loadPluginConfig(configPath: string): Promise<PluginConfig> {
  let raw: string;
  try {
    raw = await fsp.readFile(configPath, "utf-8");
  } catch (err) {
    throw new Error(
      `Failed to read plugin config ${configPath}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
  return parsePluginConfig(raw, configPath);
}

export function parsePluginConfig(raw: string, source = "plugin config"): PluginConfig {
  let parsed: unknown;
  try {
    parsed = parseYaml(raw);
  } catch (err) {
    throw new Error(
      `Failed to parse ${source} YAML: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  const result = pluginConfigSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid ${source}: ${issues}`);
  }
  return result.data;
}
