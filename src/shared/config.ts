import { z } from "zod";

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  DATABASE_URL: z.string().min(1).optional(),
});

export interface AppConfig {
  port: number;
  databaseUrl?: string;
}

/**
 * Read configuration from the environment. Call after `dotenv/config` has
 * been imported so that a local .env file is picked up.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new Error(`Invalid configuration: ${issues.join("; ")}`);
  }
  return { port: parsed.data.PORT, databaseUrl: parsed.data.DATABASE_URL };
}

/**
 * Resolve a setting from a CLI flag value, then an environment value, then
 * a default. Empty strings count as unset.
 */
export function resolveSetting(
  cliArg: string | undefined,
  envVar: string | undefined,
  fallback: string
): string {
  if (cliArg !== undefined && cliArg !== "") return cliArg;
  if (envVar !== undefined && envVar !== "") return envVar;
  return fallback;
}
