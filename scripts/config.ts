import { resolve } from "path";
import { z } from "zod";

export const DEFAULT_OUTPUT_DIR = "src/icons";
export const DEFAULT_API_URL = "https://api.iconify.design";

const configSchema = z.object({
  outputDir: z.string().min(1).default(DEFAULT_OUTPUT_DIR),
  apiBaseUrl: z
    .string()
    .url()
    .default(DEFAULT_API_URL)
    .transform((url) => url.replace(/\/+$/, "")),
  // fixed per-request timeout, there are no retries
  timeoutMs: z.coerce.number().int().positive().default(30_000),
  // icon names per registry request
  batchSize: z.coerce.number().int().positive().default(32),
});

export type IconsmithConfig = z.infer<typeof configSchema>;
export type ConfigOverrides = Partial<z.input<typeof configSchema>>;

function fromEnv(env: NodeJS.ProcessEnv): Record<string, string | undefined> {
  return {
    outputDir: env.ICONSMITH_OUTPUT_DIR || undefined,
    apiBaseUrl: env.ICONSMITH_API_URL || undefined,
    timeoutMs: env.ICONSMITH_TIMEOUT_MS || undefined,
    batchSize: env.ICONSMITH_BATCH_SIZE || undefined,
  };
}

function definedOnly(values: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(values).filter(([, value]) => value !== undefined));
}

/**
 * Defaults < environment < explicit overrides (CLI flags). Throws a ZodError on invalid values.
 */
export function loadConfig(overrides: ConfigOverrides = {}, env: NodeJS.ProcessEnv = process.env): IconsmithConfig {
  const config = configSchema.parse({ ...definedOnly(fromEnv(env)), ...definedOnly(overrides) });
  return { ...config, outputDir: resolve(config.outputDir) };
}
