import { z } from "zod";

const ConfigSchema = z.object({
  PORT: z.coerce.number().default(8080),
  HOST: z.string().default("0.0.0.0"),
  MCP_PATH: z.string().default("/mcp"),
  YOUTRACK_URL: z.string().url("YOUTRACK_URL must be a valid URL"),
  YOUTRACK_API_TOKEN: z.string().min(1, "YOUTRACK_API_TOKEN is required"),
  YOUTRACK_DEFAULT_PROJECT_KEY: z
    .string()
    .optional()
    .transform((key) => key?.trim() || undefined),
  YOUTRACK_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

export function parseConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return Object.freeze(ConfigSchema.parse(env));
}
