import { z } from "zod";
import { ConfigurationError } from "agentry-shared";

const mcpServersSchema = z
  .string()
  .transform((raw, ctx): unknown => {
    try {
      return JSON.parse(raw);
    } catch {
      ctx.addIssue({ code: "custom", message: "must be a JSON object of server name to URL" });
      return z.NEVER;
    }
  })
  .pipe(z.record(z.string().min(1), z.url()));

export const serverEnvSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  LOG_LEVEL: z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]).default("info"),
  OPENAI_API_KEY: z.string().min(1).optional(),
  OPENAI_BASE_URL: z.url().optional(),
  AGENT_CONCURRENCY: z.coerce.number().int().min(1).default(4),
  AGENT_QUEUE_CAPACITY: z.coerce.number().int().min(1).default(100),
  AGENT_RUN_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  SYNC_RUN_TIMEOUT_MS: z.coerce.number().int().positive().default(120_000),
  MCP_SERVERS: mcpServersSchema.optional(),
});

export type ServerConfig = z.output<typeof serverEnvSchema>;

/**
 * Read server settings from the environment.
 *
 * @throws ConfigurationError listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const result = serverEnvSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigurationError(`Invalid server environment: ${issues.join("; ")}`, "CONFIG_INVALID", { issues });
  }
  return result.data;
}
