import { z } from "zod";
import { ConfigurationError } from "agentry-shared";
import type { RetryPolicy } from "agentry-kernel";

export const DEFAULT_CONTINUATION_PROMPT = "Continue working towards the goal.";

const retrySchema = z.object({
  maxAttempts: z.number().int().min(1).default(3),
  baseDelayMs: z.number().int().min(0).default(250),
  factor: z.number().min(1).default(2),
  maxDelayMs: z.number().int().min(0).default(4000),
});

export const engineConfigSchema = z.object({
  /** Number of worker loops */
  concurrency: z.number().int().min(1).default(4),
  /** Runs waiting in the queue before enqueue is rejected */
  queueCapacity: z.number().int().min(1).default(100),
  retry: retrySchema.default({ maxAttempts: 3, baseDelayMs: 250, factor: 2, maxDelayMs: 4000 }),
  modelTimeoutMs: z.number().int().positive().default(60_000),
  toolTimeoutMs: z.number().int().positive().default(30_000),
  /** Wall-clock limit per run, measured from its first start */
  runTimeoutMs: z.number().int().positive().optional(),
  continuationPrompt: z.string().min(1).default(DEFAULT_CONTINUATION_PROMPT),
  /** Worker id prefix, useful when several engines share a store */
  workerPrefix: z.string().min(1).default("worker"),
});

export type EngineConfig = z.output<typeof engineConfigSchema>;
export type EngineConfigInput = z.input<typeof engineConfigSchema>;

/**
 * Parse engine settings, filling defaults.
 *
 * @throws ConfigurationError listing every invalid field
 */
export function resolveEngineConfig(input: EngineConfigInput = {}): EngineConfig {
  const result = engineConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigurationError(`Invalid engine configuration: ${issues.join("; ")}`, "CONFIG_INVALID", {
      issues,
    });
  }
  return result.data;
}

export function retryPolicyOf(config: EngineConfig): RetryPolicy {
  return { ...config.retry };
}
