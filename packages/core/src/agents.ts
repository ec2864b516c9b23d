import { z } from "zod";
import { ValidationError, DEFAULT_MAX_TURNS, type Agent, type AgentConfig } from "agentry-shared";
import { validateTemplate } from "./prompt/template";

export const agentConfigSchema = z.object({
  model: z.string().trim().min(1),
  temperature: z.number().min(0).max(2).optional(),
  topP: z.number().min(0).max(1).optional(),
  maxTokens: z.number().int().positive().optional(),
  frequencyPenalty: z.number().min(-2).max(2).optional(),
  presencePenalty: z.number().min(-2).max(2).optional(),
  maxTurns: z.number().int().min(1).default(DEFAULT_MAX_TURNS),
  enableMultiTurn: z.boolean().default(true),
  goalCompletionPrompt: z.string().optional(),
});

export const inputVariableSchema = z.object({
  name: z
    .string()
    .trim()
    .min(1)
    .regex(/^[A-Za-z_][\w.-]*$/, "must start with a letter or underscore"),
  description: z.string().default(""),
  required: z.boolean().default(false),
});

/**
 * Client-supplied part of an agent. Ids, owner and timestamps are assigned
 * by the engine.
 */
export const agentDefinitionSchema = z
  .object({
    name: z.string().trim().min(1),
    description: z.string().default(""),
    prompt: z.string(),
    config: agentConfigSchema,
    tools: z.array(z.string().trim().min(1)).default([]),
    inputVariables: z.array(inputVariableSchema).default([]),
  })
  .superRefine((agent, ctx) => {
    const seen = new Set<string>();
    agent.inputVariables.forEach((variable, index) => {
      if (seen.has(variable.name)) {
        ctx.addIssue({
          code: "custom",
          path: ["inputVariables", index, "name"],
          message: `duplicate input variable '${variable.name}'`,
        });
      }
      seen.add(variable.name);
    });
  });

export type AgentDefinition = z.input<typeof agentDefinitionSchema>;
export type ParsedAgentDefinition = z.output<typeof agentDefinitionSchema>;

/**
 * Validate an agent definition, including its prompt template.
 *
 * @throws ValidationError naming the first invalid field
 */
export function parseAgentDefinition(input: unknown): ParsedAgentDefinition {
  const result = agentDefinitionSchema.safeParse(input);
  if (!result.success) {
    const [first] = result.error.issues;
    const field = first ? first.path.join(".") || "agent" : "agent";
    const issues = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ValidationError(field, `Invalid agent definition: ${issues.join("; ")}`, "VALIDATION_CONSTRAINT", {
      issues,
    });
  }

  try {
    validateTemplate(result.data.prompt, result.data.inputVariables);
  } catch (error) {
    throw new ValidationError(
      "prompt",
      error instanceof Error ? error.message : String(error),
      "VALIDATION_FORMAT",
    );
  }
  return result.data;
}

/**
 * Build a stored agent from a parsed definition.
 */
export function toAgent(
  definition: ParsedAgentDefinition,
  ids: { id: string; owner: string; createdAt: string; updatedAt: string },
): Agent {
  const config: AgentConfig = {
    model: definition.config.model,
    maxTurns: definition.config.maxTurns,
    enableMultiTurn: definition.config.enableMultiTurn,
  };
  const optional = [
    "temperature",
    "topP",
    "maxTokens",
    "frequencyPenalty",
    "presencePenalty",
    "goalCompletionPrompt",
  ] as const;
  for (const key of optional) {
    const value = definition.config[key];
    if (value !== undefined) {
      Object.assign(config, { [key]: value });
    }
  }

  return {
    id: ids.id,
    owner: ids.owner,
    entityType: "agent",
    name: definition.name,
    description: definition.description,
    prompt: definition.prompt,
    config,
    tools: definition.tools,
    inputVariables: definition.inputVariables,
    createdAt: ids.createdAt,
    updatedAt: ids.updatedAt,
  };
}
