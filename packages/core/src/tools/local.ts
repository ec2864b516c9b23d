/**
 * In-process tools defined with zod input schemas.
 *
 * @example
 * ```typescript
 * const tools = new LocalToolProvider([
 *   defineTool({
 *     name: 'get_balance',
 *     description: 'Current ledger balance for a customer',
 *     input: z.object({ customerId: z.string() }),
 *     group: 'LedgerAPI',
 *     handler: async ({ customerId }) => ledger.balance(customerId),
 *   }),
 * ]);
 * ```
 */

import { z } from "zod";
import { TransientToolError, ensureError, type ToolDescriptor, type ToolOutcome } from "agentry-shared";
import type { InvokeOptions, ToolProvider } from "./types";

export interface LocalToolDefinition<TSchema extends z.ZodType = z.ZodType> {
  name: string;
  description: string;
  input: TSchema;
  group?: string;
  handler: (input: z.output<TSchema>, options: InvokeOptions) => unknown | Promise<unknown>;
}

export interface LocalTool {
  descriptor: ToolDescriptor;
  run(args: Record<string, unknown>, options: InvokeOptions): Promise<ToolOutcome>;
}

export function defineTool<TSchema extends z.ZodType>(definition: LocalToolDefinition<TSchema>): LocalTool {
  const descriptor: ToolDescriptor = {
    name: definition.name,
    description: definition.description,
    inputSchema: z.toJSONSchema(definition.input),
    ...(definition.group ? { group: definition.group } : {}),
  };

  return {
    descriptor,
    async run(args, options) {
      const parsed = definition.input.safeParse(args);
      if (!parsed.success) {
        const issues = parsed.error.issues.map((issue) =>
          issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
        );
        return { ok: false, kind: "invocation_failed", message: `Invalid arguments: ${issues.join("; ")}` };
      }
      try {
        return { ok: true, value: await definition.handler(parsed.data, options) };
      } catch (error) {
        if (error instanceof TransientToolError) {
          throw error;
        }
        return { ok: false, kind: "invocation_failed", message: ensureError(error).message };
      }
    },
  };
}

export class LocalToolProvider implements ToolProvider {
  private readonly tools = new Map<string, LocalTool>();

  constructor(tools: LocalTool[] = []) {
    for (const tool of tools) {
      this.register(tool);
    }
  }

  register(tool: LocalTool): this {
    this.tools.set(tool.descriptor.name, tool);
    return this;
  }

  async listTools(): Promise<ToolDescriptor[]> {
    return Array.from(this.tools.values(), (tool) => tool.descriptor);
  }

  async invoke(name: string, args: Record<string, unknown>, options: InvokeOptions = {}): Promise<ToolOutcome> {
    const tool = this.tools.get(name);
    if (!tool) {
      return { ok: false, kind: "not_found", message: `Tool '${name}' not found` };
    }
    return tool.run(args, options);
  }
}
