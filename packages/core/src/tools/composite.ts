import type { ToolDescriptor, ToolOutcome } from "agentry-shared";
import { Logger } from "agentry-kernel";
import type { InvokeOptions, ToolProvider } from "./types";

/**
 * Merges several providers. When two providers expose the same tool name the
 * first one wins.
 */
export class CompositeToolProvider implements ToolProvider {
  private log = Logger.for(this);
  private owners = new Map<string, ToolProvider>();

  constructor(private readonly providers: ToolProvider[]) {}

  async listTools(): Promise<ToolDescriptor[]> {
    const owners = new Map<string, ToolProvider>();
    const tools: ToolDescriptor[] = [];

    for (const provider of this.providers) {
      for (const tool of await provider.listTools()) {
        if (owners.has(tool.name)) {
          this.log.warn({ tool: tool.name }, "Duplicate tool name, keeping the first provider's tool");
          continue;
        }
        owners.set(tool.name, provider);
        tools.push(tool);
      }
    }

    this.owners = owners;
    return tools;
  }

  async invoke(name: string, args: Record<string, unknown>, options: InvokeOptions = {}): Promise<ToolOutcome> {
    if (!this.owners.has(name)) {
      await this.listTools();
    }
    const provider = this.owners.get(name);
    if (!provider) {
      return { ok: false, kind: "not_found", message: `Tool '${name}' not found` };
    }
    return provider.invoke(name, args, options);
  }
}
