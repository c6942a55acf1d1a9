import type { Source, Tool, ToolDefinition, ToolOutput } from "../types/index.js";
import { UnknownToolError, errorMessage } from "../utils/errors.js";
import Logger from "../utils/logger.js";

/**
 * Name-keyed collection of tools the model may call.
 */
export class ToolRegistry {
  private tools = new Map<string, Tool>();

  /**
   * Register a tool under its definition's name. A second tool with the same
   * name replaces the first.
   */
  register(tool: Tool): void {
    const { name } = tool.definition();
    if (this.tools.has(name)) {
      Logger.debug(`Replacing registered tool '${name}'`);
    }
    this.tools.set(name, tool);
  }

  getDefinitions(): ToolDefinition[] {
    return Array.from(this.tools.values()).map((tool) => tool.definition());
  }

  /**
   * Run a tool by name. Unknown names and tool failures come back as error
   * text so the model can recover conversationally.
   */
  async execute(name: string, input: Record<string, unknown>): Promise<ToolOutput> {
    const tool = this.tools.get(name);
    if (!tool) {
      const error = new UnknownToolError(name);
      Logger.warn(error.message, { available: Array.from(this.tools.keys()) });
      return { content: error.message, sources: [], isError: true };
    }

    try {
      return await tool.execute(input);
    } catch (error) {
      Logger.error(`Tool '${name}' failed`, { error: errorMessage(error) });
      return {
        content: `Error executing tool '${name}': ${errorMessage(error)}`,
        sources: [],
        isError: true,
      };
    }
  }

  collectSources(): Source[] {
    const sources: Source[] = [];
    for (const tool of this.tools.values()) {
      sources.push(...tool.lastSources);
    }
    return sources;
  }

  resetSources(): void {
    for (const tool of this.tools.values()) {
      tool.resetSources();
    }
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  get size(): number {
    return this.tools.size;
  }
}
