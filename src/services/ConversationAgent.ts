import type {
  ContentBlock,
  ModelClient,
  ModelMessage,
  ModelRequest,
  ModelResponse,
  Source,
  ToolDefinition,
  ToolResultBlock,
  ToolUseBlock,
} from "../types/index.js";
import type { ToolRegistry } from "./ToolRegistry.js";
import { SYSTEM_PROMPT } from "../prompts.js";
import { ModelResponseError, ToolManagerRequiredError } from "../utils/errors.js";
import Logger from "../utils/logger.js";

export interface AgentOptions {
  model: string;
  maxTokens?: number;
  systemPrompt?: string;
}

export interface GenerateParams {
  query: string;
  conversationHistory?: string | null;
  tools?: ToolDefinition[];
  toolRegistry?: ToolRegistry;
}

export interface AgentResult {
  answer: string;
  /** Sources returned by the tools executed during this turn */
  sources: Source[];
}

const TEMPERATURE = 0;
const DEFAULT_MAX_TOKENS = 800;

function isToolUse(block: ContentBlock): block is ToolUseBlock {
  return block.type === "tool_use";
}

/**
 * Drives the exchange with the model. A response asking for tools gets
 * exactly one follow-up call, made without tools, so a turn costs at most two
 * model calls.
 */
export class ConversationAgent {
  private readonly model: string;
  private readonly maxTokens: number;
  private readonly systemPrompt: string;

  constructor(
    private readonly client: ModelClient,
    options: AgentOptions
  ) {
    this.model = options.model;
    this.maxTokens = options.maxTokens ?? DEFAULT_MAX_TOKENS;
    this.systemPrompt = options.systemPrompt ?? SYSTEM_PROMPT;
  }

  async generate(params: GenerateParams): Promise<AgentResult> {
    const { query, conversationHistory, tools = [], toolRegistry } = params;

    const system = conversationHistory
      ? `${this.systemPrompt}\n\nPrevious conversation:\n${conversationHistory}`
      : this.systemPrompt;
    const messages: ModelMessage[] = [{ role: "user", content: query }];

    const request: ModelRequest = {
      model: this.model,
      system,
      messages,
      temperature: TEMPERATURE,
      maxTokens: this.maxTokens,
      ...(tools.length > 0 ? { tools, toolChoice: { type: "auto" as const } } : {}),
    };

    const response = await this.client.createMessage(request);
    Logger.debug("Model responded", { stopReason: response.stopReason, blocks: response.content.length });

    if (response.stopReason !== "tool_use") {
      return { answer: this.extractText(response), sources: [] };
    }

    if (!toolRegistry) {
      throw new ToolManagerRequiredError(response.content.filter(isToolUse).map((b) => b.name));
    }

    return this.handleToolExecution(response, request, toolRegistry);
  }

  private async handleToolExecution(
    initialResponse: ModelResponse,
    initialRequest: ModelRequest,
    toolRegistry: ToolRegistry
  ): Promise<AgentResult> {
    const toolResults: ToolResultBlock[] = [];
    const sources: Source[] = [];

    // Sequential on purpose: transcript order must match request order
    for (const invocation of initialResponse.content.filter(isToolUse)) {
      Logger.debug(`Executing tool '${invocation.name}'`, { id: invocation.id, input: invocation.input });
      const output = await toolRegistry.execute(invocation.name, invocation.input);

      toolResults.push({
        type: "tool_result",
        toolUseId: invocation.id,
        content: output.content,
        ...(output.isError ? { isError: true } : {}),
      });
      sources.push(...output.sources);
    }

    const messages: ModelMessage[] = [
      ...initialRequest.messages,
      { role: "assistant", content: [...initialResponse.content] },
    ];
    if (toolResults.length > 0) {
      messages.push({ role: "user", content: toolResults });
    }

    const finalResponse = await this.client.createMessage({
      model: this.model,
      system: initialRequest.system,
      messages,
      temperature: TEMPERATURE,
      maxTokens: this.maxTokens,
    });

    return { answer: this.extractText(finalResponse), sources };
  }

  private extractText(response: ModelResponse): string {
    const texts = response.content.flatMap((block) => (block.type === "text" ? [block.text] : []));
    if (texts.length === 0) {
      throw new ModelResponseError(`Model response contained no text (stop reason: ${response.stopReason})`);
    }
    return texts.join("");
  }
}
