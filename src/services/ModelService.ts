import type OpenAI from "openai";
import type {
  ContentBlock,
  MessageBlock,
  ModelClient,
  ModelMessage,
  ModelRequest,
  ModelResponse,
  StopReason,
  ToolDefinition,
} from "../types/index.js";
import { ModelResponseError, errorMessage } from "../utils/errors.js";
import Logger from "../utils/logger.js";

type ChatMessageParam = OpenAI.Chat.Completions.ChatCompletionMessageParam;
type ChatTool = OpenAI.Chat.Completions.ChatCompletionTool;

interface ToolCallLike {
  id: string;
  type: string;
  function?: { name: string; arguments: string };
}

export interface CompletionChoiceLike {
  finish_reason: string;
  message: {
    content: string | null;
    tool_calls?: ToolCallLike[];
  };
}

/** The slice of the OpenAI client this service calls */
export interface ChatCompletionsApi {
  chat: {
    completions: {
      create(
        body: OpenAI.Chat.Completions.ChatCompletionCreateParamsNonStreaming
      ): PromiseLike<{ choices: CompletionChoiceLike[] }>;
    };
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toChatTool(definition: ToolDefinition): ChatTool {
  return {
    type: "function",
    function: {
      name: definition.name,
      description: definition.description,
      parameters: {
        type: "object",
        properties: { ...definition.inputSchema.properties },
        required: [...definition.inputSchema.required],
      },
    },
  };
}

function textOf(blocks: MessageBlock[]): string {
  return blocks.flatMap((b) => (b.type === "text" ? [b.text] : [])).join("");
}

/**
 * Flattens one block-based message into chat-completion messages: tool
 * results become `tool` messages, tool requests become `tool_calls`.
 */
export function toChatMessages(message: ModelMessage): ChatMessageParam[] {
  if (typeof message.content === "string") {
    return message.role === "user"
      ? [{ role: "user", content: message.content }]
      : [{ role: "assistant", content: message.content }];
  }

  const blocks = message.content;

  if (message.role === "assistant") {
    const toolCalls = blocks.flatMap((b) =>
      b.type === "tool_use"
        ? [{ id: b.id, type: "function" as const, function: { name: b.name, arguments: JSON.stringify(b.input) } }]
        : []
    );
    const text = textOf(blocks);
    return [
      {
        role: "assistant",
        content: text.length > 0 ? text : null,
        ...(toolCalls.length > 0 ? { tool_calls: toolCalls } : {}),
      },
    ];
  }

  const result: ChatMessageParam[] = [];
  for (const block of blocks) {
    if (block.type === "tool_result") {
      result.push({ role: "tool", tool_call_id: block.toolUseId, content: block.content });
    }
  }
  const text = textOf(blocks);
  if (text.length > 0) {
    result.push({ role: "user", content: text });
  }
  return result;
}

export function toStopReason(finishReason: string): StopReason {
  switch (finishReason) {
    case "tool_calls":
    case "function_call":
      return "tool_use";
    case "length":
      return "max_tokens";
    case "content_filter":
      return "refusal";
    default:
      return "end_turn";
  }
}

function parseArguments(id: string, name: string, args: string): Record<string, unknown> {
  if (args.trim() === "") return {};
  let parsed: unknown;
  try {
    parsed = JSON.parse(args);
  } catch (error) {
    throw new ModelResponseError(
      `Tool call '${name}' (${id}) has invalid JSON arguments: ${errorMessage(error)}`,
      error
    );
  }
  if (!isRecord(parsed)) {
    throw new ModelResponseError(`Tool call '${name}' (${id}) arguments are not an object`);
  }
  return parsed;
}

export function toModelResponse(choice: CompletionChoiceLike): ModelResponse {
  const content: ContentBlock[] = [];

  if (choice.message.content) {
    content.push({ type: "text", text: choice.message.content });
  }

  for (const call of choice.message.tool_calls ?? []) {
    if (call.type !== "function" || !call.function) {
      Logger.warn("Ignoring non-function tool call", { id: call.id, type: call.type });
      continue;
    }
    content.push({
      type: "tool_use",
      id: call.id,
      name: call.function.name,
      input: parseArguments(call.id, call.function.name, call.function.arguments),
    });
  }

  return { content, stopReason: toStopReason(choice.finish_reason) };
}

/**
 * Chat model behind any OpenAI-compatible chat completions endpoint.
 */
export class ModelService implements ModelClient {
  constructor(private readonly client: ChatCompletionsApi) {}

  async createMessage(request: ModelRequest): Promise<ModelResponse> {
    const messages: ChatMessageParam[] = [
      { role: "system", content: request.system },
      ...request.messages.flatMap(toChatMessages),
    ];

    const body: OpenAI.Chat.Completions.ChatCompletionCreateParamsNonStreaming = {
      model: request.model,
      messages,
      temperature: request.temperature,
      max_tokens: request.maxTokens,
      ...(request.tools && request.tools.length > 0 ? { tools: request.tools.map(toChatTool) } : {}),
      ...(request.toolChoice ? { tool_choice: request.toolChoice.type } : {}),
    };

    Logger.debug("Calling chat model", {
      model: request.model,
      messages: messages.length,
      tools: request.tools?.length ?? 0,
    });

    const completion = await this.client.chat.completions.create(body);
    const choice = completion.choices[0];
    if (!choice) {
      throw new ModelResponseError("Chat completion returned no choices");
    }

    return toModelResponse(choice);
  }
}
