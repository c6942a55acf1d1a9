import type { ToolDefinition } from "./tool.js";

export type StopReason = "end_turn" | "tool_use" | "max_tokens" | "stop_sequence" | "refusal";

export interface TextBlock {
  type: "text";
  text: string;
}

/**
 * A tool invocation requested by the model mid-conversation
 */
export interface ToolUseBlock {
  type: "tool_use";
  id: string;
  name: string;
  input: Record<string, unknown>;
}

export interface ToolResultBlock {
  type: "tool_result";
  toolUseId: string;
  content: string;
  isError?: boolean;
}

/** Blocks a model response may contain */
export type ContentBlock = TextBlock | ToolUseBlock;

export type MessageBlock = TextBlock | ToolUseBlock | ToolResultBlock;

export interface ModelMessage {
  role: "user" | "assistant";
  content: string | MessageBlock[];
}

export interface ModelRequest {
  model: string;
  system: string;
  messages: ModelMessage[];
  temperature: number;
  maxTokens: number;
  tools?: ToolDefinition[];
  toolChoice?: { type: "auto" };
}

export interface ModelResponse {
  content: ContentBlock[];
  stopReason: StopReason;
}

export interface ModelClient {
  createMessage(request: ModelRequest): Promise<ModelResponse>;
}

export interface Embedder {
  embed(texts: string[]): Promise<Float32Array[]>;
}
