// Test fixture: model client that replays canned responses in order

import type {
  ContentBlock,
  ModelClient,
  ModelRequest,
  ModelResponse,
  StopReason,
} from "../types/index.js";

export function textResponse(text: string, stopReason: StopReason = "end_turn"): ModelResponse {
  return { content: [{ type: "text", text }], stopReason };
}

export function toolUseResponse(
  calls: Array<{ id: string; name: string; input: Record<string, unknown> }>
): ModelResponse {
  const content: ContentBlock[] = calls.map((call): ContentBlock => ({ type: "tool_use", ...call }));
  return { content, stopReason: "tool_use" };
}

export class ScriptedModelClient implements ModelClient {
  public requests: ModelRequest[] = [];

  constructor(private responses: Array<ModelResponse | Error>) {}

  async createMessage(request: ModelRequest): Promise<ModelResponse> {
    this.requests.push(structuredClone(request));
    const next = this.responses.shift();
    if (!next) {
      throw new Error(`No scripted response left for call ${this.requests.length}`);
    }
    if (next instanceof Error) {
      throw next;
    }
    return next;
  }
}
