export class CourseRagError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = "CourseRagError";
  }
}

export class ConfigError extends CourseRagError {
  constructor(message: string, cause?: unknown) {
    super(message, "CONFIG_ERROR", cause);
    this.name = "ConfigError";
  }
}

/**
 * The model asked for a tool nobody registered. Rendered back to the model
 * as text rather than thrown across the loop.
 */
export class UnknownToolError extends CourseRagError {
  constructor(public readonly toolName: string) {
    super(`Tool '${toolName}' not found`, "UNKNOWN_TOOL");
    this.name = "UnknownToolError";
  }
}

/**
 * The model requested tool use but the caller supplied no registry.
 */
export class ToolManagerRequiredError extends CourseRagError {
  constructor(public readonly requestedTools: string[]) {
    super(
      `Model requested tool use (${requestedTools.join(", ") || "no tool named"}) but no tool registry was supplied`,
      "TOOL_MANAGER_REQUIRED"
    );
    this.name = "ToolManagerRequiredError";
  }
}

export class ModelResponseError extends CourseRagError {
  constructor(message: string, cause?: unknown) {
    super(message, "MODEL_RESPONSE_ERROR", cause);
    this.name = "ModelResponseError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
