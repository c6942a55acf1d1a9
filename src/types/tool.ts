/**
 * A citation for retrieved content: a readable label plus an optional deep link
 */
export interface Source {
  text: string;
  url: string | null;
}

export type JsonSchemaType = "string" | "integer" | "number" | "boolean" | "array" | "object";

export interface JsonSchemaProperty {
  type: JsonSchemaType;
  description?: string;
  enum?: ReadonlyArray<string | number>;
}

export interface ToolInputSchema {
  type: "object";
  properties: Readonly<Record<string, JsonSchemaProperty>>;
  required: ReadonlyArray<string>;
}

/**
 * Declares a callable tool to the language model
 */
export interface ToolDefinition {
  readonly name: string;
  readonly description: string;
  readonly inputSchema: ToolInputSchema;
}

/**
 * What a tool hands back after running: text for the model and the
 * sources that text was built from.
 */
export interface ToolOutput {
  content: string;
  sources: Source[];
  isError?: boolean;
}

export interface Tool {
  definition(): ToolDefinition;
  execute(input: Record<string, unknown>): Promise<ToolOutput>;
  /** Sources recorded by the most recent successful execution */
  readonly lastSources: ReadonlyArray<Source>;
  resetSources(): void;
}
