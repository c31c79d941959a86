/** Standard MCP tool result; the index signature matches the SDK result type */
export interface ToolResult {
  content: { type: string; text: string }[];
  isError?: boolean;
  [key: string]: unknown;
}

/** MCP tool definition with a JSON Schema input */
export interface ToolDefinition {
  name: string;
  description: string;
  inputSchema: {
    type: "object";
    properties: Record<string, unknown>;
    required?: string[];
  };
  [key: string]: unknown;
}

/**
 * A self-contained tool plugin that bundles its definition and handler.
 * Each plugin validates its own input with Zod and throws on invalid input.
 */
export interface ToolPlugin {
  /** MCP tool definition exposed to clients */
  definition: ToolDefinition;
  handler(args: Record<string, unknown> | undefined): Promise<ToolResult>;
}

export function jsonResult(data: unknown): ToolResult {
  return { content: [{ type: "text", text: JSON.stringify(data, null, 2) }] };
}
