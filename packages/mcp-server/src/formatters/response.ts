/**
 * Turn "true"/"false" strings into booleans for the named top-level keys.
 * The MCP SDK sometimes passes boolean arguments as strings.
 */
export function coerceBooleans(params: unknown, keys: readonly string[]): unknown {
  if (params === null || typeof params !== "object" || Array.isArray(params)) return params;
  const result: Record<string, unknown> = { ...params };
  for (const key of keys) {
    if (result[key] === "true") result[key] = true;
    else if (result[key] === "false") result[key] = false;
  }
  return result;
}

export type ToolResponse = {
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
};

export function wrapResponse(result: unknown): ToolResponse {
  if (result instanceof Error) {
    return {
      content: [{ type: "text", text: JSON.stringify({ error: result.message, type: result.name }) }],
      isError: true,
    };
  }
  return {
    content: [{ type: "text", text: JSON.stringify(result, null, 2) }],
  };
}
