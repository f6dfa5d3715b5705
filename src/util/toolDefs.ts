// Provider tool-definition shapes built from one shared parameter schema.

export type JsonSchemaProperty = {
  type: "string" | "integer" | "number" | "boolean" | "array" | "object";
  description?: string;
  enum?: string[];
  items?: { type: string };
};

export type ParametersSchema = {
  type: "object";
  properties: Record<string, JsonSchemaProperty>;
  required: string[];
};

export type ToolSpec = { name: string; description: string; parameters: ParametersSchema };

export type OpenAITool = {
  type: "function";
  function: { name: string; description: string; parameters: ParametersSchema; strict?: boolean };
};

export type AnthropicTool = { name: string; description: string; input_schema: ParametersSchema };

export type ToolOpts = { name?: string; description?: string };

export function openaiTool(spec: ToolSpec, opts: ToolOpts & { strict?: boolean } = {}): OpenAITool {
  const tool: OpenAITool = {
    type: "function",
    function: {
      name: opts.name ?? spec.name,
      description: opts.description ?? spec.description,
      parameters: structuredClone(spec.parameters),
    },
  };
  if (opts.strict) tool.function.strict = true;
  return tool;
}

export function anthropicTool(spec: ToolSpec, opts: ToolOpts = {}): AnthropicTool {
  return {
    name: opts.name ?? spec.name,
    description: opts.description ?? spec.description,
    input_schema: structuredClone(spec.parameters),
  };
}
