import type { ChatCompletionTool } from "openai/resources/chat/completions";
import type { ToolDefinition, ValueSchema, WireType } from "./ToolTypes";

const JSON_TYPES: Record<WireType, string> = {
  string: "string",
  integer: "integer",
  float: "number",
  boolean: "boolean",
  json: "object",
};

/** Function names there may not contain dots, so `Math.Add` becomes `Math_Add`. */
export function openAIToolName(definition: ToolDefinition): string {
  return definition.fullyQualifiedName.replace(/\./g, "_");
}

function propertySchema(schema: ValueSchema, description: string): Record<string, unknown> {
  const property: Record<string, unknown> = { type: JSON_TYPES[schema.valType], description };
  if (schema.enum) property.enum = [...schema.enum];
  return property;
}

export function toOpenAITool(definition: ToolDefinition): ChatCompletionTool {
  const properties: Record<string, unknown> = {};
  const required: string[] = [];
  for (const p of definition.inputs.parameters) {
    properties[p.name] = propertySchema(p.valueSchema, p.description);
    if (p.required) required.push(p.name);
  }
  return {
    type: "function",
    function: {
      name: openAIToolName(definition),
      description: definition.description,
      parameters: { type: "object", properties, required },
    },
  };
}
