/**
 * Expose discovered MCP tools to the agent as AI SDK tools.
 * Each tool's execute forwards the call over the MCP connection.
 */
import { dynamicTool, jsonSchema, type ToolSet } from 'ai';
import type { JSONSchema7, JSONSchema7Definition } from 'json-schema';
import type { ToolDescriptor, ToolInvoker } from './connection.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isSchemaDefinition(value: unknown): value is JSONSchema7Definition {
  return typeof value === 'boolean' || isRecord(value);
}

/**
 * Object schema for a tool's arguments, keeping only the properties and
 * required list from the server-declared schema.
 */
export function toJsonSchema(parameters: ToolDescriptor['parameters']): JSONSchema7 {
  const properties: Record<string, JSONSchema7Definition> = {};
  for (const [name, definition] of Object.entries(parameters.properties ?? {})) {
    if (isSchemaDefinition(definition)) properties[name] = definition;
  }

  const schema: JSONSchema7 = { type: 'object', properties };
  if (parameters.required?.length) schema.required = parameters.required;
  return schema;
}

export function toAiTools(invoker: ToolInvoker, descriptors: ToolDescriptor[]): ToolSet {
  const tools: ToolSet = {};
  for (const descriptor of descriptors) {
    tools[descriptor.name] = dynamicTool({
      description: descriptor.description,
      inputSchema: jsonSchema(toJsonSchema(descriptor.parameters)),
      execute: async (input) => invoker.invoke({
        name: descriptor.name,
        arguments: isRecord(input) ? input : {}
      })
    });
  }
  return tools;
}
