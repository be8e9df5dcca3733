// This module registers callable tools and shapes their handler output into MCP tool results.

import { EntityRegistry, type RegisteredEntity, type RegistryOptions } from './registry.js';
import { normalizeSchema, toJsonSchema, type SchemaInput } from './schema.js';
import type { ArgumentMap, InvocationContext, ResultMap, ToolCallResult, ToolHandler } from '../types/domain.js';
import type { McpTool } from '../types/mcp.js';
import { stringifyForContent } from '../utils/json.js';

export interface ToolOptions {
  description?: string;
}

export interface RegisteredTool extends RegisteredEntity {
  handler: ToolHandler;
}

function isToolCallResult(value: ToolCallResult | ResultMap): value is ToolCallResult {
  return Array.isArray(value.content);
}

// This helper wraps plain handler output so every tool call answers with a content list.
export function toToolCallResult(output: ToolCallResult | ResultMap | string): ToolCallResult {
  if (typeof output === 'string') {
    return { content: [{ type: 'text', text: output }] };
  }

  if (isToolCallResult(output)) {
    return output;
  }

  return {
    content: [{ type: 'text', text: stringifyForContent(output) }],
    structuredContent: output
  };
}

export class ToolRegistry extends EntityRegistry<RegisteredTool, McpTool, ToolCallResult> {
  public constructor(options: RegistryOptions = {}) {
    super('tool', options);
  }

  public register(
    name: string,
    schema: SchemaInput,
    handler: ToolHandler,
    options: ToolOptions = {}
  ): RegisteredTool {
    return this.store({
      name,
      description: options.description,
      schema: normalizeSchema(schema, `tool ${name}`),
      handler
    });
  }

  protected describe(tool: RegisteredTool): McpTool[] {
    const listed: McpTool = { name: tool.name, inputSchema: toJsonSchema(tool.schema) };
    if (tool.description !== undefined) {
      listed.description = tool.description;
    }
    return [listed];
  }

  protected async invoke(
    tool: RegisteredTool,
    args: ArgumentMap,
    context: InvocationContext
  ): Promise<ToolCallResult> {
    context.logger.debug({ event: 'tool_invoked', tool: tool.name }, 'tool_invoked');
    return toToolCallResult(await tool.handler(args, context));
  }
}
