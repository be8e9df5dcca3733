// This module registers prompt templates and renders them into message lists.

import { EntityRegistry, type RegisteredEntity, type RegistryOptions } from './registry.js';
import { normalizeSchema, type SchemaInput } from './schema.js';
import type { ArgumentMap, GetPromptResult, InvocationContext, PromptHandler } from '../types/domain.js';
import type { McpPrompt, McpPromptArgument } from '../types/mcp.js';

export interface PromptOptions {
  description?: string;
}

export interface RegisteredPrompt extends RegisteredEntity {
  handler: PromptHandler;
}

// A prompt handler may return plain text, which becomes a single user message.
export function toPromptResult(output: GetPromptResult | string, description?: string): GetPromptResult {
  if (typeof output !== 'string') {
    return output;
  }

  const result: GetPromptResult = { messages: [{ role: 'user', content: { type: 'text', text: output } }] };
  if (description !== undefined) {
    result.description = description;
  }
  return result;
}

export class PromptRegistry extends EntityRegistry<RegisteredPrompt, McpPrompt, GetPromptResult> {
  public constructor(options: RegistryOptions = {}) {
    super('prompt', options);
  }

  public register(
    name: string,
    schema: SchemaInput,
    handler: PromptHandler,
    options: PromptOptions = {}
  ): RegisteredPrompt {
    const normalized = normalizeSchema(schema, `prompt ${name}`);
    return this.store({
      name,
      description: options.description ?? normalized.description,
      schema: normalized,
      handler
    });
  }

  protected describe(prompt: RegisteredPrompt): McpPrompt[] {
    const required = new Set(prompt.schema.required);
    const promptArguments = Object.entries(prompt.schema.properties).map(([name, constraint]) => {
      const argument: McpPromptArgument = { name, required: required.has(name) };
      if (constraint.description !== undefined) {
        argument.description = constraint.description;
      }
      return argument;
    });

    const listed: McpPrompt = { name: prompt.name, arguments: promptArguments };
    if (prompt.description !== undefined) {
      listed.description = prompt.description;
    }
    return [listed];
  }

  protected async invoke(
    prompt: RegisteredPrompt,
    args: ArgumentMap,
    context: InvocationContext
  ): Promise<GetPromptResult> {
    context.logger.debug({ event: 'prompt_rendered', prompt: prompt.name }, 'prompt_rendered');
    return toPromptResult(await prompt.handler(args, context), prompt.description);
  }
}
