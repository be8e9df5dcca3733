// This module registers readable resources by literal URI or URI template and resolves incoming URIs to them.

import { EntityRegistry, type RegisteredEntity, type RegistryOptions } from './registry.js';
import { EMPTY_SCHEMA } from './schema.js';
import { UriTemplate } from './uri-template.js';
import type {
  ArgumentMap,
  ArgumentSchema,
  InvocationContext,
  PropertyConstraint,
  ReadResourceResult,
  ResourceHandler,
  ResourceTemplateHandler,
  TemplateVariables,
  TextResourceContents
} from '../types/domain.js';
import type { McpResource, McpResourceTemplate } from '../types/mcp.js';
import { NotFoundError } from '../utils/errors.js';

export interface ResourceOptions {
  description?: string;
  mimeType?: string;
}

export interface LiteralResource extends RegisteredEntity {
  type: 'literal';
  uri: string;
  mimeType?: string;
  handler: ResourceHandler;
}

export interface TemplateResource extends RegisteredEntity {
  type: 'template';
  template: UriTemplate;
  mimeType?: string;
  handler: ResourceTemplateHandler;
}

export type RegisteredResource = LiteralResource | TemplateResource;

export interface ResolvedResource {
  resource: RegisteredResource;
  variables: TemplateVariables;
}

// Every placeholder becomes a required string; exploded placeholders may also bind a list.
function templateSchema(template: UriTemplate): ArgumentSchema {
  const properties: Record<string, PropertyConstraint> = {};
  for (const variable of template.variables) {
    properties[variable.name] = { type: variable.exploded ? ['string', 'array'] : 'string' };
  }

  return { properties, required: Object.keys(properties) };
}

function toTemplateVariables(args: ArgumentMap): TemplateVariables {
  const variables: TemplateVariables = {};
  for (const [name, value] of Object.entries(args)) {
    if (typeof value === 'string') {
      variables[name] = value;
    } else if (Array.isArray(value)) {
      variables[name] = value.map((item) => String(item));
    }
  }
  return variables;
}

// This helper wraps plain-text handler output into a single contents entry for the read URI.
export function toReadResourceResult(
  output: ReadResourceResult | string,
  uri: string,
  mimeType?: string
): ReadResourceResult {
  if (typeof output !== 'string') {
    return output;
  }

  const contents: TextResourceContents = { uri, text: output };
  if (mimeType !== undefined) {
    contents.mimeType = mimeType;
  }
  return { contents: [contents] };
}

/**
 * Literal resources and templates share one name namespace. Resolution tries literal URIs first, then templates
 * in registration order.
 */
export class ResourceRegistry extends EntityRegistry<RegisteredResource, McpResource, ReadResourceResult> {
  public constructor(options: RegistryOptions = {}) {
    super('resource', options);
  }

  public register(
    name: string,
    uri: string,
    handler: ResourceHandler,
    options: ResourceOptions = {}
  ): LiteralResource {
    const resource: LiteralResource = {
      type: 'literal',
      name,
      uri,
      description: options.description,
      mimeType: options.mimeType,
      schema: EMPTY_SCHEMA,
      handler
    };
    this.store(resource);
    return resource;
  }

  public registerTemplate(
    name: string,
    uriPattern: string,
    handler: ResourceTemplateHandler,
    options: ResourceOptions = {}
  ): TemplateResource {
    const template = new UriTemplate(uriPattern);
    const resource: TemplateResource = {
      type: 'template',
      name,
      template,
      description: options.description,
      mimeType: options.mimeType,
      schema: templateSchema(template),
      handler
    };
    this.store(resource);
    return resource;
  }

  public listTemplates(): McpResourceTemplate[] {
    const templates: McpResourceTemplate[] = [];
    for (const resource of this.entries.values()) {
      if (resource.type !== 'template') {
        continue;
      }

      const listed: McpResourceTemplate = { name: resource.name, uriTemplate: resource.template.toString() };
      if (resource.description !== undefined) {
        listed.description = resource.description;
      }
      if (resource.mimeType !== undefined) {
        listed.mimeType = resource.mimeType;
      }
      templates.push(listed);
    }
    return templates;
  }

  public resolve(uri: string): ResolvedResource {
    const resources = [...this.entries.values()];

    for (const resource of resources) {
      if (resource.type === 'literal' && resource.uri === uri) {
        return { resource, variables: {} };
      }
    }

    for (const resource of resources) {
      if (resource.type !== 'template') {
        continue;
      }

      const variables = resource.template.match(uri);
      if (variables) {
        return { resource, variables };
      }
    }

    throw new NotFoundError('resource', uri);
  }

  public async read(uri: string, context?: Partial<InvocationContext>): Promise<ReadResourceResult> {
    const { resource, variables } = this.resolve(uri);
    this.validator.validate(variables, resource.schema);

    return this.guard(resource, this.createContext(context), (resolved) =>
      this.readResolved(resource, uri, variables, resolved)
    );
  }

  protected describe(resource: RegisteredResource): McpResource[] {
    if (resource.type !== 'literal') {
      return [];
    }

    const listed: McpResource = { name: resource.name, uri: resource.uri };
    if (resource.description !== undefined) {
      listed.description = resource.description;
    }
    if (resource.mimeType !== undefined) {
      listed.mimeType = resource.mimeType;
    }
    return [listed];
  }

  // Executing by name reads a literal resource, or expands a template from the supplied bindings first.
  protected async invoke(
    resource: RegisteredResource,
    args: ArgumentMap,
    context: InvocationContext
  ): Promise<ReadResourceResult> {
    if (resource.type === 'literal') {
      return this.readResolved(resource, resource.uri, {}, context);
    }

    const variables = toTemplateVariables(args);
    return this.readResolved(resource, resource.template.expand(variables), variables, context);
  }

  private async readResolved(
    resource: RegisteredResource,
    uri: string,
    variables: TemplateVariables,
    context: InvocationContext
  ): Promise<ReadResourceResult> {
    context.logger.debug({ event: 'resource_read', resource: resource.name, uri }, 'resource_read');

    const output =
      resource.type === 'literal'
        ? await resource.handler(uri, context)
        : await resource.handler(uri, variables, context);

    return toReadResourceResult(output, uri, resource.mimeType);
  }
}
