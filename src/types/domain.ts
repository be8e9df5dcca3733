// This file defines the shared domain types for registered entities, argument schemas, and invocation context.

import type { CancellationToken } from '../mcp/cancellation.js';
import type { LogSink } from '../utils/logger.js';

export type EntityKind = 'tool' | 'resource' | 'prompt';

export type ArgumentMap = Record<string, unknown>;

export type ResultMap = Record<string, unknown>;

// This type names the explicit policy applied when a name is registered a second time.
export type DuplicatePolicy = 'overwrite' | 'reject';

export interface PropertyConstraint {
  type?: string | string[];
  description?: string;
  enum?: unknown[];
  properties?: Record<string, PropertyConstraint>;
  required?: string[];
  items?: PropertyConstraint;
  propertyOrder?: string[];
}

export interface ArgumentSchema {
  properties: Record<string, PropertyConstraint>;
  required: string[];
  description?: string;
  // Validation order for property names that object key order cannot express, such as "1" after "name".
  propertyOrder?: string[];
}

export interface InvocationContext {
  token: CancellationToken;
  logger: LogSink;
  sessionId: string | null;
}

export type MaybePromise<T> = T | Promise<T>;

export interface TextContent {
  type: 'text';
  text: string;
}

export interface ImageContent {
  type: 'image';
  data: string;
  mimeType: string;
}

export interface EmbeddedResourceContent {
  type: 'resource';
  resource: ResourceContents;
}

export type ContentItem = TextContent | ImageContent | EmbeddedResourceContent;

export interface ToolCallResult {
  content: ContentItem[];
  structuredContent?: Record<string, unknown>;
  isError?: boolean;
}

export type ToolHandler = (
  args: ArgumentMap,
  context: InvocationContext
) => MaybePromise<ToolCallResult | ResultMap | string>;

export interface TextResourceContents {
  uri: string;
  mimeType?: string;
  text: string;
}

export interface BlobResourceContents {
  uri: string;
  mimeType?: string;
  blob: string;
}

export type ResourceContents = TextResourceContents | BlobResourceContents;

export interface ReadResourceResult {
  contents: ResourceContents[];
}

export type ResourceHandler = (uri: string, context: InvocationContext) => MaybePromise<ReadResourceResult | string>;

export type TemplateVariables = Record<string, string | string[]>;

export type ResourceTemplateHandler = (
  uri: string,
  variables: TemplateVariables,
  context: InvocationContext
) => MaybePromise<ReadResourceResult | string>;

export interface PromptMessage {
  role: 'user' | 'assistant';
  content: ContentItem;
}

export interface GetPromptResult {
  description?: string;
  messages: PromptMessage[];
}

export type PromptHandler = (args: ArgumentMap, context: InvocationContext) => MaybePromise<GetPromptResult | string>;
