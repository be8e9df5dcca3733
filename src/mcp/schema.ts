// This module normalizes argument descriptors (schemas, raw JSON-Schema objects, zod objects) into one shape.

import { z, ZodType } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import type { ArgumentSchema, PropertyConstraint } from '../types/domain.js';
import { AppError } from '../utils/errors.js';

export type RawSchemaDescriptor = {
  type?: string;
  properties?: Record<string, unknown>;
  required?: unknown[];
  description?: string;
  propertyOrder?: unknown[];
};

export type SchemaInput = ArgumentSchema | RawSchemaDescriptor | ZodType;

const propertyConstraintSchema: z.ZodType<PropertyConstraint> = z.lazy(() =>
  z.object({
    type: z.union([z.string(), z.array(z.string())]).optional(),
    description: z.string().optional(),
    enum: z.array(z.unknown()).optional(),
    properties: z.record(propertyConstraintSchema).optional(),
    required: z.array(z.string()).optional(),
    items: propertyConstraintSchema.optional(),
    propertyOrder: z.array(z.string()).optional()
  })
);

const rawDescriptorSchema = z.object({
  type: z.literal('object').optional(),
  properties: z.record(propertyConstraintSchema).default({}),
  required: z.array(z.string()).default([]),
  description: z.string().optional(),
  propertyOrder: z.array(z.string()).optional()
});

export const EMPTY_SCHEMA: ArgumentSchema = Object.freeze({ properties: {}, required: [] });

// This helper converts one zod object into the JSON-Schema descriptor shape the validator understands.
function descriptorFromZod(schema: ZodType): unknown {
  return zodToJsonSchema(schema, { $refStrategy: 'none', target: 'jsonSchema7' });
}

export function normalizeSchema(input: SchemaInput, label: string): ArgumentSchema {
  const descriptor = input instanceof ZodType ? descriptorFromZod(input) : input;
  const parsed = rawDescriptorSchema.safeParse(descriptor);

  if (!parsed.success) {
    throw new AppError(400, 'invalid_schema', `Argument schema for ${label} is malformed.`, {
      issues: parsed.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message }))
    });
  }

  const { properties, required, description, propertyOrder } = parsed.data;
  const schema: ArgumentSchema = { properties, required };
  if (description !== undefined) {
    schema.description = description;
  }
  if (propertyOrder !== undefined) {
    schema.propertyOrder = propertyOrder;
  }
  return schema;
}

// This helper renders a normalized schema as the JSON-Schema object advertised in listings.
export function toJsonSchema(schema: ArgumentSchema): Record<string, unknown> {
  const rendered: Record<string, unknown> = {
    type: 'object',
    properties: schema.properties
  };

  if (schema.required.length > 0) {
    rendered.required = [...schema.required];
  }

  if (schema.description !== undefined) {
    rendered.description = schema.description;
  }

  return rendered;
}
