// This module validates invocation arguments against lightweight JSON-Schema-like descriptors.

import { isDeepStrictEqual } from 'node:util';
import type { ArgumentMap, ArgumentSchema, PropertyConstraint } from '../types/domain.js';
import { ValidationError, type SchemaViolation } from '../utils/errors.js';
import { isRecord } from '../utils/json.js';

function describeType(value: unknown): string {
  if (value === null) {
    return 'null';
  }

  if (Array.isArray(value)) {
    return 'array';
  }

  return typeof value;
}

// Unknown type tags accept any value, matching how permissive JSON-Schema consumers behave.
function matchesType(value: unknown, type: string): boolean {
  switch (type) {
    case 'string':
      return typeof value === 'string';
    case 'number':
      return typeof value === 'number' && !Number.isNaN(value);
    case 'integer':
      return typeof value === 'number' && Number.isInteger(value);
    case 'boolean':
      return typeof value === 'boolean';
    case 'object':
      return typeof value === 'object' && value !== null && !Array.isArray(value);
    case 'array':
      return Array.isArray(value);
    case 'null':
      return value === null;
    default:
      return true;
  }
}

function isPresent(args: Record<string, unknown>, name: string): boolean {
  return Object.prototype.hasOwnProperty.call(args, name) && args[name] !== undefined;
}

// Object keys that look like integers enumerate first, so an explicit `propertyOrder` wins over key order.
function orderedPropertyNames(properties: Record<string, PropertyConstraint>, order?: readonly string[]): string[] {
  const declared = Object.keys(properties);
  if (!order) {
    return declared;
  }

  const listed = order.filter((name) => Object.prototype.hasOwnProperty.call(properties, name));
  return [...new Set([...listed, ...declared])];
}

function joinPath(parent: string, name: string): string {
  return parent ? `${parent}.${name}` : name;
}

/**
 * Fail-fast validator: all required names are checked first, then each declared property that is present, in
 * declaration order (type, enum, nested schema). Values are never coerced.
 */
export class SchemaValidator {
  public validate(args: ArgumentMap, schema: ArgumentSchema): void {
    const violation = this.check(args, schema);
    if (violation) {
      throw new ValidationError(violation);
    }
  }

  public check(args: ArgumentMap, schema: ArgumentSchema): SchemaViolation | null {
    return this.checkObject(args, schema.properties, schema.required, '', schema.propertyOrder);
  }

  private checkObject(
    args: Record<string, unknown>,
    properties: Record<string, PropertyConstraint>,
    required: readonly string[],
    path: string,
    propertyOrder?: readonly string[]
  ): SchemaViolation | null {
    for (const name of required) {
      if (!isPresent(args, name)) {
        const fieldPath = joinPath(path, name);
        return {
          path: fieldPath,
          constraint: 'required',
          message: `Missing required parameter: ${fieldPath}`
        };
      }
    }

    for (const name of orderedPropertyNames(properties, propertyOrder)) {
      const constraint = properties[name];
      if (constraint === undefined || !isPresent(args, name)) {
        continue;
      }

      const violation = this.checkValue(args[name], constraint, joinPath(path, name));
      if (violation) {
        return violation;
      }
    }

    return null;
  }

  private checkValue(value: unknown, constraint: PropertyConstraint, path: string): SchemaViolation | null {
    if (constraint.type !== undefined) {
      const types = Array.isArray(constraint.type) ? constraint.type : [constraint.type];
      if (types.length > 0 && !types.some((type) => matchesType(value, type))) {
        return {
          path,
          constraint: 'type',
          expected: constraint.type,
          message: `Invalid type for parameter ${path}: expected ${types.join(' | ')}, received ${describeType(value)}`
        };
      }
    }

    if (constraint.enum && !constraint.enum.some((allowed) => isDeepStrictEqual(allowed, value))) {
      return {
        path,
        constraint: 'enum',
        expected: constraint.enum,
        message: `Invalid value for parameter ${path}: must be one of [${constraint.enum.map(String).join(', ')}]`
      };
    }

    if (isRecord(value) && (constraint.properties || constraint.required)) {
      return this.checkObject(
        value,
        constraint.properties ?? {},
        constraint.required ?? [],
        path,
        constraint.propertyOrder
      );
    }

    if (Array.isArray(value) && constraint.items) {
      for (const [index, item] of value.entries()) {
        const violation = this.checkValue(item, constraint.items, `${path}[${index}]`);
        if (violation) {
          return violation;
        }
      }
    }

    return null;
  }
}
