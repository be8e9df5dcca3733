// This module implements the RFC 6570 URI template subset used to match and expand resource URIs.

import { AppError } from '../utils/errors.js';
import type { TemplateVariables } from '../types/domain.js';

const MAX_TEMPLATE_LENGTH = 1_000_000;
const MAX_VARIABLE_LENGTH = 1_000_000;
const MAX_TEMPLATE_EXPRESSIONS = 10_000;

type Operator = '' | '+' | '#' | '.' | '/' | '?' | '&';

const OPERATORS: readonly Operator[] = ['+', '#', '.', '/', '?', '&'];

interface Expression {
  operator: Operator;
  names: string[];
  exploded: boolean;
}

type TemplatePart = string | Expression;

export interface TemplateVariable {
  name: string;
  exploded: boolean;
}

function assertLength(value: string, max: number, label: string): void {
  if (value.length > max) {
    throw new AppError(400, 'invalid_uri_template', `${label} exceeds maximum length of ${max} characters.`, {
      length: value.length
    });
  }
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\/]/g, '\\$&');
}

function decodeValue(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}

function parseOperator(expression: string): Operator {
  return OPERATORS.find((operator) => expression.startsWith(operator)) ?? '';
}

function parse(template: string): TemplatePart[] {
  const parts: TemplatePart[] = [];
  let literal = '';
  let expressionCount = 0;
  let index = 0;

  while (index < template.length) {
    if (template[index] !== '{') {
      literal += template[index];
      index += 1;
      continue;
    }

    const end = template.indexOf('}', index);
    if (end === -1) {
      throw new AppError(400, 'invalid_uri_template', 'Unclosed template expression.', { template });
    }

    expressionCount += 1;
    if (expressionCount > MAX_TEMPLATE_EXPRESSIONS) {
      throw new AppError(
        400,
        'invalid_uri_template',
        `Template contains more than ${MAX_TEMPLATE_EXPRESSIONS} expressions.`
      );
    }

    if (literal) {
      parts.push(literal);
      literal = '';
    }

    const body = template.slice(index + 1, end);
    const operator = parseOperator(body);
    const names = body
      .slice(operator.length)
      .split(',')
      .map((name) => name.replace('*', '').trim())
      .filter((name) => name.length > 0);

    for (const name of names) {
      assertLength(name, MAX_VARIABLE_LENGTH, 'Variable name');
    }

    parts.push({ operator, names, exploded: body.includes('*') });
    index = end + 1;
  }

  if (literal) {
    parts.push(literal);
  }

  return parts;
}

function encodeValue(value: string, operator: Operator): string {
  assertLength(value, MAX_VARIABLE_LENGTH, 'Variable value');
  // Reserved expansion keeps reserved characters such as "/" intact.
  return operator === '+' || operator === '#' ? encodeURI(value) : encodeURIComponent(value);
}

// This helper matches an expression listing several names, one capture per name in expansion order.
function multiNamePattern(operator: Exclude<Operator, '?' | '&'>, count: number): string {
  const captures = (capture: string, separator: string): string =>
    Array.from({ length: count }, () => capture).join(separator);

  switch (operator) {
    case '+':
      return captures('([^,]+)', ',');
    case '#':
      return `#${captures('([^,]+)', ',')}`;
    case '.':
      return `\\.${captures('([^/,.]+)', '\\.')}`;
    case '/':
      return `/${captures('([^/,]+)', '/')}`;
    default:
      return captures('([^/,]+)', ',');
  }
}

/**
 * Parsed URI template. `match` extracts placeholder bindings from a concrete URI, `expand` renders one.
 */
export class UriTemplate {
  private readonly parts: TemplatePart[];
  private matcher: { pattern: RegExp; groups: TemplateVariable[] } | null = null;

  public constructor(private readonly template: string) {
    assertLength(template, MAX_TEMPLATE_LENGTH, 'Template');
    this.parts = parse(template);
  }

  // This helper reports whether a string contains at least one non-blank template expression.
  public static isTemplate(value: string): boolean {
    return /\{[^}\s]+\}/.test(value);
  }

  public get variableNames(): string[] {
    return this.variables.map((variable) => variable.name);
  }

  public get variables(): TemplateVariable[] {
    return this.parts.flatMap((part) =>
      typeof part === 'string' ? [] : part.names.map((name) => ({ name, exploded: part.exploded }))
    );
  }

  public toString(): string {
    return this.template;
  }

  public expand(variables: TemplateVariables): string {
    let result = '';
    let hasQuery = false;

    for (const part of this.parts) {
      if (typeof part === 'string') {
        result += part;
        continue;
      }

      const expanded = this.expandExpression(part, variables);
      if (!expanded) {
        continue;
      }

      const isQuery = part.operator === '?' || part.operator === '&';
      result += isQuery && hasQuery ? expanded.replace(/^\?/, '&') : expanded;
      hasQuery = hasQuery || isQuery;
    }

    return result;
  }

  public match(uri: string): TemplateVariables | null {
    assertLength(uri, MAX_TEMPLATE_LENGTH, 'URI');
    const { pattern, groups } = this.buildMatcher();
    const found = pattern.exec(uri);
    if (!found) {
      return null;
    }

    const variables: TemplateVariables = {};
    groups.forEach((group, index) => {
      const raw = found[index + 1] ?? '';
      variables[group.name] =
        group.exploded && raw.includes(',') ? raw.split(',').map(decodeValue) : decodeValue(raw);
    });

    return variables;
  }

  private expandExpression(expression: Expression, variables: TemplateVariables): string {
    const { operator, names } = expression;

    if (operator === '?' || operator === '&') {
      const pairs: string[] = [];
      for (const name of names) {
        const value = variables[name];
        if (value === undefined) {
          continue;
        }

        const values = Array.isArray(value) ? value : [value];
        pairs.push(`${name}=${values.map((item) => encodeValue(item, operator)).join(',')}`);
      }

      return pairs.length > 0 ? `${operator}${pairs.join('&')}` : '';
    }

    const values = names.flatMap((name) => {
      const value = variables[name];
      if (value === undefined) {
        return [];
      }
      return Array.isArray(value) ? value : [value];
    });

    if (values.length === 0) {
      return '';
    }

    const encoded = values.map((value) => encodeValue(value, operator));
    switch (operator) {
      case '#':
        return `#${encoded.join(',')}`;
      case '.':
        return `.${encoded.join('.')}`;
      case '/':
        return `/${encoded.join('/')}`;
      default:
        return encoded.join(',');
    }
  }

  private buildMatcher(): { pattern: RegExp; groups: TemplateVariable[] } {
    if (this.matcher) {
      return this.matcher;
    }

    let source = '^';
    const groups: TemplateVariable[] = [];

    for (const part of this.parts) {
      if (typeof part === 'string') {
        source += escapeRegExp(part);
        continue;
      }

      const { operator, names, exploded } = part;
      if (operator === '?' || operator === '&') {
        names.forEach((name, index) => {
          const prefix = index === 0 ? `\\${operator}` : '&';
          source += `${prefix}${escapeRegExp(name)}=([^&]+)`;
          groups.push({ name, exploded });
        });
        continue;
      }

      if (names.length > 1) {
        source += multiNamePattern(operator, names.length);
        names.forEach((name) => groups.push({ name, exploded: false }));
        continue;
      }

      const segment = exploded ? '([^/]+(?:,[^/]+)*)' : '([^/,]+)';
      switch (operator) {
        case '+':
        case '#':
          source += operator === '#' ? '#(.+)' : '(.+)';
          break;
        case '.':
          source += '\\.([^/,]+)';
          break;
        case '/':
          source += `/${segment}`;
          break;
        default:
          source += segment;
      }
      groups.push({ name: names[0] ?? '', exploded });
    }

    this.matcher = { pattern: new RegExp(`${source}$`), groups };
    return this.matcher;
  }
}
