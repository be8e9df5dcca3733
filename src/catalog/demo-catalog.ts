// This module registers the small example catalog served when the demo catalog is enabled.

import { setTimeout as sleep } from 'node:timers/promises';
import { z } from 'zod';
import type { McpServer } from '../mcp/mcp-server.js';
import type { ToolCallResult } from '../types/domain.js';

const CALCULATOR_OPERATIONS = ['add', 'subtract', 'multiply', 'divide'] as const;

type CalculatorOperation = (typeof CALCULATOR_OPERATIONS)[number];

function isCalculatorOperation(value: unknown): value is CalculatorOperation {
  return CALCULATOR_OPERATIONS.some((operation) => operation === value);
}

// This helper evaluates one binary operation and reports division by zero as a tool-level error result.
export function calculate(operation: CalculatorOperation, a: number, b: number): ToolCallResult {
  if (operation === 'divide' && b === 0) {
    return { content: [{ type: 'text', text: 'Division by zero is not allowed.' }], isError: true };
  }

  const value =
    operation === 'add' ? a + b : operation === 'subtract' ? a - b : operation === 'multiply' ? a * b : a / b;

  return {
    content: [{ type: 'text', text: String(value) }],
    structuredContent: { operation, a, b, value }
  };
}

const echoSchema = z.object({
  message: z.string().describe('Text to send back unchanged')
});

export interface DemoCatalogOptions {
  countdownIntervalMs?: number;
}

export function registerDemoCatalog(server: McpServer, options: DemoCatalogOptions = {}): void {
  const countdownIntervalMs = options.countdownIntervalMs ?? 1000;

  server.tools.register(
    'calculator',
    {
      properties: {
        operation: { type: 'string', enum: [...CALCULATOR_OPERATIONS], description: 'Arithmetic operation' },
        a: { type: 'number', description: 'Left operand' },
        b: { type: 'number', description: 'Right operand' }
      },
      required: ['operation', 'a', 'b']
    },
    (args) => {
      const { operation, a, b } = args;
      if (!isCalculatorOperation(operation) || typeof a !== 'number' || typeof b !== 'number') {
        throw new Error('calculator received arguments that passed validation with unexpected types');
      }
      return calculate(operation, a, b);
    },
    { description: 'Performs basic arithmetic on two numbers.' }
  );

  server.tools.register('echo', echoSchema, (args) => echoSchema.parse(args).message, {
    description: 'Returns the provided message.'
  });

  server.tools.register(
    'countdown',
    {
      properties: {
        steps: { type: 'integer', description: 'Number of ticks before completion' }
      },
      required: ['steps']
    },
    async (args, context) => {
      const steps = typeof args.steps === 'number' ? args.steps : 0;
      for (let remaining = steps; remaining > 0; remaining -= 1) {
        context.token.throwIfCancelled();
        context.logger.debug({ event: 'countdown_tick', remaining }, 'countdown_tick');
        await sleep(countdownIntervalMs);
      }

      context.token.throwIfCancelled();
      return { completedSteps: steps };
    },
    { description: 'Counts down one tick per interval and stops early when the request is cancelled.' }
  );

  server.resources.register('greeting', 'greeting://hello', () => 'Hello from the capability server.', {
    description: 'A static greeting.',
    mimeType: 'text/plain'
  });

  server.resources.registerTemplate(
    'user-profile',
    'user://{id}',
    (uri, variables) => ({
      contents: [
        {
          uri,
          mimeType: 'application/json',
          text: JSON.stringify({ id: variables.id, displayName: `User ${String(variables.id)}` })
        }
      ]
    }),
    { description: 'Profile document for one user id.', mimeType: 'application/json' }
  );

  server.prompts.register(
    'summarize',
    {
      description: 'Asks the model to summarize a text.',
      properties: {
        text: { type: 'string', description: 'Text to summarize' },
        style: { type: 'string', enum: ['brief', 'detailed'], description: 'Summary length' }
      },
      required: ['text']
    },
    (args) => {
      const style = args.style === 'detailed' ? 'a detailed' : 'a brief';
      return `Write ${style} summary of the following text:\n\n${String(args.text)}`;
    }
  );
}
