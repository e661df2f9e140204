import { z } from 'zod';
import type { BuiltinToolName } from '../types/config.js';
import type { ParameterSchema, ToolOperation } from '../types/index.js';
import { defineOperation, type ToolRegistry } from '../core/tool-registry.js';

const ARITHMETIC: Record<string, (a: number, b: number) => number> = {
  add: (a, b) => a + b,
  subtract: (a, b) => a - b,
  multiply: (a, b) => a * b,
  divide: (a, b) => {
    if (b === 0) {
      throw new Error('division by zero');
    }
    return a / b;
  },
};

export const CALCULATOR_SCHEMA: ParameterSchema = {
  operation: {
    type: 'string',
    description: 'One of: add, subtract, multiply, divide',
  },
  a: { type: 'number', description: 'First operand' },
  b: { type: 'number', description: 'Second operand' },
};

/**
 * Basic arithmetic. Registered with an explicit schema, so it reads its
 * already-validated parameters directly.
 */
export const calculator: ToolOperation = (params) => {
  const { operation, a, b } = params;
  if (typeof operation !== 'string' || typeof a !== 'number' || typeof b !== 'number') {
    throw new Error('expected operation (string), a (number), b (number)');
  }

  const apply = Object.prototype.hasOwnProperty.call(ARITHMETIC, operation)
    ? ARITHMETIC[operation]
    : undefined;
  if (!apply) {
    throw new Error(`unsupported operation "${operation}"`);
  }
  return apply(a, b);
};

export const stringAnalyzer = defineOperation(
  z.object({
    text: z.string().describe('The text to analyze'),
  }),
  ({ text }) => {
    const words = text.split(/\s+/).filter((word) => word.length > 0);
    const totalLetters = words.reduce((sum, word) => sum + word.length, 0);
    return {
      length: text.length,
      wordCount: words.length,
      uniqueWords: new Set(words).size,
      averageWordLength: words.length > 0 ? totalLetters / words.length : 0,
    };
  },
  'Count characters, words and unique words in a text'
);

const LIST_OPERATIONS = ['count', 'sort', 'reverse', 'unique'] as const;

export const listProcessor = defineOperation(
  z.object({
    items: z.array(z.string()).describe('The items to process'),
    operation: z
      .enum(LIST_OPERATIONS)
      .describe('One of: count, sort, reverse, unique'),
  }),
  ({ items, operation }) => {
    switch (operation) {
      case 'count':
        return items.length;
      case 'sort':
        return [...items].sort();
      case 'reverse':
        return [...items].reverse();
      case 'unique':
        return [...new Set(items)];
    }
  },
  'Count, sort, reverse or de-duplicate a list of strings'
);

export const jsonFormatter = defineOperation(
  z.object({
    data: z.record(z.string(), z.unknown()).describe('The object to format'),
    indent: z
      .number()
      .int()
      .min(0)
      .max(10)
      .default(2)
      .describe('Spaces per indentation level'),
  }),
  ({ data, indent }) => JSON.stringify(data, null, indent),
  'Pretty-print an object as JSON'
);

/**
 * Register the built-in tools (all of them, or the named subset)
 */
export function registerBuiltinTools(
  registry: ToolRegistry,
  names?: readonly BuiltinToolName[]
): void {
  const wanted = (name: BuiltinToolName) => !names || names.includes(name);

  if (wanted('calculator')) {
    registry.register(
      'calculator',
      calculator,
      'Perform basic arithmetic on two numbers',
      CALCULATOR_SCHEMA
    );
  }
  if (wanted('string_analyzer')) {
    registry.register('string_analyzer', stringAnalyzer);
  }
  if (wanted('list_processor')) {
    registry.register('list_processor', listProcessor);
  }
  if (wanted('json_formatter')) {
    registry.register('json_formatter', jsonFormatter);
  }
}
