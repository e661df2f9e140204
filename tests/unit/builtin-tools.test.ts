import { describe, it, expect, beforeEach } from 'vitest';
import { ToolRegistry } from '../../src/core/tool-registry.js';
import { registerBuiltinTools } from '../../src/tools/builtin.js';
import { ToolExecutionError } from '../../src/core/errors.js';

describe('built-in tools', () => {
  let registry: ToolRegistry;

  beforeEach(() => {
    registry = new ToolRegistry();
    registerBuiltinTools(registry);
  });

  it('should register every built-in tool in order', () => {
    expect(registry.list().map((tool) => tool.name)).toEqual([
      'calculator',
      'string_analyzer',
      'list_processor',
      'json_formatter',
    ]);
  });

  it('should register only the requested subset', () => {
    const subset = new ToolRegistry();
    registerBuiltinTools(subset, ['json_formatter', 'calculator']);

    expect(subset.list().map((tool) => tool.name)).toEqual([
      'calculator',
      'json_formatter',
    ]);
  });

  describe('calculator', () => {
    it.each([
      ['add', 8],
      ['subtract', 2],
      ['multiply', 15],
      ['divide', 5 / 3],
    ])('should %s', async (operation, expected) => {
      const result = await registry.dispatch('calculator', { operation, a: 5, b: 3 });

      expect(result).toEqual({ success: true, value: expected });
    });

    it('should reject an unsupported operation', async () => {
      const result = await registry.dispatch('calculator', {
        operation: 'add majorana',
        a: 5,
        b: 3,
      });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toBeInstanceOf(ToolExecutionError);
        expect(result.error.message).toBe(
          'Tool "calculator" failed: unsupported operation "add majorana"'
        );
      }
    });

    it('should not treat inherited keys as operations', async () => {
      const result = await registry.dispatch('calculator', {
        operation: 'toString',
        a: 1,
        b: 1,
      });

      expect(result.success).toBe(false);
    });

    it('should fail on division by zero', async () => {
      const result = await registry.dispatch('calculator', {
        operation: 'divide',
        a: 1,
        b: 0,
      });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.message).toBe('Tool "calculator" failed: division by zero');
      }
    });
  });

  describe('string_analyzer', () => {
    it('should count characters and words', async () => {
      const result = await registry.dispatch('string_analyzer', { text: 'the cat the hat' });

      expect(result).toEqual({
        success: true,
        value: { length: 15, wordCount: 4, uniqueWords: 3, averageWordLength: 3 },
      });
    });

    it('should handle empty text', async () => {
      const result = await registry.dispatch('string_analyzer', { text: '' });

      expect(result).toEqual({
        success: true,
        value: { length: 0, wordCount: 0, uniqueWords: 0, averageWordLength: 0 },
      });
    });
  });

  describe('list_processor', () => {
    it.each([
      ['count', 3],
      ['sort', ['a', 'b', 'b']],
      ['reverse', ['b', 'a', 'b']],
      ['unique', ['b', 'a']],
    ])('should %s', async (operation, expected) => {
      const result = await registry.dispatch('list_processor', {
        items: ['b', 'a', 'b'],
        operation,
      });

      expect(result).toEqual({ success: true, value: expected });
    });

    it('should describe its parameters', () => {
      expect(registry.get('list_processor')?.parameterSchema).toEqual({
        items: { type: 'array', required: true, description: 'The items to process' },
        operation: {
          type: 'string',
          required: true,
          description: 'One of: count, sort, reverse, unique',
        },
      });
    });

    it('should reject an unknown operation', async () => {
      const result = await registry.dispatch('list_processor', {
        items: ['a'],
        operation: 'shuffle',
      });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toBeInstanceOf(ToolExecutionError);
        expect(result.error.message).toContain('operation: ');
      }
    });
  });

  describe('json_formatter', () => {
    it('should indent with two spaces by default', async () => {
      const result = await registry.dispatch('json_formatter', { data: { a: 1 } });

      expect(result).toEqual({ success: true, value: '{\n  "a": 1\n}' });
    });

    it('should accept an indent given as text', async () => {
      const result = await registry.dispatch('json_formatter', {
        data: { a: [1] },
        indent: '0',
      });

      expect(result).toEqual({ success: true, value: '{"a":[1]}' });
    });

    it('should describe indent as an optional integer', () => {
      expect(registry.get('json_formatter')?.parameterSchema.indent).toEqual({
        type: 'integer',
        required: false,
        description: 'Spaces per indentation level',
      });
    });
  });
});
