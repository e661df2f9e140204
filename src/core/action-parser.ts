/**
 * Turns raw oracle output into a ParsedAction.
 *
 * Accepted forms:
 * - an object with `action` (or `tool`), optional `thought` (or `log`) and
 *   `actionInput` (or `action_input`, `tool_input`, `input`);
 * - text containing such an object, fenced or surrounded by prose;
 * - ReAct text with `Thought:`, `Action:` and `Action Input:` lines, or a
 *   `Final Answer:` line.
 *
 * A finish action carries its result in `actionInput.output`.
 */

import {
  FINISH_ACTION,
  type OracleResponse,
  type ParsedAction,
} from '../types/index.js';
import { FormatError } from './errors.js';
import { isPlainRecord } from './parameter-schema.js';

export type ParseResult =
  | { ok: true; action: ParsedAction }
  | { ok: false; error: FormatError };

const INPUT_KEYS = ['actionInput', 'action_input', 'tool_input', 'input'];

function fail(reason: string): ParseResult {
  return { ok: false, error: new FormatError(reason) };
}

function firstString(
  record: Record<string, unknown>,
  keys: string[]
): string | undefined {
  for (const key of keys) {
    const value = record[key];
    if (typeof value === 'string') {
      return value;
    }
  }
  return undefined;
}

function normalizeActionName(name: string): string {
  const trimmed = name.trim();
  return trimmed.toLowerCase() === FINISH_ACTION ? FINISH_ACTION : trimmed;
}

/**
 * Removes Markdown code fences (including ```json) from a string.
 */
export function stripMarkdownFences(input: string): string {
  return input
    .replace(/```[a-zA-Z]*\s*/g, '')
    .replace(/```/g, '')
    .trim();
}

function scanForObject(text: string): unknown {
  for (let start = text.indexOf('{'); start !== -1; start = text.indexOf('{', start + 1)) {
    let depth = 0;
    let inString = false;
    let escaped = false;

    for (let index = start; index < text.length; index += 1) {
      const char = text[index];

      if (inString) {
        if (escaped) {
          escaped = false;
        } else if (char === '\\') {
          escaped = true;
        } else if (char === '"') {
          inString = false;
        }
        continue;
      }

      if (char === '"') {
        inString = true;
      } else if (char === '{') {
        depth += 1;
      } else if (char === '}') {
        depth -= 1;
        if (depth === 0) {
          try {
            return JSON.parse(text.slice(start, index + 1));
          } catch {
            break;
          }
        }
      }
    }
  }

  return undefined;
}

/**
 * Extracts the first valid JSON object from a string.
 * Braces inside JSON strings are skipped. The raw text is scanned first so
 * backticks inside string values survive; fences are only stripped when
 * nothing parses as is.
 */
export function extractFirstJsonObject(input: string): unknown {
  return scanForObject(input) ?? scanForObject(stripMarkdownFences(input));
}

/**
 * Resolve the action input, decoding a JSON string if needed.
 * A finish action may carry any value; it is wrapped as `{ output }`.
 */
function resolveInput(
  action: string,
  raw: unknown
): Record<string, unknown> | FormatError {
  if (raw === undefined || raw === null) {
    return {};
  }

  let value = raw;
  if (typeof raw === 'string') {
    const trimmed = raw.trim();
    if (trimmed === '') {
      return {};
    }
    try {
      value = JSON.parse(trimmed);
    } catch {
      value = raw;
    }
  }

  if (isPlainRecord(value)) {
    return value;
  }
  if (action === FINISH_ACTION) {
    return { output: value };
  }
  return new FormatError('action input must be a JSON object');
}

function fromRecord(record: Record<string, unknown>): ParseResult {
  const name = firstString(record, ['action', 'tool']);
  if (name === undefined || name.trim() === '') {
    return fail('missing "action" field');
  }

  const action = normalizeActionName(name);
  const thought = firstString(record, ['thought', 'log']) ?? '';

  const inputKey = INPUT_KEYS.find((key) => record[key] !== undefined);
  let rawInput: unknown = inputKey ? record[inputKey] : undefined;
  if (rawInput === undefined && action === FINISH_ACTION && 'output' in record) {
    rawInput = { output: record.output };
  }

  const actionInput = resolveInput(action, rawInput);
  if (actionInput instanceof FormatError) {
    return { ok: false, error: actionInput };
  }

  return { ok: true, action: { thought, action, actionInput } };
}

const THOUGHT_PATTERN = /^\s*Thought\s*:\s*([\s\S]*?)(?=^\s*(?:Action|Final Answer)\s*:|$(?![\s\S]))/im;
const ACTION_PATTERN = /^\s*Action\s*:\s*(.*)$/im;
const ACTION_INPUT_PATTERN = /^\s*Action Input\s*:\s*([\s\S]*?)(?=^\s*Observation\s*:|$(?![\s\S]))/im;
const FINAL_ANSWER_PATTERN = /^\s*Final Answer\s*:\s*([\s\S]*)$/im;

function fromReactText(text: string): ParseResult | null {
  const thought = THOUGHT_PATTERN.exec(text)?.[1]?.trim() ?? '';

  const finalAnswer = FINAL_ANSWER_PATTERN.exec(text);
  if (finalAnswer) {
    return {
      ok: true,
      action: {
        thought,
        action: FINISH_ACTION,
        actionInput: { output: (finalAnswer[1] ?? '').trim() },
      },
    };
  }

  const actionMatch = ACTION_PATTERN.exec(text);
  if (!actionMatch) {
    return null;
  }
  const action = normalizeActionName(actionMatch[1] ?? '');
  if (action === '') {
    return fail('empty action name');
  }

  const inputText = ACTION_INPUT_PATTERN.exec(text)?.[1]?.trim() ?? '';
  let rawInput: unknown = inputText;
  if (inputText !== '') {
    const extracted = extractFirstJsonObject(inputText);
    if (extracted !== undefined) {
      rawInput = extracted;
    }
  }

  const actionInput = resolveInput(action, rawInput);
  if (actionInput instanceof FormatError) {
    return { ok: false, error: actionInput };
  }

  return { ok: true, action: { thought, action, actionInput } };
}

/**
 * Parse raw oracle output into the next action
 */
export function parseAction(raw: OracleResponse): ParseResult {
  if (isPlainRecord(raw)) {
    return fromRecord(raw);
  }
  if (typeof raw !== 'string') {
    return fail('oracle output must be text or an object');
  }

  const text = raw.trim();
  if (text === '') {
    return fail('empty oracle output');
  }

  const looksLikeJson = text.startsWith('{') || text.startsWith('```');
  if (!looksLikeJson) {
    const react = fromReactText(text);
    if (react) {
      return react;
    }
  }

  const json = extractFirstJsonObject(text);
  if (isPlainRecord(json)) {
    return fromRecord(json);
  }

  return fail('no action found in oracle output');
}
