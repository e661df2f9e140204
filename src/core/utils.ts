/**
 * Shared utilities for the agent loop
 */

/**
 * Generate unique IDs for runs
 */
export const IdGenerator = {
  /**
   * Generate a run ID
   * Format: run-YYYYMMDD-HHMMSS-XXXX
   */
  run(): string {
    const now = new Date();
    const date = now.toISOString().slice(0, 10).replace(/-/g, '');
    const time = now.toISOString().slice(11, 19).replace(/:/g, '');
    const random = Math.random().toString(36).slice(2, 6);
    return `run-${date}-${time}-${random}`;
  },
};

/**
 * Render a value as observation text.
 * Strings pass through; everything else is JSON.
 */
export function renderValue(value: unknown): string {
  if (value === undefined) {
    return '(no output)';
  }
  if (typeof value === 'string') {
    return value;
  }
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}

/**
 * Shorten text for log lines
 */
export function truncate(text: string, maxLength: number = 200): string {
  return text.length > maxLength ? `${text.slice(0, maxLength - 3)}...` : text;
}
