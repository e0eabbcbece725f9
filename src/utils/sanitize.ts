/**
 * Sanitize what humans type at the prompt
 */

export const MAX_INPUT_LENGTH = 60;

/**
 * Normalize string for comparison (lowercase, remove accents, collapse whitespace)
 */
export function normalizeString(str: string): string {
  return str
    .toLowerCase()
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Trim and cap a line of input
 */
export function sanitizeInput(input: string): string {
  return input.trim().substring(0, MAX_INPUT_LENGTH);
}

/**
 * Parse a 1-based option number against the number of options shown
 */
export function parseOptionIndex(input: string, count: number): { valid: boolean; index?: number; error?: string } {
  const trimmed = input.trim();
  if (!/^\d+$/.test(trimmed)) {
    return { valid: false, error: 'Not a number' };
  }

  const parsed = parseInt(trimmed, 10);
  if (parsed < 1 || parsed > count) {
    return { valid: false, error: `Choose a number between 1 and ${count}` };
  }

  return { valid: true, index: parsed - 1 };
}
