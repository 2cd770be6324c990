/**
 * Pull the first JSON object out of free-form command output.
 * A ```json fenced block wins; otherwise the first balanced {...} is used.
 */

import type { Result } from '../types/result';
import { ok, err } from '../types/result';

const FENCE_OPEN = '```json';
const FENCE_CLOSE = '```';

export function extractJsonObject(text: string): Result<unknown, string> {
  const fenced = text.indexOf(FENCE_OPEN);
  if (fenced !== -1) {
    const start = fenced + FENCE_OPEN.length;
    const end = text.indexOf(FENCE_CLOSE, start);
    return parse(text.slice(start, end === -1 ? undefined : end).trim());
  }

  const span = findBalancedObject(text);
  if (span === undefined) {
    return err('No JSON object found in output');
  }
  return parse(span);
}

function parse(json: string): Result<unknown, string> {
  try {
    const value: unknown = JSON.parse(json);
    return ok(value);
  } catch (error) {
    return err(`Invalid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
}

/**
 * Braces inside string literals do not count
 */
function findBalancedObject(text: string): string | undefined {
  const start = text.indexOf('{');
  if (start === -1) {
    return undefined;
  }

  let depth = 0;
  let inString = false;
  let escaped = false;
  for (let i = start; i < text.length; i++) {
    const char = text[i];
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
      depth++;
    } else if (char === '}') {
      depth--;
      if (depth === 0) {
        return text.slice(start, i + 1);
      }
    }
  }
  return undefined;
}
