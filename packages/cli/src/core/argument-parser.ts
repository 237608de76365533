/**
 * Argument Parser - Zod-based validation and parsing
 */

import { z } from 'zod';
import { ValidationError } from '@idsampler/utils';

/**
 * Parse and validate arguments using Zod schema
 */
export function parseArguments<T extends z.ZodTypeAny>(
  schema: T,
  rawArgs: Record<string, unknown>
): z.infer<T> {
  const result = schema.safeParse(rawArgs);
  if (result.success) {
    return result.data;
  }

  // Format Zod errors into user-friendly messages
  const messages = result.error.issues.map((issue) => {
    const path = issue.path.join('.');
    return `  ${path}: ${issue.message}`;
  });

  throw new ValidationError(`Invalid arguments:\n${messages.join('\n')}`, {
    issues: result.error.issues,
    formattedMessages: messages,
  });
}

/**
 * Normalize Commander.js options to a flat object
 *
 * IMPORTANT: Do NOT rename keys. Commander.js already converts --min-id to minId.
 * This function only normalizes VALUES:
 * - undefined/null → dropped
 * - String "true"/"false" → boolean
 * - Pure numeric strings → number
 * - All other values → preserved as-is
 */
export function normalizeOptions(options: Record<string, unknown>): Record<string, unknown> {
  const normalized: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(options)) {
    if (value === undefined || value === null) {
      continue;
    }

    if (typeof value !== 'string') {
      normalized[key] = value;
      continue;
    }

    if (value === 'true') {
      normalized[key] = true;
    } else if (value === 'false') {
      normalized[key] = false;
    } else if (value.trim() !== '' && String(Number(value)) === value.trim()) {
      // Only convert round-trippable numbers, so "007" or "1e3" stay strings
      normalized[key] = Number(value);
    } else {
      normalized[key] = value;
    }
  }

  return normalized;
}
