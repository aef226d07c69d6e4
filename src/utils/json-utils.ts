/**
 * JSON Parsing Utilities
 * Centralized JSON operations with validation and error handling
 *
 * Security: Prototype Pollution Prevention
 * - Sanitizes dangerous keys (__proto__, constructor, prototype)
 * - Validates JSON structure before use
 */

import { promises as fs } from 'fs';
import type { z } from 'zod';

/**
 * Dangerous keys that can cause prototype pollution
 * These keys should never be allowed in parsed JSON
 */
const DANGEROUS_KEYS: ReadonlySet<string> = new Set(['__proto__', 'constructor', 'prototype']);

export type JsonParseResult<T> = { success: true; data: T } | { success: false; error: string };

/**
 * Sanitize parsed JSON by removing dangerous keys (recursively)
 */
function sanitizeObject(value: unknown): unknown {
  if (value === null || typeof value !== 'object') {
    return value;
  }

  if (Array.isArray(value)) {
    return value.map(item => sanitizeObject(item));
  }

  const sanitized: Record<string, unknown> = {};
  for (const [key, nested] of Object.entries(value)) {
    if (DANGEROUS_KEYS.has(key)) {
      continue;
    }
    sanitized[key] = sanitizeObject(nested);
  }

  return sanitized;
}

/**
 * Parse JSON string with Zod schema validation
 */
export function parseJson<S extends z.ZodTypeAny>(
  jsonString: string,
  schema: S
): JsonParseResult<z.output<S>> {
  let rawData: unknown;
  try {
    rawData = JSON.parse(jsonString);
  } catch (error) {
    return {
      success: false,
      error: error instanceof Error ? error.message : 'Invalid JSON',
    };
  }

  const result = schema.safeParse(sanitizeObject(rawData));
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    return { success: false, error: `Validation failed: ${issues}` };
  }
  return { success: true, data: result.data };
}

/**
 * Read and parse a JSON file with Zod schema validation
 */
export async function parseJsonFile<S extends z.ZodTypeAny>(
  filePath: string,
  schema: S
): Promise<JsonParseResult<z.output<S>>> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    return {
      success: false,
      error: error instanceof Error ? error.message : 'Failed to read file',
    };
  }
  return parseJson(content, schema);
}
