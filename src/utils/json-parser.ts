import type { z } from 'zod';

/**
 * JSON extraction from agent output.
 * Handles JSON embedded in markdown code blocks and bare JSON, validated against a schema.
 */

export class JSONExtractionError extends Error {
  constructor(
    message: string,
    public readonly rawOutput: string
  ) {
    super(message);
    this.name = 'JSONExtractionError';
  }
}

const PATTERNS = [
  // JSON in markdown code blocks with json tag
  /```json\s*([\s\S]*?)```/,
  // JSON in generic markdown code blocks
  /```\s*([\s\S]*?)```/,
  // Bare JSON object
  /(\{[\s\S]*\})/,
];

function tryParse(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

/**
 * Extract the first JSON value in `output` that satisfies `schema`.
 * @throws JSONExtractionError if no candidate parses and validates
 */
export function extractJSON<T>(
  output: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): T {
  for (const pattern of PATTERNS) {
    const match = output.match(pattern);
    if (!match) continue;

    const parsed = tryParse(match[1].trim());
    if (!parsed.ok) continue;

    const result = schema.safeParse(parsed.value);
    if (result.success) {
      return result.data;
    }
  }

  throw new JSONExtractionError('No valid JSON found in output', output.slice(0, 500));
}

/**
 * Retry extraction after repairing trailing commas and comments.
 */
export function extractJSONWithRepair<T>(
  output: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): T {
  try {
    return extractJSON(output, schema);
  } catch (error) {
    if (!(error instanceof JSONExtractionError)) {
      throw error;
    }
    const repaired = output
      // Remove trailing commas
      .replace(/,(\s*[}\]])/g, '$1')
      // Remove comments
      .replace(/^\s*\/\/.*$/gm, '')
      .replace(/\/\*[\s\S]*?\*\//g, '');

    return extractJSON(repaired, schema);
  }
}
