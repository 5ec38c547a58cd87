/**
 * JSON-over-HTTP helpers shared by the API adapters
 */

import { z, type ZodType, type ZodTypeDef } from 'zod';

const ErrorBodySchema = z.object({
  error: z.union([z.string(), z.object({ message: z.string() })]).optional(),
  message: z.string().optional(),
});

/**
 * Pull the provider's error message out of an error body, falling back to the
 * raw text
 */
export function extractErrorMessage(body: string): string {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return body;
  }

  const result = ErrorBodySchema.safeParse(parsed);
  if (!result.success) {
    return body;
  }
  const { error, message } = result.data;
  if (typeof error === 'string') {
    return error;
  }
  return error?.message ?? message ?? body;
}

/**
 * POST a JSON body and return the decoded JSON reply.
 *
 * @throws Error whose message starts with the HTTP status on a non-2xx reply
 */
export async function postJson(
  url: string,
  headers: Record<string, string>,
  body: unknown,
  signal?: AbortSignal
): Promise<unknown> {
  const response = await fetch(url, {
    method: 'POST',
    headers: {
      'Content-Type': 'application/json',
      ...headers,
    },
    body: JSON.stringify(body),
    signal,
  });

  if (!response.ok) {
    const errorText = await response.text();
    // Status code leads the message for error classification
    throw new Error(`${response.status}: ${extractErrorMessage(errorText)}`);
  }

  const payload: unknown = await response.json();
  return payload;
}

/**
 * Validate a decoded reply against the platform's response schema
 *
 * @throws Error mentioning an invalid response
 */
export function parseResponse<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
  payload: unknown,
  platformName: string
): T {
  const result = schema.safeParse(payload);
  if (!result.success) {
    const issue = result.error.errors[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new Error(`Invalid response from ${platformName}${where}: ${issue?.message ?? 'unexpected shape'}`);
  }
  return result.data;
}

/**
 * Token cost in USD given per-1K-token prices
 */
export function estimateCost(
  pricing: { input: number; output: number },
  inputTokens: number,
  outputTokens: number
): number {
  return (inputTokens / 1000) * pricing.input + (outputTokens / 1000) * pricing.output;
}
