import { getErrorMessage } from '@cnab-ingest/core';
import { err, ok, type Result } from 'neverthrow';
import type { z } from 'zod';

/**
 * Decodes a JSON message body against a schema. Any failure marks the message as poison.
 */
export function parseJsonMessage<S extends z.ZodTypeAny>(
  body: string | undefined,
  schema: S,
  label: string
): Result<z.output<S>, Error> {
  if (body === undefined || body.trim() === '') {
    return err(new Error('Message body is empty'));
  }

  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (error) {
    return err(new Error(`Message body is not valid JSON: ${getErrorMessage(error)}`));
  }

  const result = schema.safeParse(json);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join(', ');
    return err(new Error(`Invalid ${label}: ${issues}`));
  }
  return ok(result.data);
}
