import { err, ok } from 'neverthrow';
import type { Result } from 'neverthrow';
import type { z } from 'zod';
import type { FetchError } from '../fetchers/types';

/**
 * Validate a decoded response body against a source's schema.
 */
export const parseBody = <S extends z.ZodTypeAny>(
  schema: S,
  body: unknown,
  source: string
): Result<z.output<S>, FetchError> => {
  const parsed = schema.safeParse(body);
  if (parsed.success) {
    return ok(parsed.data);
  }
  const issue = parsed.error.issues[0];
  const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
  return err({
    type: 'parse',
    message: `Failed to parse ${source} response${where}: ${issue ? issue.message : 'invalid body'}`,
    cause: parsed.error
  });
};
