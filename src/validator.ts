import type { StandardSchemaV1 } from '@standard-schema/spec';

import { ConfigurationError } from './errors';

/**
 * Runs `schema['~standard'].validate` once and returns the output value.
 *
 * Any Standard Schema producer works (zod builds the request schemas). The
 * result must be synchronous, so a request is settled before the first write.
 * Only the first issue is reported, with its path joined by dots.
 *
 * @throws ConfigurationError when `schema` has no `~standard` property, when
 *   validation returns a promise, or when the input has issues.
 */
export function validateWithSchema<S extends StandardSchemaV1>(
  schema: S,
  input: unknown,
  subject: string
): StandardSchemaV1.InferOutput<S> {
  if (!('~standard' in schema)) {
    throw new ConfigurationError(
      `The schema for ${subject} is invalid. Expected an object with the "~standard" property (e.g. zod, Valibot).`
    );
  }

  const result = schema['~standard'].validate(input);

  if (result instanceof Promise) {
    throw new ConfigurationError(
      `Async schema validation is not supported for ${subject}.`
    );
  }

  if (result.issues) {
    const [firstIssue] = result.issues;
    const issuePath = formatIssuePath(firstIssue?.path);
    throw new ConfigurationError(
      `Invalid ${subject} at "${issuePath}": ${firstIssue?.message ?? 'unknown issue'}`,
      { details: { issues: result.issues.length, path: issuePath } }
    );
  }

  return result.value;
}

function formatIssuePath(
  path: StandardSchemaV1.Issue['path']
): string {
  if (!path || path.length === 0) return '(root)';
  return path
    .map(segment =>
      typeof segment === 'object' ? String(segment.key) : String(segment)
    )
    .join('.');
}
