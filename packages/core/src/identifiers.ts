/**
 * Branded identifier types for compile-time type safety.
 *
 * A JobId is the ledger's primary key and doubles as the name of the job's
 * report directory, so it is restricted to characters that are safe in a
 * single path segment. It is also a key of the ledger's JSON object, which
 * rules out `__proto__` and purely numeric ids (object keys that look like
 * array indices are enumerated before all others).
 */

export type JobId = string & { readonly __brand: 'JobId' };

const JOB_ID_PATTERN = /^[A-Za-z0-9._-]+$/;
const NUMERIC_PATTERN = /^[0-9]+$/;
const RESERVED_JOB_IDS: ReadonlySet<string> = new Set(['.', '..', '__proto__']);

export function isJobId(value: string): value is JobId {
  return JOB_ID_PATTERN.test(value) && !NUMERIC_PATTERN.test(value) && !RESERVED_JOB_IDS.has(value);
}

export function jobId(id: string): JobId {
  if (!isJobId(id)) {
    throw new TypeError(
      `Expected JobId (letters, digits, '.', '_' or '-', not only digits), got: ${JSON.stringify(id)}`
    );
  }
  return id;
}

/**
 * Turn free text (file patterns, group names) into a JobId segment.
 * Anything outside the JobId alphabet becomes '_'.
 */
export function slugify(text: string): string {
  const slug = text.replace(/[^A-Za-z0-9._-]/g, '_');
  if (slug === '') return '_';
  return /^\.+$/.test(slug) ? slug.replace(/\./g, '_') : slug;
}
