// Company name normalisation — the cache key for a unit of work

import type { Subject } from '../types/stages.js';
import { InvalidSubjectError } from '../types/errors.js';

function collapse(input: string): string {
  return input.normalize('NFKC').trim().replace(/\s+/g, ' ');
}

/**
 * Normalise a company name into a {@link Subject}.
 * `"  Acme   Corp "` and `"acme corp"` share the key `"acme corp"`.
 * Applying it to an already-normalised key returns the same key.
 */
export function normalizeSubject(input: string): Subject {
  const displayName = collapse(input);
  if (!displayName) throw new InvalidSubjectError(input);
  return { key: displayName.toLowerCase(), displayName };
}

export function subjectKey(input: string): string {
  return normalizeSubject(input).key;
}

/** File-name-safe form used for archived reports: "Acme Corp" → "Acme_Corp" */
export function subjectSlug(displayName: string): string {
  return collapse(displayName)
    .replace(/[^\p{L}\p{N}\-. ]/gu, '')
    .replace(/ /g, '_') || 'unknown';
}
