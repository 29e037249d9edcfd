/**
 * PathSanitizer - File-system-safe names for wiki page path segments
 */

import { pathSegments } from './PageTree';

/** Characters Windows refuses in file names */
export const ILLEGAL_CHARACTERS = '<>:"/\\|?*';

export const PLACEHOLDER = '_';

export const FALLBACK_SEGMENT = 'untitled';

/** Local name of the wiki root page */
export const ROOT_PAGE_NAME = 'Home';

const ILLEGAL_PATTERN = /[<>:"/\\|?*]/g;

function tidy(value: string): string {
  return value.trim().replace(/[.\s]+$/, '');
}

/**
 * Replace blocklisted characters with the placeholder, trim leading
 * whitespace and trailing whitespace/periods. A segment with nothing left
 * besides blocklisted characters becomes the fallback name.
 *
 * sanitizeSegment(sanitizeSegment(x)) === sanitizeSegment(x)
 */
export function sanitizeSegment(raw: string): string {
  if (tidy(raw.replace(ILLEGAL_PATTERN, '')) === '') {
    return FALLBACK_SEGMENT;
  }
  return tidy(raw.replace(ILLEGAL_PATTERN, PLACEHOLDER));
}

/**
 * Sanitized segments of a page path; the root maps to ROOT_PAGE_NAME
 */
export function sanitizedSegments(pagePath: string): string[] {
  const segments = pathSegments(pagePath);
  return segments.length === 0 ? [ROOT_PAGE_NAME] : segments.map(sanitizeSegment);
}
