import { FALLBACK_IDENTIFIER } from '../constants.js';

const SEPARATORS = /[-\s._]/;

/**
 * Convert a display string into a PowerShell variable identifier.
 *
 * Splits on `-`, whitespace, `.` and `_`, capitalizes the first character of
 * each fragment, joins them, then strips anything that is not ASCII
 * alphanumeric.
 *
 * @example
 * ```typescript
 * sanitizeIdentifier('Get-ChildItem');    // 'GetChildItem'
 * sanitizeIdentifier('my output.list');   // 'MyOutputList'
 * sanitizeIdentifier('!!!');              // 'Result'
 * ```
 */
export function sanitizeIdentifier(name: string): string {
  const joined = name
    .split(SEPARATORS)
    .map((part) => (part.length > 0 ? part[0].toUpperCase() + part.slice(1) : ''))
    .join('');
  const result = joined.replace(/[^a-zA-Z0-9]/g, '');
  return result.length > 0 ? result : FALLBACK_IDENTIFIER;
}

/** Prefix a bare identifier with the `$` sigil */
export function toVariableReference(identifier: string): string {
  return identifier.startsWith('$') ? identifier : `$${identifier}`;
}
