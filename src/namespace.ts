import { InvalidNamespaceFormatError } from './errors.js';
import type { NamespaceId } from './types.js';

/**
 * Parses a `catalog.schema` identifier. Both segments are trimmed and must
 * be non-empty; anything other than exactly two segments is rejected.
 */
export function resolveNamespace(raw: string): NamespaceId {
  const parts = raw.trim().split('.');
  if (parts.length !== 2) {
    throw new InvalidNamespaceFormatError(raw);
  }

  const [catalog, schema] = parts.map((part) => part.trim());
  if (!catalog || !schema) {
    throw new InvalidNamespaceFormatError(raw);
  }

  return { catalog, schema, qualified: `${catalog}.${schema}` };
}

// Backslash-escaped literals, so the backslash itself goes first
export function escapeStringLiteral(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/'/g, "\\'");
}
