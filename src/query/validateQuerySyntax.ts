import { invalidQuerySyntax } from '../errors/NexusError.js';

/**
 * Cheap pre-check for obviously malformed queries. Passing it does not
 * guarantee the query parses; parseQuery reports the remaining cases.
 */
export function validateQuerySyntax(query: string): void {
  const trimmed = query.trim();
  if (trimmed.length === 0) {
    throw invalidQuerySyntax('Query must not be empty', query);
  }

  if (trimmed.includes(' AND ')) {
    for (const part of trimmed.split(' AND ')) {
      if (part.trim().length === 0) {
        throw invalidQuerySyntax('AND needs an operand on both sides', query);
      }
    }
  }

  if (trimmed.includes(':') && !trimmed.includes(' ') && trimmed.split(':').length !== 2) {
    throw invalidQuerySyntax('Tags must use type:value format', query);
  }
}

/**
 * Tags offered while a caller types a query: every value of a type whose
 * name starts with `partial`, plus any other tag containing it.
 */
export function suggestTags(allTags: Record<string, string[]>, partial: string, limit: number): string[] {
  if (partial.length === 0) {
    return [];
  }

  const suggestions: string[] = [];
  for (const [type, values] of Object.entries(allTags)) {
    const typeMatches = type.startsWith(partial);
    for (const value of values) {
      const tag = `${type}:${value}`;
      if (typeMatches || tag.includes(partial)) {
        suggestions.push(tag);
      }
    }
  }
  return suggestions.sort().slice(0, limit);
}
