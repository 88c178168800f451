import type { QueryExpression } from './QueryParser.js';

/**
 * Match `text` against a pattern where `*` stands for zero or more
 * characters. The pattern is anchored at both ends.
 */
export function matchesWildcard(pattern: string, text: string): boolean {
  const segments = pattern.split('*');
  if (segments.length === 1) {
    return pattern === text;
  }

  const first = segments[0] ?? '';
  const last = segments[segments.length - 1] ?? '';
  if (!text.startsWith(first)) {
    return false;
  }
  const end = text.length - last.length;
  if (end < first.length || !text.endsWith(last)) {
    return false;
  }

  let pos = first.length;
  for (const segment of segments.slice(1, -1)) {
    if (segment.length === 0) continue;
    const found = text.indexOf(segment, pos);
    if (found < 0 || found + segment.length > end) {
      return false;
    }
    pos = found + segment.length;
  }
  return true;
}

function evaluate(
  expression: QueryExpression,
  tagToFiles: ReadonlyMap<string, ReadonlySet<string>>,
  universe: ReadonlySet<string>,
): Set<string> {
  switch (expression.kind) {
    case 'tag':
      return new Set(tagToFiles.get(expression.tag));

    case 'wildcard': {
      const result = new Set<string>();
      for (const [tag, files] of tagToFiles) {
        if (matchesWildcard(expression.pattern, tag)) {
          for (const file of files) result.add(file);
        }
      }
      return result;
    }

    case 'or': {
      const result = new Set<string>();
      for (const operand of expression.operands) {
        for (const file of evaluate(operand, tagToFiles, universe)) result.add(file);
      }
      return result;
    }

    case 'and': {
      let result: Set<string> | null = null;
      for (const operand of expression.operands) {
        const files = evaluate(operand, tagToFiles, universe);
        result = result === null ? files : new Set([...result].filter((file: string) => files.has(file)));
        if (result.size === 0) break;
      }
      return result ?? new Set();
    }

    case 'not': {
      const excluded = evaluate(expression.operand, tagToFiles, universe);
      return new Set([...universe].filter((file) => !excluded.has(file)));
    }
  }
}

/**
 * Evaluate a parsed query against a tag → files index. `universe` is the set
 * of all tagged files and is the domain NOT complements against.
 * Returns a sorted file list.
 */
export function evaluateQuery(
  expression: QueryExpression,
  tagToFiles: ReadonlyMap<string, ReadonlySet<string>>,
  universe: ReadonlySet<string>,
): string[] {
  return [...evaluate(expression, tagToFiles, universe)].sort();
}
