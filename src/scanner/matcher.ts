import { compilePatternUnion } from './patterns';
import type { Finding, SecretPattern } from './types';

export class ContentMatcher {
  private readonly union: RegExp;

  constructor(readonly patterns: readonly SecretPattern[]) {
    this.union = compilePatternUnion(patterns);
  }

  test(content: string): boolean {
    return this.union.test(content);
  }

  /** Ids of every pattern matching `content`, with the offset of the earliest match. */
  explain(content: string): { ruleIds: string[]; index: number } {
    const ruleIds: string[] = [];
    let index = Number.POSITIVE_INFINITY;
    for (const { id, pattern } of this.patterns) {
      const match = pattern.exec(content);
      if (!match) {
        continue;
      }
      ruleIds.push(id);
      index = Math.min(index, match.index);
    }
    return { ruleIds, index: Number.isFinite(index) ? index : 0 };
  }
}

function lineAt(content: string, index: number): number {
  let line = 1;
  for (let i = 0; i < index; i += 1) {
    if (content.charCodeAt(i) === 10) {
      line += 1;
    }
  }
  return line;
}

export function matchContent(path: string, content: string, matcher: ContentMatcher): Finding | undefined {
  if (!matcher.test(content)) {
    return undefined;
  }
  const { ruleIds, index } = matcher.explain(content);
  return { path, ruleIds, line: lineAt(content, index) };
}
