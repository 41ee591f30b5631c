import { GlobMatcher } from '../common/glob';
import type { SkipMatch, SkipRuleSet } from './types';

export const DEFAULT_SKIP_RULES: SkipRuleSet = {
  extensions: ['.md', '.MD', '.png', '.jpg', '.jpeg', '.gif', '.pdf', '.svg', '.ico', '.zip', '.gz'],
  names: ['.env.example', 'LICENSE', 'COPYING'],
  prefixes: ['.github/'],
  globs: [],
};

export function mergeSkipRules(extra: Partial<SkipRuleSet> = {}): SkipRuleSet {
  const union = (base: readonly string[], added: readonly string[] = []) => [...new Set([...base, ...added])];
  return {
    extensions: union(DEFAULT_SKIP_RULES.extensions, extra.extensions),
    names: union(DEFAULT_SKIP_RULES.names, extra.names),
    prefixes: union(DEFAULT_SKIP_RULES.prefixes, extra.prefixes),
    globs: union(DEFAULT_SKIP_RULES.globs, extra.globs),
  };
}

/**
 * Compiled form of a SkipRuleSet. Paths are compared as git prints them: relative to
 * the repository root, `/`-separated.
 */
export class SkipMatcher {
  private readonly globs: GlobMatcher;

  constructor(private readonly rules: SkipRuleSet) {
    this.globs = new GlobMatcher(rules.globs);
  }

  match(path: string): SkipMatch | undefined {
    const extension = this.rules.extensions.find((suffix) => path.endsWith(suffix));
    if (extension !== undefined) {
      return { kind: 'extension', rule: extension };
    }
    if (this.rules.names.includes(path)) {
      return { kind: 'name', rule: path };
    }
    const prefix = this.rules.prefixes.find((candidate) => path.startsWith(candidate));
    if (prefix !== undefined) {
      return { kind: 'prefix', rule: prefix };
    }
    const glob = this.globs.find(path);
    if (glob !== undefined) {
      return { kind: 'glob', rule: glob };
    }
    return undefined;
  }
}

export function shouldSkip(path: string, rules: SkipRuleSet = DEFAULT_SKIP_RULES): SkipMatch | undefined {
  return new SkipMatcher(rules).match(path);
}
