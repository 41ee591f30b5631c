export interface SecretPattern {
  id: string;
  description: string;
  pattern: RegExp;
}

export interface SkipRuleSet {
  /** Case-sensitive path suffixes, e.g. `.md`. */
  extensions: readonly string[];
  /** Exact staged paths, e.g. `LICENSE`. */
  names: readonly string[];
  /** Path prefixes, e.g. `.github/`. */
  prefixes: readonly string[];
  /** Gitignore-style globs. */
  globs: readonly string[];
}

export type SkipRuleKind = 'extension' | 'name' | 'prefix' | 'glob';

export interface SkipMatch {
  kind: SkipRuleKind;
  rule: string;
}

export interface ScanConfig {
  readonly patterns: readonly SecretPattern[];
  readonly skip: SkipRuleSet;
}

export interface Finding {
  path: string;
  ruleIds: string[];
  /** 1-based line where the earliest match starts. */
  line: number;
}

export interface ScanStats {
  staged: number;
  scanned: number;
  skipped: number;
  unreadable: number;
}

export type ScanStatus = 'clean' | 'blocked';

export interface ScanResult {
  status: ScanStatus;
  findings: Finding[];
  stats: ScanStats;
}
