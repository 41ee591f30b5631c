import type { SkipRuleSet } from '../scanner/types';

export interface PatternConfig {
  id: string;
  description?: string;
  /** Regular expression source, matched case-sensitively. */
  pattern: string;
}

export interface GuardConfig {
  patterns?: PatternConfig[];
  replaceDefaultPatterns?: boolean;
  skip?: Partial<SkipRuleSet>;
}
