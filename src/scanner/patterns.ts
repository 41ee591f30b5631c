import type { SecretPattern } from './types';

export const DEFAULT_SECRET_PATTERNS: readonly SecretPattern[] = [
  {
    id: 'xai-token',
    description: 'xAI API token',
    pattern: /xai-[A-Za-z0-9]{20,}/,
  },
  {
    id: 'xai-assignment',
    description: 'XAI_API_KEY assigned a literal value',
    pattern: /\bXAI_API_KEY\b\s*[:=]\s*["']?[A-Za-z0-9_-]{16,}/,
  },
  {
    id: 'alpha-vantage-assignment',
    description: 'ALPHA_VANTAGE_API_KEY assigned a literal value',
    pattern: /\bALPHA_VANTAGE_API_KEY\b\s*[:=]\s*["']?[A-Za-z0-9_-]{8,}/,
  },
  {
    id: 'xai-bearer',
    description: 'Authorization header carrying an xAI token',
    pattern: /Bearer\s+xai-[A-Za-z0-9]+/,
  },
  {
    id: 'aws-access-key',
    description: 'AWS access key id',
    pattern: /\bAKIA[0-9A-Z]{16}\b/,
  },
  {
    id: 'github-token',
    description: 'GitHub personal access token',
    pattern: /\bghp_[A-Za-z0-9]{36,}\b/,
  },
  {
    id: 'google-api-key',
    description: 'Google API key',
    pattern: /\bAIza[0-9A-Za-z\-_]{35}\b/,
  },
  {
    id: 'stripe-secret-key',
    description: 'Stripe secret key',
    pattern: /\bsk_(?:live|test)_[A-Za-z0-9]{24,}\b/,
  },
  {
    id: 'sendgrid-key',
    description: 'SendGrid API key',
    pattern: /\bSG\.[A-Za-z0-9_-]{16,}\.[A-Za-z0-9_-]{16,}\b/,
  },
  {
    id: 'slack-token',
    description: 'Slack token',
    pattern: /\bxox[baprs]-[A-Za-z0-9-]{10,}\b/,
  },
  {
    id: 'openai-key',
    description: 'OpenAI-style secret key',
    pattern: /\bsk-[A-Za-z0-9]{20,}\b/,
  },
  {
    id: 'openai-assignment',
    description: 'OPENAI_API_KEY assigned a literal value',
    pattern: /\bOPENAI_API_KEY\b\s*[:=]\s*["']?[A-Za-z0-9_-]{16,}/,
  },
  {
    id: 'generic-assignment',
    description: 'Quoted literal assigned to API_KEY, SECRET, TOKEN or ACCESS_TOKEN',
    pattern: /\b(?:API_KEY|SECRET|TOKEN|ACCESS_TOKEN)\b\s*[:=]\s*["'][A-Za-z0-9_-]{12,}["']/,
  },
];

export interface MergePatternOptions {
  replaceDefaults?: boolean;
}

/**
 * Combine custom patterns with the defaults. When two patterns share an id the first
 * one wins.
 */
export function mergeSecretPatterns(
  custom: readonly SecretPattern[] = [],
  options: MergePatternOptions = {},
): SecretPattern[] {
  const base = options.replaceDefaults ? [] : DEFAULT_SECRET_PATTERNS;
  const ids = new Set<string>();
  const merged: SecretPattern[] = [];
  for (const pattern of [...base, ...custom]) {
    if (ids.has(pattern.id)) {
      continue;
    }
    ids.add(pattern.id);
    merged.push(pattern);
  }
  return merged;
}

/**
 * Build a single regular expression matching whenever any of `patterns` would.
 * Members must be flagless: the union is matched case-sensitively.
 */
export function compilePatternUnion(patterns: readonly SecretPattern[]): RegExp {
  if (patterns.length === 0) {
    throw new Error('At least one secret pattern is required');
  }
  for (const { id, pattern } of patterns) {
    if (pattern.flags !== '') {
      throw new Error(`Secret pattern ${id} must not carry flags (found "${pattern.flags}")`);
    }
  }
  return new RegExp(patterns.map(({ pattern }) => `(?:${pattern.source})`).join('|'));
}
