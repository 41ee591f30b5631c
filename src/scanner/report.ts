import type { ScanResult } from './types';

export interface ReportOptions {
  color?: boolean;
  /** Append the first matching line and rule ids to each path. */
  details?: boolean;
}

const RED = '\u001b[31m';
const YELLOW = '\u001b[33m';
const RESET = '\u001b[0m';

export const REMEDIATION_TEXT = `Refusing to commit. Please remove secrets and use environment variables instead.
- For xAI: export XAI_API_KEY and do NOT commit it.
- For Alpha Vantage: export ALPHA_VANTAGE_API_KEY and do NOT commit it.

To override (NOT RECOMMENDED):
  git commit --no-verify
`;

function paint(text: string, code: string, enabled: boolean): string {
  return enabled ? `${code}${text}${RESET}` : text;
}

export function shouldUseColor(stream: { isTTY?: boolean }, env: NodeJS.ProcessEnv = process.env): boolean {
  return Boolean(stream.isTTY) && env.NO_COLOR === undefined;
}

export function renderBlockedReport(result: ScanResult, options: ReportOptions = {}): string {
  const color = options.color ?? false;
  const lines = ['', paint('Secret-like patterns detected in staged files:', RED, color)];
  for (const finding of result.findings) {
    const suffix = options.details ? ` (line ${finding.line}: ${finding.ruleIds.join(', ')})` : '';
    lines.push(paint(` - ${finding.path}${suffix}`, YELLOW, color));
  }
  lines.push('', REMEDIATION_TEXT);
  return lines.join('\n');
}

export function renderJsonReport(result: ScanResult): string {
  return `${JSON.stringify(result, null, 2)}\n`;
}
