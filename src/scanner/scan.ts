import { describeError } from '../common/errors';
import { getLogger, Logger } from '../common/logger';
import type { StagingArea } from '../git/staging';
import { ContentMatcher, matchContent } from './matcher';
import { SkipMatcher } from './skip';
import type { Finding, ScanConfig, ScanResult, ScanStats } from './types';

type FileOutcome =
  | { kind: 'skipped' }
  | { kind: 'unreadable'; reason: string }
  | { kind: 'scanned'; finding?: Finding };

async function inspectFile(
  path: string,
  staging: StagingArea,
  skip: SkipMatcher,
  matcher: ContentMatcher,
  log: Logger,
): Promise<FileOutcome> {
  const skipMatch = skip.match(path);
  if (skipMatch) {
    log.debug(`Skipping ${path}`, { rule: skipMatch.rule, kind: skipMatch.kind });
    return { kind: 'skipped' };
  }

  // Any failure here stays local to the file; the run must still reach a verdict.
  try {
    const staged = await staging.readStagedContent(path);
    if (!staged.ok) {
      return { kind: 'unreadable', reason: staged.error.message };
    }
    // Invalid UTF-8 sequences decode to U+FFFD; ASCII around them is still matched.
    const text = staged.content.toString('utf8');
    return { kind: 'scanned', finding: matchContent(path, text, matcher) };
  } catch (error) {
    return { kind: 'unreadable', reason: describeError(error) };
  }
}

/**
 * Scan the staged blob of every changed, non-skipped path. Files are processed one at a
 * time; the finding list is complete, never cut short at the first hit.
 */
export async function scanStaged(
  staging: StagingArea,
  config: ScanConfig,
  logger: Logger = getLogger('scan'),
): Promise<ScanResult> {
  const matcher = new ContentMatcher(config.patterns);
  const skip = new SkipMatcher(config.skip);
  const paths = await staging.listChangedPaths();
  const stats: ScanStats = { staged: paths.length, scanned: 0, skipped: 0, unreadable: 0 };
  const findings: Finding[] = [];

  if (paths.length === 0) {
    logger.debug('No staged files to scan');
    return { status: 'clean', findings, stats };
  }

  for (const path of paths) {
    const outcome = await inspectFile(path, staging, skip, matcher, logger);
    switch (outcome.kind) {
      case 'skipped':
        stats.skipped += 1;
        break;
      case 'unreadable':
        stats.unreadable += 1;
        logger.debug(`Unable to scan ${path}`, { reason: outcome.reason });
        break;
      case 'scanned':
        stats.scanned += 1;
        if (outcome.finding) {
          logger.info(`Secret-like content in ${path}`, {
            rules: outcome.finding.ruleIds,
            line: outcome.finding.line,
          });
          findings.push(outcome.finding);
        }
        break;
    }
  }

  logger.debug('Scan complete', { ...stats, findings: findings.length });
  return { status: findings.length > 0 ? 'blocked' : 'clean', findings, stats };
}
