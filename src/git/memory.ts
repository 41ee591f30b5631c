import { StagedContentError } from '../common/errors';
import type { StagedContent, StagingArea } from './staging';

/**
 * In-memory staging area. Entries mapped to `undefined` are listed but cannot be
 * fetched, like a path whose blob has vanished from the index.
 */
export class MemoryStagingArea implements StagingArea {
  readonly fetched: string[] = [];
  private readonly entries: Map<string, Buffer | undefined>;

  constructor(entries: Record<string, string | Buffer | undefined> = {}) {
    this.entries = new Map(
      Object.entries(entries).map(([path, content]): [string, Buffer | undefined] => [
        path,
        typeof content === 'string' ? Buffer.from(content, 'utf8') : content,
      ]),
    );
  }

  async listChangedPaths(): Promise<string[]> {
    return [...this.entries.keys()];
  }

  async readStagedContent(path: string): Promise<StagedContent> {
    this.fetched.push(path);
    const content = this.entries.get(path);
    if (content === undefined) {
      return { ok: false, error: new StagedContentError(path, 'not present in the index') };
    }
    return { ok: true, content };
  }
}
