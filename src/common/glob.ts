/**
 * Convert a gitignore-style glob into a regular expression over `/`-separated paths.
 * Supports **, *, ? and [...] classes. A pattern without a slash matches at any depth.
 */
export function compileGlobToRegExp(glob: string): RegExp {
  let body = glob.trim().replace(/\\/g, '/');
  if (!body.includes('/')) {
    body = `**/${body}`;
  } else if (body.startsWith('/')) {
    body = body.slice(1);
  }
  if (body.endsWith('/')) {
    body = `${body}**`;
  }

  let regex = '';
  let i = 0;
  while (i < body.length) {
    const char = body[i];
    if (char === '*') {
      if (body[i + 1] === '*') {
        if (body[i + 2] === '/') {
          regex += '(?:.*/)?';
          i += 3;
        } else {
          regex += '.*';
          i += 2;
        }
      } else {
        regex += '[^/]*';
        i += 1;
      }
      continue;
    }
    if (char === '?') {
      regex += '[^/]';
      i += 1;
      continue;
    }
    if (char === '[') {
      const end = body.indexOf(']', i + 1);
      if (end !== -1) {
        regex += `[${body.slice(i + 1, end)}]`;
        i = end + 1;
        continue;
      }
    }
    regex += /[-\\^$+?.()|{}[\]]/.test(char) ? `\\${char}` : char;
    i += 1;
  }

  return new RegExp(`^${regex}$`);
}

export class GlobMatcher {
  private readonly compiled: Array<{ glob: string; regex: RegExp }>;

  constructor(globs: readonly string[] = []) {
    this.compiled = globs
      .filter((glob) => glob.trim() !== '' && !glob.trim().startsWith('#'))
      .map((glob) => ({ glob: glob.trim(), regex: compileGlobToRegExp(glob) }));
  }

  /** Returns the first glob matching `path`, if any. */
  find(path: string): string | undefined {
    return this.compiled.find((entry) => entry.regex.test(path))?.glob;
  }

  get size(): number {
    return this.compiled.length;
  }
}
