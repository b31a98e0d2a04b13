/**
 * Stratum Policy Source — Glob Matching
 *
 * Pure, deterministic glob-to-regex conversion for the `appliesTo.paths`
 * predicate, evaluated against a query context's identifier.
 *
 * Supported glob syntax:
 * - `*`  — matches any character sequence within a single path segment
 * - `**` — matches any character sequence including path separators
 * - `?`  — matches exactly one character other than a separator
 * - All other characters are treated as literals
 *
 * Normalization: backslashes become `/`, and a leading `./` is stripped from
 * both pattern and identifier, so `./src/**` and `src/**` behave identically.
 */

/**
 * Test whether an identifier satisfies a glob pattern.
 *
 * @example
 * matchesGlob('**\/*.py',       'pkg/tools/io.py')        // true
 * matchesGlob('src/*.ts',       'src/index.ts')           // true
 * matchesGlob('src/*.ts',       'src/sub/index.ts')       // false
 * matchesGlob('notebooks/**',   './notebooks/demo.py')    // true
 */
export function matchesGlob(pattern: string, identifier: string): boolean {
  return globToRegExp(pattern).test(normalizePath(identifier));
}

/** Compile a glob pattern to an anchored regular expression. */
export function globToRegExp(pattern: string): RegExp {
  const segments = normalizePath(pattern).split('**');
  let regexStr = '';
  for (let i = 0; i < segments.length; i++) {
    if (i > 0) {
      // `**/` also matches zero directories: `**/*.py` accepts `io.py`.
      const seg = segments[i] ?? '';
      if (seg.startsWith('/')) {
        regexStr += '(?:.*/)?';
        segments[i] = seg.slice(1);
      } else {
        regexStr += '.*';
      }
    }
    const escaped = (segments[i] ?? '')
      .replace(/[.+^${}()|[\]\\]/g, '\\$&')
      .replace(/\*/g, '[^/]*')
      .replace(/\?/g, '[^/]');
    regexStr += escaped;
  }
  return new RegExp(`^${regexStr}$`);
}

function normalizePath(s: string): string {
  const slashed = s.replace(/\\/g, '/');
  return slashed.startsWith('./') ? slashed.slice(2) : slashed;
}
