import { describe, it, expect } from 'vitest';
import { matchesGlob } from '../src/index.js';

describe('matchesGlob', () => {
  it.each([
    ['**/*.py', 'io.py', true],
    ['**/*.py', 'pkg/tools/io.py', true],
    ['**/*.py', 'pkg/io.pyc', false],
    ['src/*.ts', 'src/index.ts', true],
    ['src/*.ts', 'src/sub/index.ts', false],
    ['src/?.ts', 'src/a.ts', true],
    ['src/?.ts', 'src/ab.ts', false],
    ['notebooks/**', './notebooks/demo.py', true],
    ['./notebooks/**', 'notebooks/deep/demo.py', true],
    ['src/**', 'src\\lib\\a.ts', true],
    ['a.b', 'axb', false],
    ['(draft)+.md', '(draft)+.md', true],
  ])('%s against %s is %s', (pattern, identifier, expected) => {
    expect(matchesGlob(pattern, identifier)).toBe(expected);
  });
});
