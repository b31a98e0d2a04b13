/**
 * Stratum Kernel — Purity Test
 *
 * Statically verifies that the resolution core (packages/kernel/src and
 * packages/policy-source/src) reads no files, spawns nothing, opens no
 * sockets and consults no environment variables. Reading policy directories
 * and writing logs belong to @stratum/runtime-host.
 *
 * node:crypto is the one Node.js module allowed: createHash is a pure,
 * deterministic computation used for snapshot and context hashing.
 */

import { describe, it, expect } from 'vitest';
import { readdirSync, readFileSync, statSync } from 'node:fs';
import { join, relative } from 'node:path';
import { fileURLToPath } from 'node:url';

const testDir = fileURLToPath(new URL('.', import.meta.url));
const packagesDir = join(testDir, '..', '..');
const CORE_DIRS = [join(packagesDir, 'kernel', 'src'), join(packagesDir, 'policy-source', 'src')];

const FORBIDDEN_PATTERNS: ReadonlyArray<{ label: string; pattern: RegExp }> = [
  { label: 'fs', pattern: /from ['"](node:)?fs(\/promises)?['"]/ },
  { label: 'child_process', pattern: /from ['"](node:)?child_process['"]/ },
  { label: 'net', pattern: /from ['"](node:)?net['"]/ },
  { label: 'http', pattern: /from ['"](node:)?https?['"]/ },
  { label: 'process.env', pattern: /process\.env/ },
];

function collectTsFiles(dir: string): string[] {
  const files: string[] = [];
  for (const entry of readdirSync(dir)) {
    const fullPath = join(dir, entry);
    if (statSync(fullPath).isDirectory()) {
      files.push(...collectTsFiles(fullPath));
    } else if (entry.endsWith('.ts') && !entry.endsWith('.d.ts')) {
      files.push(fullPath);
    }
  }
  return files;
}

describe('resolution core performs no I/O', () => {
  const sourceFiles = CORE_DIRS.flatMap(collectTsFiles);

  it('finds source files to scan', () => {
    expect(sourceFiles.length).toBeGreaterThan(0);
  });

  it.each(FORBIDDEN_PATTERNS)('no core source file uses $label', ({ label, pattern }) => {
    const violations = sourceFiles
      .filter((file) => pattern.test(readFileSync(file, 'utf-8')))
      .map((file) => `  ${relative(packagesDir, file)} uses ${label}`);

    expect(violations, violations.join('\n')).toHaveLength(0);
  });

  it('imports node:crypto and no other Node.js module', () => {
    const nodeImports = new Set<string>();
    for (const file of sourceFiles) {
      for (const m of readFileSync(file, 'utf-8').matchAll(/from ['"](node:[^'"]+)['"]/g)) {
        if (m[1] !== undefined) nodeImports.add(m[1]);
      }
    }

    expect([...nodeImports]).toEqual(['node:crypto']);
  });
});
