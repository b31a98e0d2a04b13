/**
 * Stratum Runtime Host — Policy Directory Reader
 *
 * Reads every `*.md` file under a policy directory, recursively, into
 * DocumentSources. Files are returned sorted by their path relative to the
 * directory, and that relative path (with `/` separators) is each source's
 * origin, so the same tree yields the same batch on every machine.
 */

import { readFileSync, readdirSync, statSync } from 'node:fs';
import { join, relative, sep } from 'node:path';
import type { DocumentSource } from '@stratum/kernel';
import { isNodeError } from '../state/state-io.js';

/** The policy directory is missing or is not a directory. */
export class PolicyDirectoryError extends Error {
  constructor(readonly directory: string, message: string) {
    super(message);
    this.name = 'PolicyDirectoryError';
  }
}

/**
 * @throws {PolicyDirectoryError} If `directory` does not exist or is a file
 */
export function readPolicyDirectory(directory: string): DocumentSource[] {
  let isDirectory: boolean;
  try {
    isDirectory = statSync(directory).isDirectory();
  } catch (err: unknown) {
    if (isNodeError(err, 'ENOENT')) {
      throw new PolicyDirectoryError(directory, `Policy directory not found: ${directory}`);
    }
    throw err;
  }
  if (!isDirectory) {
    throw new PolicyDirectoryError(directory, `Policy path is not a directory: ${directory}`);
  }

  return collectMarkdown(directory)
    .map((file) => ({ file, origin: relative(directory, file).split(sep).join('/') }))
    .sort((a, b) => (a.origin < b.origin ? -1 : a.origin > b.origin ? 1 : 0))
    .map(({ file, origin }) => ({ origin, text: readFileSync(file, 'utf-8') }));
}

function collectMarkdown(dir: string): string[] {
  const files: string[] = [];
  for (const entry of readdirSync(dir, { withFileTypes: true })) {
    if (entry.name.startsWith('.')) continue;
    const fullPath = join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...collectMarkdown(fullPath));
    } else if (entry.isFile() && entry.name.endsWith('.md')) {
      files.push(fullPath);
    }
  }
  return files;
}
