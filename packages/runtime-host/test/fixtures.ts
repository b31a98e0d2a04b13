/**
 * Temp policy directories for runtime-host tests.
 */

import { mkdirSync, mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';

export const GENERAL_MD = `---
name: general
description: Guidance for every project
---
# General

## Error Handling
- Crash fast, no silent catches.

## Naming
- Use descriptive names.
`;

export const PYTHON_MD = `---
name: python
description: Python guidance
relation: { kind: extends, target: general }
appliesTo:
  languages: [python]
---
## Error Handling
- Only catch exceptions with a recovery path.
  - avoid: \`except Exception: pass\`

## Naming [augment]
- Use snake_case for functions.
`;

/** Create a temp directory holding `files` (relative path → content). */
export function policyDir(files: Record<string, string>): string {
  const dir = mkdtempSync(join(tmpdir(), 'stratum-policies-'));
  writeFiles(dir, files);
  return dir;
}

export function writeFiles(dir: string, files: Record<string, string>): void {
  for (const [name, content] of Object.entries(files)) {
    const path = join(dir, name);
    mkdirSync(dirname(path), { recursive: true });
    writeFileSync(path, content, 'utf-8');
  }
}
