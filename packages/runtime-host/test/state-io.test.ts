/**
 * Stratum Runtime Host — StateIO Contract Tests
 *
 * Both implementations honour the same contract. FileStateIO tests use
 * temp directories, never the real Stratum home.
 */

import { describe, it, expect } from 'vitest';
import { mkdirSync, mkdtempSync, readFileSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { FileStateIO, MemoryStateIO } from '../src/state/state-io.js';
import type { StateIO } from '../src/state/state-io.js';

function tempHome(): string {
  return mkdtempSync(join(tmpdir(), 'stratum-state-'));
}

const implementations: ReadonlyArray<[string, () => StateIO]> = [
  ['MemoryStateIO', () => new MemoryStateIO()],
  ['FileStateIO', () => new FileStateIO(tempHome())],
];

describe.each(implementations)('%s', (_name, create) => {
  it('returns undefined for a state file never written', () => {
    expect(create().readJson('snapshot.json')).toBeUndefined();
  });

  it('round-trips JSON state, dropping undefined fields', () => {
    const io = create();

    io.writeJson('snapshot.json', { hash: 'abc', documents: ['general'], missing: undefined });

    expect(io.readJson('snapshot.json')).toEqual({ hash: 'abc', documents: ['general'] });
  });

  it('returns an empty string for a log never written', () => {
    expect(create().readLogRaw('resolutions.jsonl')).toBe('');
  });

  it('returns appended lines, each ending in a newline', () => {
    const io = create();

    io.appendLine('resolutions.jsonl', '{"a":1}');
    io.appendLine('resolutions.jsonl', '{"b":2}');

    expect(io.readLogRaw('resolutions.jsonl')).toBe('{"a":1}\n{"b":2}\n');
  });
});

describe('FileStateIO layout', () => {
  it('writes state under state/ and logs under logs/', () => {
    const home = tempHome();
    const io = new FileStateIO(home);

    io.writeJson('snapshot.json', { hash: 'abc' });
    io.appendLine('resolutions.jsonl', 'line');

    expect(JSON.parse(readFileSync(join(home, 'state', 'snapshot.json'), 'utf-8'))).toEqual({ hash: 'abc' });
    expect(readFileSync(join(home, 'logs', 'resolutions.jsonl'), 'utf-8')).toBe('line\n');
  });

  it('treats an unparseable state file as absent', () => {
    const home = tempHome();
    mkdirSync(join(home, 'state'));
    writeFileSync(join(home, 'state', 'snapshot.json'), '{ not json', 'utf-8');

    expect(new FileStateIO(home).readJson('snapshot.json')).toBeUndefined();
  });
});

describe('MemoryStateIO isolation', () => {
  it('does not share logs between instances', () => {
    const a = new MemoryStateIO();
    const b = new MemoryStateIO();

    a.appendLine('resolutions.jsonl', 'only-in-a');

    expect(a.readLines('resolutions.jsonl')).toEqual(['only-in-a']);
    expect(b.readLines('resolutions.jsonl')).toEqual([]);
  });
});
