/**
 * Stratum Kernel — Snapshot Hashing Tests
 *
 * The snapshot hash identifies policy content: it is stable across load
 * order and file location, and changes when any document changes.
 */

import { describe, it, expect } from 'vitest';
import {
  CycleError,
  SchemaError,
  buildSnapshot,
  buildSnapshotFromDocuments,
  hashDocuments,
} from '../src/index.js';
import { directive, doc } from './fixtures.js';

const general = doc('general', { directives: [directive('errors', 'Crash fast.')] });
const python = doc('python', { extends: ['general'], directives: [directive('errors', 'Catch narrowly.')] });

describe('hashDocuments', () => {
  it('produces a 64-character hex digest', () => {
    expect(hashDocuments([general])).toMatch(/^[0-9a-f]{64}$/);
  });

  it('does not depend on document order', () => {
    expect(hashDocuments([general, python])).toBe(hashDocuments([python, general]));
  });

  it('does not depend on document origin', () => {
    expect(hashDocuments([{ ...general, origin: 'elsewhere/general.md' }])).toBe(hashDocuments([general]));
  });

  it('changes when a statement changes', () => {
    const edited = doc('general', { directives: [directive('errors', 'Crash loudly.')] });

    expect(hashDocuments([edited])).not.toBe(hashDocuments([general]));
  });

  it('changes when a merge mode changes', () => {
    const augmenting = doc('general', { directives: [directive('errors', 'Crash fast.', 'augment')] });

    expect(hashDocuments([augmenting])).not.toBe(hashDocuments([general]));
  });
});

describe('buildSnapshot', () => {
  it('carries the store, the graph and the content hash', () => {
    const snapshot = buildSnapshotFromDocuments([python, general]);

    expect(snapshot.store.list().map((d) => d.name)).toEqual(['general', 'python']);
    expect(snapshot.graph.tierOf('python')).toBe(1);
    expect(snapshot.hash).toBe(hashDocuments([general, python]));
    expect(Object.isFrozen(snapshot)).toBe(true);
  });

  it('is all-or-nothing on a malformed source', () => {
    const good = { origin: 'good.md', text: '---\nname: good\ndescription: Good\n---\n## Naming\n- Be clear.\n' };
    const bad = { origin: 'bad.md', text: '## Naming\n- No metadata block.\n' };

    expect(() => buildSnapshot([good, bad])).toThrow(SchemaError);
  });

  it('fails on a relation cycle', () => {
    expect(() =>
      buildSnapshotFromDocuments([doc('a', { extends: ['b'] }), doc('b', { extends: ['a'] })]),
    ).toThrow(CycleError);
  });
});
