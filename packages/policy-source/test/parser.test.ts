/**
 * Stratum Policy Source — Parser Tests
 *
 * parse/metadata:   the YAML block yields name, description, relations and
 *                   the applicability predicate
 * parse/body:       `##` sections yield topic-tagged directives with
 *                   examples and anti-patterns
 * parse/rejecting:  malformed sources produce every ValidationError found and
 *                   no document
 */

import { describe, it, expect } from 'vitest';
import {
  SchemaError,
  compileDocument,
  normalizeTopic,
  parseDocumentSource,
} from '../src/index.js';
import type { ParseResult } from '../src/index.js';

function parse(...lines: string[]): ParseResult {
  return parseDocumentSource({ origin: 'test.md', text: lines.join('\n') });
}

function errorsOf(result: ParseResult) {
  if (result.ok) throw new Error('expected the source to be rejected');
  return result.errors;
}

const REACT = [
  '---',
  'name: react',
  'description: React component guidance',
  'relations:',
  '  - kind: extends',
  '    target: typescript',
  '  - kind: supplements',
  '    target: accessibility',
  'appliesTo:',
  '  languages: [TypeScript, TSX]',
  '  frameworks: [React]',
  '  paths: [" src/components/** "]',
  '---',
  '',
  '# React',
  '',
  '## State Management [augment]',
  '',
  '- Keep state as local as possible.',
  '  - example: `const [open, setOpen] = useState(false)`',
  '  - avoid: a global store for form input',
  '- Derive values instead of syncing them',
  '  with effects.',
  '',
  '## Effects',
  '',
  'Effects synchronize with external systems.',
  'Do not use them for data flow.',
  '',
  '## Testing',
  '',
  '- Test behaviour through the rendered output.',
  '',
  '```tsx',
  'render(<Button />);',
  '```',
  '',
  '```tsx avoid',
  'expect(wrapper.state()).toBe(1);',
  '```',
];

describe('parse/metadata', () => {
  const result = parse(...REACT);

  it('reads identity, relations and applicability', () => {
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    const { document } = result;

    expect(document.name).toBe('react');
    expect(document.description).toBe('React component guidance');
    expect(document.origin).toBe('test.md');
    expect(document.relations).toEqual([
      { kind: 'extends', target: 'typescript' },
      { kind: 'supplements', target: 'accessibility' },
    ]);
    expect(document.appliesTo).toEqual({
      languages: ['typescript', 'tsx'],
      frameworks: ['react'],
      paths: ['src/components/**'],
    });
  });

  it('accepts a single relation mapping', () => {
    const single = parse(
      '---',
      'name: python',
      'description: Python guidance',
      'relation: { kind: extends, target: general }',
      '---',
      '## Typing',
      '- Annotate public functions.',
    );

    expect(single.ok && single.document.relations).toEqual([{ kind: 'extends', target: 'general' }]);
  });

  it('leaves applicability empty when none is declared', () => {
    const plain = parse('---', 'name: general', 'description: General', '---', '## Naming', '- Be clear.');

    expect(plain.ok && plain.document.appliesTo).toEqual({});
  });

  it('tolerates a byte order mark and CRLF line endings', () => {
    const result = parseDocumentSource({
      origin: 'crlf.md',
      text: '\uFEFF---\r\nname: crlf\r\ndescription: Windows file\r\n---\r\n## Naming\r\n- Be clear.\r\n',
    });

    expect(result.ok && result.document.directives.map((d) => d.statement)).toEqual(['Be clear.']);
  });
});

describe('parse/body', () => {
  const result = parse(...REACT);
  const directives = result.ok ? result.document.directives : [];

  it('turns bullets into directives tagged with the section topic', () => {
    expect(directives.map((d) => [d.topic, d.mode, d.statement])).toEqual([
      ['state-management', 'augment', 'Keep state as local as possible.'],
      ['state-management', 'augment', 'Derive values instead of syncing them with effects.'],
      ['effects', 'override', 'Effects synchronize with external systems. Do not use them for data flow.'],
      ['testing', 'override', 'Test behaviour through the rendered output.'],
    ]);
  });

  it('attaches example and avoid sub-bullets to their directive', () => {
    expect(directives[0]?.examples).toEqual(['const [open, setOpen] = useState(false)']);
    expect(directives[0]?.antiPatterns).toEqual(['a global store for form input']);
    expect(directives[1]?.examples).toEqual([]);
  });

  it('attaches fenced blocks to the preceding directive', () => {
    expect(directives[3]?.examples).toEqual(['render(<Button />);']);
    expect(directives[3]?.antiPatterns).toEqual(['expect(wrapper.state()).toBe(1);']);
  });

  it('reads an explicit override marker', () => {
    const marked = parse('---', 'name: a', 'description: A', '---', '## Naming [Override]', '- Be clear.');

    expect(marked.ok && marked.document.directives[0]).toEqual({
      topic: 'naming',
      statement: 'Be clear.',
      examples: [],
      antiPatterns: [],
      mode: 'override',
    });
  });

  it('does not treat headings inside code blocks as sections', () => {
    const fenced = parse(
      '---', 'name: a', 'description: A', '---',
      '## Docs',
      '- Keep a changelog.',
      '```md',
      '## Unreleased',
      '```',
    );

    expect(fenced.ok && fenced.document.directives.map((d) => [d.topic, d.examples])).toEqual([
      ['docs', ['## Unreleased']],
    ]);
  });
});

describe('parse/rejecting', () => {
  it('requires a metadata block', () => {
    const result = parse('## Naming', '- Be clear.');

    expect(result).toEqual({
      ok: false,
      name: null,
      errors: [{ message: 'Expected a metadata block opened by "---"', context: 'metadata' }],
    });
  });

  it('requires the metadata block to be closed', () => {
    expect(errorsOf(parse('---', 'name: a', '## Naming'))).toEqual([
      { message: 'Metadata block is not closed by "---"', context: 'metadata' },
    ]);
  });

  it('reports invalid YAML', () => {
    const [error] = errorsOf(parse('---', 'name: [unclosed', '---', '## Naming', '- Be clear.'));

    expect(error?.context).toBe('metadata');
    expect(error?.message).toMatch(/^Metadata block is not valid YAML: /);
  });

  it('reports every problem and keeps the declared name', () => {
    const result = parse(
      '---',
      'name: broken',
      'relation: { kind: inherits, target: general }',
      'appliesTo: { languages: [python], editors: [vim] }',
      '---',
      '## Empty',
      '## Naming',
      '- Be clear.',
    );

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.name).toBe('broken');
    expect(result.errors).toEqual([
      { message: 'Missing required field: description', context: 'description' },
      {
        message: 'Unknown relation kind: "inherits". Must be one of: supplements, extends',
        context: 'relation[0]',
      },
      {
        message: 'Unknown applicability field: editors. Must be one of: languages, frameworks, paths',
        context: 'appliesTo',
      },
      { message: 'Section declares no directives', context: 'section "Empty"' },
    ]);
  });

  it('rejects declaring both relation and relations', () => {
    const errors = errorsOf(parse(
      '---',
      'name: a',
      'description: A',
      'relation: { kind: extends, target: b }',
      'relations: [{ kind: extends, target: c }]',
      '---',
      '## Naming',
      '- Be clear.',
    ));

    expect(errors).toEqual([
      { message: 'Declare either "relation" or "relations", not both', context: 'relation' },
    ]);
  });

  it('rejects an unterminated code block', () => {
    const errors = errorsOf(parse('---', 'name: a', 'description: A', '---', '## Naming', '- Be clear.', '```', 'code'));

    expect(errors).toEqual([{ message: 'Unterminated code block', context: 'body' }]);
  });

  it('rejects prose beside bullets instead of dropping it', () => {
    const errors = errorsOf(parse(
      '---', 'name: a', 'description: A', '---',
      '## Errors',
      'Never swallow errors.',
      '- Crash fast.',
    ));

    expect(errors).toEqual([
      {
        message: 'Prose outside a bullet in a section with directives: "Never swallow errors."',
        context: 'section "Errors"',
      },
    ]);
  });

  it('rejects an empty applicability list', () => {
    const errors = errorsOf(parse('---', 'name: a', 'description: A', 'appliesTo: { languages: [] }', '---', '## Naming', '- Be clear.'));

    expect(errors).toEqual([{ message: 'Expected a non-empty list of strings', context: 'appliesTo.languages' }]);
  });
});

describe('compileDocument', () => {
  it('returns a deep-frozen document', () => {
    const document = compileDocument({ origin: 'a.md', text: REACT.join('\n') });

    expect(Object.isFrozen(document)).toBe(true);
    expect(Object.isFrozen(document.directives[0]?.examples)).toBe(true);
  });

  it('throws a SchemaError naming the document', () => {
    expect(() => compileDocument({ origin: 'a.md', text: '---\nname: a\n---\n## N\n- x\n' })).toThrow(
      'Invalid policy document "a": description: Missing required field: description',
    );
  });

  it('falls back to the origin when no name was declared', () => {
    try {
      compileDocument({ origin: 'policies/nameless.md', text: 'no metadata' });
      expect.unreachable();
    } catch (err: unknown) {
      expect(err).toBeInstanceOf(SchemaError);
      expect(err instanceof SchemaError && err.document).toBe('policies/nameless.md');
    }
  });
});

describe('normalizeTopic', () => {
  it.each([
    ['Error Handling', 'error-handling'],
    ['  State / Hooks ', 'state-hooks'],
    ['I/O & Networking!', 'i-o-networking'],
    ['v2 API', 'v2-api'],
  ])('%s -> %s', (heading, topic) => {
    expect(normalizeTopic(heading)).toBe(topic);
  });
});
