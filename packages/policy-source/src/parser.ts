/**
 * Stratum Policy Source — Parser
 *
 * Parses one document source (YAML metadata block followed by a markdown
 * body of topic-tagged sections) into a PolicyDocument.
 *
 * Parser guarantees:
 * - Deterministic: identical source produces an identical document
 * - Rejecting: any problem produces ValidationError[], never a partial document
 * - Exhaustive: every problem in one source is reported, not just the first
 *
 * Cross-document checks (duplicate names, unresolved relation targets) are
 * the Document Store's responsibility, not the parser's.
 */

import { parse as parseYaml, YAMLParseError } from 'yaml';
import {
  DEFAULT_MERGE_MODE,
  MERGE_MODES,
  RELATION_KINDS,
  type Applicability,
  type Directive,
  type DocumentSource,
  type MergeMode,
  type ParseResult,
  type Relation,
  type RelationKind,
  type ValidationError,
} from './types.js';

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Parse a document source into a PolicyDocument.
 *
 * @returns ParseResult: the document on success, every error found on failure
 */
export function parseDocumentSource(source: DocumentSource): ParseResult {
  const lines = source.text.replace(/^\uFEFF/, '').split(/\r?\n/);

  const block = splitMetadataBlock(lines);
  if (!block.ok) {
    return { ok: false, name: null, errors: [{ message: block.error, context: 'metadata' }] };
  }

  const errors: ValidationError[] = [];
  const metadata = readMetadata(block.metadata, errors);
  const directives = readBody(block.body, errors);

  if (errors.length > 0 || metadata === null) {
    return { ok: false, name: metadata?.name ?? block.declaredName, errors };
  }

  return {
    ok: true,
    document: {
      name: metadata.name,
      description: metadata.description,
      directives,
      relations: metadata.relations,
      appliesTo: metadata.appliesTo,
      origin: source.origin,
    },
  };
}

/**
 * Normalize a section heading into a topic tag: lowercase, with every run
 * of non-alphanumeric characters collapsed to a single hyphen.
 *
 * @example
 * normalizeTopic('Error Handling')   // 'error-handling'
 * normalizeTopic('  State / Hooks ') // 'state-hooks'
 */
export function normalizeTopic(heading: string): string {
  return heading
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
}

/** Normalize a language or framework tag for comparison. */
export function normalizeTag(tag: string): string {
  return tag.trim().toLowerCase();
}

// ---------------------------------------------------------------------------
// Internal: metadata block
// ---------------------------------------------------------------------------

type MetadataBlock =
  | {
      readonly ok: true;
      readonly metadata: unknown;
      readonly declaredName: string | null;
      readonly body: ReadonlyArray<string>;
    }
  | { readonly ok: false; readonly error: string };

const FENCE = '---';

function splitMetadataBlock(lines: ReadonlyArray<string>): MetadataBlock {
  let start = 0;
  while (start < lines.length && (lines[start] ?? '').trim() === '') {
    start++;
  }
  if ((lines[start] ?? '').trim() !== FENCE) {
    return { ok: false, error: `Expected a metadata block opened by "${FENCE}"` };
  }

  const end = lines.findIndex((line, i) => i > start && line.trim() === FENCE);
  if (end === -1) {
    return { ok: false, error: `Metadata block is not closed by "${FENCE}"` };
  }

  const yamlText = lines.slice(start + 1, end).join('\n');
  let metadata: unknown;
  try {
    metadata = parseYaml(yamlText);
  } catch (err: unknown) {
    if (err instanceof YAMLParseError) {
      return { ok: false, error: `Metadata block is not valid YAML: ${err.message}` };
    }
    throw err;
  }

  return {
    ok: true,
    metadata,
    declaredName: peekName(metadata),
    body: lines.slice(end + 1),
  };
}

function peekName(metadata: unknown): string | null {
  if (!isRecord(metadata)) return null;
  const name = metadata['name'];
  return typeof name === 'string' && name.trim() !== '' ? name.trim() : null;
}

interface Metadata {
  readonly name: string;
  readonly description: string;
  readonly relations: ReadonlyArray<Relation>;
  readonly appliesTo: Applicability;
}

function readMetadata(raw: unknown, errors: ValidationError[]): Metadata | null {
  if (!isRecord(raw)) {
    errors.push({ message: 'Metadata block must be a mapping', context: 'metadata' });
    return null;
  }

  const name = requireString(raw, 'name', errors);
  const description = requireString(raw, 'description', errors);

  if (raw['relation'] !== undefined && raw['relations'] !== undefined) {
    errors.push({
      message: 'Declare either "relation" or "relations", not both',
      context: 'relation',
    });
  }
  const relations = readRelations(raw['relation'] ?? raw['relations'], errors);
  const appliesTo = readApplicability(raw['appliesTo'], errors);

  if (name === null || description === null) {
    return null;
  }
  return { name, description, relations, appliesTo };
}

function requireString(
  raw: Record<string, unknown>,
  field: string,
  errors: ValidationError[],
): string | null {
  const value = raw[field];
  if (typeof value !== 'string' || value.trim() === '') {
    errors.push({ message: `Missing required field: ${field}`, context: field });
    return null;
  }
  return value.trim();
}

function readRelations(raw: unknown, errors: ValidationError[]): ReadonlyArray<Relation> {
  if (raw === undefined || raw === null) {
    return [];
  }
  const entries: ReadonlyArray<unknown> = Array.isArray(raw) ? raw : [raw];
  const relations: Relation[] = [];

  entries.forEach((entry, i) => {
    const context = `relation[${i}]`;
    if (!isRecord(entry)) {
      errors.push({ message: 'Relation must be a mapping of {kind, target}', context });
      return;
    }
    const kind = entry['kind'];
    const target = entry['target'];
    if (!isRelationKind(kind)) {
      errors.push({
        message:
          `Unknown relation kind: ${JSON.stringify(kind)}. ` +
          `Must be one of: ${RELATION_KINDS.join(', ')}`,
        context,
      });
      return;
    }
    if (typeof target !== 'string' || target.trim() === '') {
      errors.push({ message: 'Relation target must be a non-empty document name', context });
      return;
    }
    relations.push({ kind, target: target.trim() });
  });

  return relations;
}

const APPLICABILITY_FIELDS = ['languages', 'frameworks', 'paths'] as const;

function readApplicability(raw: unknown, errors: ValidationError[]): Applicability {
  if (raw === undefined || raw === null) {
    return {};
  }
  if (!isRecord(raw)) {
    errors.push({ message: 'appliesTo must be a mapping', context: 'appliesTo' });
    return {};
  }

  for (const key of Object.keys(raw)) {
    if (!APPLICABILITY_FIELDS.some((f) => f === key)) {
      errors.push({
        message: `Unknown applicability field: ${key}. Must be one of: ${APPLICABILITY_FIELDS.join(', ')}`,
        context: 'appliesTo',
      });
    }
  }

  const languages = readStringList(raw['languages'], 'appliesTo.languages', errors);
  const frameworks = readStringList(raw['frameworks'], 'appliesTo.frameworks', errors);
  const paths = readStringList(raw['paths'], 'appliesTo.paths', errors);

  return {
    ...(languages !== undefined ? { languages: languages.map(normalizeTag) } : {}),
    ...(frameworks !== undefined ? { frameworks: frameworks.map(normalizeTag) } : {}),
    ...(paths !== undefined ? { paths: paths.map((p) => p.trim()) } : {}),
  };
}

function readStringList(
  raw: unknown,
  context: string,
  errors: ValidationError[],
): ReadonlyArray<string> | undefined {
  if (raw === undefined || raw === null) {
    return undefined;
  }
  if (!Array.isArray(raw) || raw.length === 0) {
    errors.push({ message: 'Expected a non-empty list of strings', context });
    return undefined;
  }
  const values: string[] = [];
  for (const item of raw) {
    if (typeof item !== 'string' || item.trim() === '') {
      errors.push({ message: `Expected a non-empty string, got ${JSON.stringify(item)}`, context });
      return undefined;
    }
    values.push(item);
  }
  return values;
}

// ---------------------------------------------------------------------------
// Internal: body sections
// ---------------------------------------------------------------------------

interface Section {
  readonly topic: string;
  readonly heading: string;
  readonly mode: MergeMode;
  readonly lines: string[];
}

interface DraftDirective {
  statement: string;
  readonly examples: string[];
  readonly antiPatterns: string[];
}

const SECTION_HEADING = /^##\s+(.+?)\s*#*\s*$/;
const MODE_MARKER = new RegExp(`^(.*?)\\s*\\[(${MERGE_MODES.join('|')})\\]$`, 'i');
const FENCE_LINE = /^\s*(```|~~~)(.*)$/;
const TOP_BULLET = /^[-*+]\s+(.*)$/;
const SUB_BULLET = /^\s+[-*+]\s+(.*)$/;
const EXAMPLE_ITEM = /^(example|avoid|anti-pattern)s?\s*:\s*(.*)$/i;

function readBody(lines: ReadonlyArray<string>, errors: ValidationError[]): ReadonlyArray<Directive> {
  const sections: Section[] = [];
  let current: Section | null = null;
  let inFence = false;

  for (const line of lines) {
    if (FENCE_LINE.test(line)) {
      inFence = !inFence;
    }
    const heading = inFence ? null : SECTION_HEADING.exec(line);
    if (heading !== null && heading[1] !== undefined) {
      current = openSection(heading[1], errors);
      if (current !== null) {
        sections.push(current);
      }
      continue;
    }
    current?.lines.push(line);
  }

  if (inFence) {
    errors.push({ message: 'Unterminated code block', context: 'body' });
  }

  return sections.flatMap((section) => readSection(section, errors));
}

function openSection(rawHeading: string, errors: ValidationError[]): Section | null {
  const marker = MODE_MARKER.exec(rawHeading);
  const title = marker?.[1] ?? rawHeading;
  const marked = marker?.[2]?.toLowerCase();
  const mode: MergeMode = isMergeMode(marked) ? marked : DEFAULT_MERGE_MODE;

  const topic = normalizeTopic(title);
  if (topic === '') {
    errors.push({ message: `Section heading yields an empty topic: ${JSON.stringify(rawHeading)}`, context: 'body' });
    return null;
  }
  return { topic, heading: title.trim(), mode, lines: [] };
}

function readSection(section: Section, errors: ValidationError[]): ReadonlyArray<Directive> {
  const context = `section "${section.heading}"`;
  const drafts: DraftDirective[] = [];
  const prose: string[] = [];
  let fence: { readonly anti: boolean; readonly lines: string[] } | null = null;
  // Where an indented continuation line belongs: the statement or the last example list.
  let continuation: string[] | null = null;

  for (const line of section.lines) {
    const fenceMatch = FENCE_LINE.exec(line);
    if (fence !== null) {
      if (fenceMatch !== null) {
        const last = drafts[drafts.length - 1];
        if (last === undefined) {
          errors.push({ message: 'Code block appears before any directive', context });
        } else {
          (fence.anti ? last.antiPatterns : last.examples).push(fence.lines.join('\n'));
        }
        fence = null;
      } else {
        fence.lines.push(line);
      }
      continue;
    }
    if (fenceMatch !== null) {
      fence = { anti: /\b(avoid|anti-pattern)\b/i.test(fenceMatch[2] ?? ''), lines: [] };
      continuation = null;
      continue;
    }

    if (line.trim() === '' || line.startsWith('#')) {
      continuation = null;
      continue;
    }

    const top = TOP_BULLET.exec(line);
    if (top !== null) {
      drafts.push({ statement: (top[1] ?? '').trim(), examples: [], antiPatterns: [] });
      continuation = null;
      continue;
    }

    const last = drafts[drafts.length - 1];
    const sub = SUB_BULLET.exec(line);
    if (sub !== null && last !== undefined) {
      const item = EXAMPLE_ITEM.exec((sub[1] ?? '').trim());
      if (item !== null) {
        const target = (item[1] ?? '').toLowerCase() === 'example' ? last.examples : last.antiPatterns;
        target.push(stripInlineCode((item[2] ?? '').trim()));
        continuation = target;
      } else {
        last.statement = `${last.statement} ${(sub[1] ?? '').trim()}`;
        continuation = null;
      }
      continue;
    }

    if (/^\s/.test(line) && last !== undefined) {
      if (continuation !== null && continuation.length > 0) {
        const i = continuation.length - 1;
        continuation[i] = `${continuation[i] ?? ''} ${line.trim()}`;
      } else {
        last.statement = `${last.statement} ${line.trim()}`;
      }
      continue;
    }

    prose.push(line.trim());
  }

  if (drafts.length === 0 && prose.length > 0) {
    drafts.push({ statement: prose.join(' '), examples: [], antiPatterns: [] });
  } else if (prose.length > 0) {
    errors.push({
      message: `Prose outside a bullet in a section with directives: ${JSON.stringify(prose[0])}`,
      context,
    });
  }
  if (drafts.length === 0) {
    errors.push({ message: 'Section declares no directives', context });
    return [];
  }

  const directives: Directive[] = [];
  for (const draft of drafts) {
    if (draft.statement === '') {
      errors.push({ message: 'Directive has an empty statement', context });
      continue;
    }
    directives.push({
      topic: section.topic,
      statement: draft.statement,
      examples: draft.examples,
      antiPatterns: draft.antiPatterns,
      mode: section.mode,
    });
  }
  return directives;
}

/** `code` → code, when the whole item is one inline code span. */
function stripInlineCode(text: string): string {
  const match = /^`([^`]*)`$/.exec(text);
  return match?.[1] ?? text;
}

// ---------------------------------------------------------------------------
// Internal: narrowing helpers
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isMergeMode(value: unknown): value is MergeMode {
  return MERGE_MODES.some((m) => m === value);
}

function isRelationKind(value: unknown): value is RelationKind {
  return RELATION_KINDS.some((k) => k === value);
}
