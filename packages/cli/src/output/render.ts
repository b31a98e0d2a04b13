/**
 * Human-readable renderings of engine values. Each function returns the
 * full text block; commands decide where it goes.
 */

import type {
  CompositionResult,
  EffectiveDirective,
  PolicyDocument,
  PolicySnapshot,
} from '@stratum/kernel';
import type { LogEvent } from '@stratum/runtime-host';
import { modeColor, outcomeColor, t, tierColor } from './theme.js';

const RULE = '─'.repeat(52);

export function renderResult(result: CompositionResult): string {
  let out = '\n';
  out += '  ' + t.muted('applied ') + (result.appliedDocuments.length === 0
    ? t.dim('(none)')
    : result.appliedDocuments.map((d) => t.white(d)).join(t.dim(' → '))) + '\n';

  for (const [topic, directives] of Object.entries(result.directives)) {
    out += '\n  ' + t.blue(topic) + '\n';
    out += directives.map((d) => renderDirective(d)).join('');
  }

  for (const conflict of result.conflicts) {
    out += '\n  ' + t.amber(`⚠ ${conflict.topic}`) + t.dim('  unresolved conflict') + '\n';
    out += conflict.candidates.map((d) => renderDirective(d)).join('');
  }

  if (result.overrides.length > 0) {
    out += '\n  ' + t.muted('overrides') + '\n';
    for (const o of result.overrides) {
      out += '    ' + t.dim(`${o.topic}: ${o.by} replaced ${o.replaced.join(', ')}`) + '\n';
    }
  }
  return out;
}

function renderDirective(d: EffectiveDirective): string {
  let out = '    ' + t.text(d.statement) + '  ' + t.dim(`[${d.source}]`) + '\n';
  for (const example of d.examples) {
    out += '      ' + t.green('✓ ') + t.muted(firstLine(example)) + '\n';
  }
  for (const anti of d.antiPatterns) {
    out += '      ' + t.red('✗ ') + t.muted(firstLine(anti)) + '\n';
  }
  return out;
}

export function renderGraph(snapshot: PolicySnapshot): string {
  let out = '\n  ' + t.dim('snapshot ') + t.blueDim(snapshot.hash.slice(0, 12)) + '\n';
  snapshot.graph.tiers().forEach((documents, tier) => {
    out += '\n  ' + tierColor(tier)(`tier ${tier}`) + '\n';
    for (const doc of documents) {
      const relations = doc.relations.map((r) => `${r.kind} ${r.target}`).join(', ');
      out += '    ' + t.white(doc.name) + (relations !== '' ? '  ' + t.dim(relations) : '') + '\n';
    }
  });
  return out;
}

export function renderDocument(doc: PolicyDocument, tier: number): string {
  let out = '\n' + RULE + '\n';
  out += t.white(doc.name) + '  ' + tierColor(tier)(`tier ${tier}`) + '  ' + t.dim(doc.origin) + '\n';
  out += t.text(doc.description) + '\n';
  for (const r of doc.relations) {
    out += t.muted(`${r.kind} `) + r.target + '\n';
  }
  const { languages, frameworks, paths } = doc.appliesTo;
  if (languages !== undefined) out += t.muted('languages  ') + languages.join(', ') + '\n';
  if (frameworks !== undefined) out += t.muted('frameworks ') + frameworks.join(', ') + '\n';
  if (paths !== undefined) out += t.muted('paths      ') + paths.join(', ') + '\n';

  let topic: string | null = null;
  for (const d of doc.directives) {
    if (d.topic !== topic) {
      topic = d.topic;
      out += '\n' + t.blue(d.topic) + '  ' + modeColor(d.mode)(d.mode) + '\n';
    }
    out += '  - ' + t.text(d.statement) + '\n';
  }
  return out + RULE + '\n';
}

export function renderLogEvents(events: ReadonlyArray<LogEvent>): string {
  if (events.length === 0) {
    return '  ' + t.dim('(no resolutions logged)');
  }
  return events.map((e) => {
    const outcome = stringField(e, 'outcome');
    const applied = e.fields['applied_documents'];
    const documents = Array.isArray(applied) ? applied.filter((d) => typeof d === 'string').join(', ') : '';
    return (
      '  ' + t.dim(e.timestamp ?? '') +
      '  ' + outcomeColor(outcome)(outcome.padEnd(10)) +
      '  ' + t.white(stringField(e, 'identifier')) +
      (documents !== '' ? '  ' + t.muted(documents) : '')
    );
  }).join('\n');
}

function stringField(e: LogEvent, key: string): string {
  const value = e.fields[key];
  return typeof value === 'string' ? value : '';
}

function firstLine(text: string): string {
  const [head = '', ...rest] = text.split('\n');
  return rest.length > 0 ? `${head} …` : head;
}
