/**
 * Stratum Kernel — Conflict Resolver
 *
 * Decides whether a group of directives on one topic, from documents with
 * no relation path between them, can stand together.
 *
 * Two such directives are compatible iff their statements are textually
 * identical or either one is an `augment`. The resolver never guesses a
 * winner: an incompatible group is returned as a ConflictReport, and the
 * topic stays out of the effective ruleset until a policy author resolves it.
 */

import type { ConflictReport, EffectiveDirective, ResolvedGroup } from '../types/result.js';

export class ConflictResolver {
  /**
   * Resolve a same-tier group, given in arrival order.
   *
   * @returns ResolvedGroup with the distinct directives (an identical
   *   statement is kept once, at its first occurrence), or a ConflictReport
   *   listing the whole group
   */
  resolve(topic: string, group: ReadonlyArray<EffectiveDirective>): ResolvedGroup | ConflictReport {
    for (let i = 0; i < group.length; i++) {
      for (let j = i + 1; j < group.length; j++) {
        const a = group[i];
        const b = group[j];
        if (a !== undefined && b !== undefined && !this.compatible(a, b)) {
          return { kind: 'conflict', topic, candidates: group };
        }
      }
    }

    const seen = new Set<string>();
    const directives = group.filter((d) => {
      if (seen.has(d.statement)) return false;
      seen.add(d.statement);
      return true;
    });
    return { kind: 'resolved', topic, directives };
  }

  compatible(a: EffectiveDirective, b: EffectiveDirective): boolean {
    return a.statement === b.statement || a.mode === 'augment' || b.mode === 'augment';
  }
}
