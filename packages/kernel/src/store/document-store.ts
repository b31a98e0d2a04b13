/**
 * Stratum Kernel — Document Store
 *
 * The DocumentStore is the authoritative, read-only collection of loaded
 * policy documents. Everything else in the engine reads from it.
 *
 * Store invariants:
 * - Load is all-or-nothing: any invalid document aborts construction
 * - Document names are unique
 * - Every relation target names a document in the same load batch
 * - Documents are deep-frozen; the store exposes no mutators
 */

import {
  NotFoundError,
  SchemaError,
  compileDocument,
  deepFreeze,
  type DocumentSource,
  type PolicyDocument,
  type ValidationError,
} from '@stratum/policy-source';

export class DocumentStore {
  private readonly documents: ReadonlyMap<string, PolicyDocument>;

  private constructor(documents: ReadonlyMap<string, PolicyDocument>) {
    this.documents = documents;
  }

  /**
   * Parse and load a batch of document sources.
   *
   * Sources are compiled in the order given; the first malformed source
   * aborts the load with its own SchemaError. Cross-document validation
   * (duplicate names, unknown relation targets) runs once every source parses.
   *
   * @throws {SchemaError} On a malformed document, a duplicate name, or a
   *   relation naming a document absent from the batch
   */
  static load(sources: ReadonlyArray<DocumentSource>): DocumentStore {
    return DocumentStore.fromDocuments(sources.map((s) => compileDocument(s)));
  }

  /**
   * Build a store from already-compiled documents, applying the same
   * cross-document validation as load().
   *
   * @throws {SchemaError} On a duplicate name or an unresolved relation target
   */
  static fromDocuments(documents: ReadonlyArray<PolicyDocument>): DocumentStore {
    const byName = new Map<string, PolicyDocument>();
    for (const doc of documents) {
      const existing = byName.get(doc.name);
      if (existing !== undefined) {
        throw new SchemaError(doc.name, [
          {
            message: `Duplicate document name (also declared by ${existing.origin})`,
            context: 'name',
          },
        ]);
      }
      byName.set(doc.name, deepFreeze(doc));
    }

    for (const doc of [...byName.values()].sort(byDocumentName)) {
      const errors: ValidationError[] = [];
      doc.relations.forEach((relation, i) => {
        if (!byName.has(relation.target)) {
          errors.push({
            message: `${relation.kind} target "${relation.target}" is not a loaded document`,
            context: `relation[${i}]`,
          });
        }
      });
      if (errors.length > 0) {
        throw new SchemaError(doc.name, errors);
      }
    }

    return new DocumentStore(byName);
  }

  /**
   * Retrieve a document by name.
   *
   * @throws {NotFoundError} If no document has that name
   */
  get(name: string): PolicyDocument {
    const doc = this.documents.get(name);
    if (doc === undefined) {
      throw new NotFoundError(name);
    }
    return doc;
  }

  has(name: string): boolean {
    return this.documents.has(name);
  }

  /** All documents, sorted by name. */
  list(): ReadonlyArray<PolicyDocument> {
    return [...this.documents.values()].sort(byDocumentName);
  }

  get size(): number {
    return this.documents.size;
  }
}

/** Code-unit lexicographic order on document names. */
function byDocumentName(a: PolicyDocument, b: PolicyDocument): number {
  return compareNames(a.name, b.name);
}

/** Code-unit lexicographic comparison, independent of the host locale. */
export function compareNames(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
