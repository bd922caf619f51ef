/**
 * Target Index
 *
 * A read-only index of all link targets of a tree: every document path,
 * every static document path and every element id inside each document.
 * Built once per rewrite pass by the root cursor, before any document
 * of the pass gets rewritten.
 */

import { collectElements } from '../ast/element.js';
import type { Document, StaticDocument } from '../ast/documents.js';
import type { Path } from '../ast/path.js';
import type { InternalTarget } from '../ast/targets.js';
import { ResolvedInternalTarget } from '../ast/targets.js';
import { err, ok } from '../result.js';
import type { Result } from '../result.js';

function documentIds(doc: Document): Map<string, number> {
  const counts = new Map<string, number>();
  const roots = [doc.content, ...doc.fragments.values()];
  for (const root of roots) {
    for (const id of collectElements(root, element => element.options.id)) {
      counts.set(id, (counts.get(id) ?? 0) + 1);
    }
  }
  return counts;
}

export class TargetIndex {
  private readonly documents = new Map<string, Map<string, number>>();
  private readonly statics = new Set<string>();

  constructor(documents: readonly Document[], staticDocuments: readonly StaticDocument[] = []) {
    for (const doc of documents) {
      this.documents.set(doc.path.toString(), documentIds(doc));
    }
    for (const doc of staticDocuments) {
      this.statics.add(doc.path.toString());
    }
  }

  hasDocument(path: Path): boolean {
    const key = path.withoutFragment().toString();
    return this.documents.has(key) || this.statics.has(key);
  }

  /**
   * Validate an internal target and resolve it relative to the document
   * containing the link. The error is a message suitable for an InvalidSpan.
   */
  validate(target: InternalTarget, refPath: Path): Result<ResolvedInternalTarget, string> {
    const docPath = target.path.withoutFragment();
    const fragment = target.path.fragment;
    const resolved = target.relativeTo(refPath);
    if (this.statics.has(docPath.toString()) && fragment === undefined) return ok(resolved);
    const ids = this.documents.get(docPath.toString());
    if (!ids) return err(`unresolved internal reference: ${target.path}`);
    if (fragment === undefined) return ok(resolved);
    const count = ids.get(fragment) ?? 0;
    if (count === 0) return err(`unresolved internal reference: ${target.path}`);
    if (count > 1) return err(`More than one link target with id '${fragment}' in path ${docPath}`);
    return ok(resolved);
  }
}
