/**
 * Reference Resolver
 *
 * Resolves dotted references like `cursor.currentDocument.title` or
 * `_.name` against a chain of scopes:
 *
 *   directive scope (for loops) -> document -> tree -> parent tree -> ... -> root tree
 *
 * Only the first segment of a key is looked up in a scope. If a scope knows
 * the first segment, the remaining segments are navigated inside the value
 * found there and the result is final, even if it is undefined. Otherwise the
 * lookup is delegated to the parent resolver. Values from different scopes
 * are never merged.
 */

import type { Config } from '../config/config.js';
import { Key } from '../config/key.js';
import type { DocumentCursor, TreeCursor } from './cursor.js';
import type { Document } from '../ast/documents.js';
import type { Path } from '../ast/path.js';

/**
 * A single scope. Returns undefined when it does not know the key.
 */
export type ReferenceScope = (head: string) => unknown;

/**
 * Navigate the remaining segments of a key inside a resolved value.
 * Arrays take integer indices, maps take keys, other objects expose their
 * fields and getters. Methods are not exposed.
 */
export function navigate(value: unknown, segments: readonly string[]): unknown {
  let current = value;
  for (const segment of segments) {
    if (current === undefined || current === null) return undefined;
    if (Array.isArray(current)) {
      if (!/^\d+$/.test(segment)) return undefined;
      current = current[Number(segment)];
    } else if (current instanceof Map) {
      current = current.get(segment);
    } else if (typeof current === 'object' && segment in current) {
      const next: unknown = Reflect.get(current, segment);
      if (typeof next === 'function') return undefined;
      current = next;
    } else {
      return undefined;
    }
  }
  return current;
}

export class ReferenceResolver {
  constructor(
    private readonly scope: ReferenceScope,
    readonly parent?: ReferenceResolver
  ) {}

  /**
   * A resolver over the own values of a config instance, ignoring its fallbacks
   */
  static forConfig(config: Config, parent?: ReferenceResolver): ReferenceResolver {
    return new ReferenceResolver(head => config.lookupLocal(head), parent);
  }

  /**
   * The resolver for a tree and all its ancestors
   */
  static forTree(cursor: TreeCursor): ReferenceResolver {
    return ReferenceResolver.forConfig(cursor.target.config, cursor.parent?.resolver);
  }

  /**
   * The resolver for a document: the `cursor` key gives access to the
   * current document and its neighbours, all other keys are looked up
   * in the config of the document and then in the configs of its trees.
   */
  static forDocument(cursor: DocumentCursor): ReferenceResolver {
    const view = cursorView(cursor);
    return new ReferenceResolver(
      head => (head === 'cursor' ? view : cursor.target.config.lookupLocal(head)),
      cursor.parent.resolver
    );
  }

  /**
   * A nested scope, used by directives that bind values (e.g. `_` in for loops)
   */
  child(values: Readonly<Record<string, unknown>>): ReferenceResolver {
    return new ReferenceResolver(
      head => (Object.prototype.hasOwnProperty.call(values, head) ? values[head] : undefined),
      this
    );
  }

  resolve(key: Key | string): unknown {
    const parsed = Key.of(key);
    const [head, ...rest] = parsed.segments;
    if (head === undefined) return undefined;
    const value = this.scope(head);
    if (value !== undefined) return navigate(value, rest);
    return this.parent?.resolve(parsed);
  }
}

interface LinkedDocumentView {
  readonly title: unknown;
  readonly absolutePath: Path;
  readonly relativePath: unknown;
}

function linkedDocument(cursor: DocumentCursor, doc: Document | undefined): LinkedDocumentView | undefined {
  if (!doc) return undefined;
  return {
    title: doc.title,
    absolutePath: doc.path,
    relativePath: doc.path.relativeTo(cursor.path.parent)
  };
}

/**
 * The object behind the `cursor` key. All members are getters so that
 * nothing is computed unless a template references it.
 */
function cursorView(cursor: DocumentCursor) {
  return {
    get currentDocument() {
      const doc = cursor.target;
      return {
        content: doc.content,
        title: doc.title,
        fragments: doc.fragments,
        path: doc.path,
        sections: doc.sections
      };
    },
    get parentDocument() {
      return linkedDocument(cursor, cursor.parent.titleDocument?.target);
    },
    get previousDocument() {
      return linkedDocument(cursor, cursor.previousDocument?.target);
    },
    get nextDocument() {
      return linkedDocument(cursor, cursor.nextDocument?.target);
    },
    get flattenedSiblings() {
      const siblings = cursor.flattenedSiblings;
      return {
        previousDocument: linkedDocument(cursor, siblings.previousDocument?.target),
        nextDocument: linkedDocument(cursor, siblings.nextDocument?.target)
      };
    },
    get root() {
      return { title: cursor.root.tree.target.title };
    }
  };
}
