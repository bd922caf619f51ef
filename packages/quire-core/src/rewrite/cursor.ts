/**
 * Cursors
 *
 * A tree of cursors overlays the immutable document tree during a single
 * rewrite pass. Cursors give every document access to its parent trees, its
 * siblings, the root and the accumulated configuration, without elements
 * or documents holding back-references.
 *
 *   RootCursor -> TreeCursor -> (TreeCursor | DocumentCursor)*
 *
 * Child cursors are created lazily and cached, parents are plain references.
 * Cursors are created fresh for each pass and dropped with it.
 */

import { DocumentFragment, RootElement } from '../ast/blocks.js';
import type { Element } from '../ast/element.js';
import { Document } from '../ast/documents.js';
import type { DocumentTree, DocumentTreeRoot, TreeContent } from '../ast/documents.js';
import type { Path } from '../ast/path.js';
import type { InternalTarget, ResolvedInternalTarget } from '../ast/targets.js';
import { TreePosition } from '../ast/tree-position.js';
import type { Config } from '../config/config.js';
import { DocumentConfigErrors, DuplicatePath, TreeConfigErrors } from '../config/errors.js';
import type { ConfigError, ConfigResult } from '../config/errors.js';
import type { Key } from '../config/key.js';
import { collectResults, err, ok } from '../result.js';
import type { Result } from '../result.js';
import { applyNavigationOrder, navigationOrder } from './navigation-order.js';
import type { OutputContext } from './phases.js';
import { ReferenceResolver } from './reference-resolver.js';
import { Remove, RewriteRules } from './rewrite-rules.js';
import { TargetIndex } from './target-index.js';

/**
 * Creates the rules for a single document. Called once per document cursor,
 * so that rules can depend on the position and configuration of the document.
 */
export type RewriteRulesBuilder = (cursor: DocumentCursor) => ConfigResult<RewriteRules>;

export type Cursor = TreeCursor | DocumentCursor;

export class RootCursor {
  private treeCursor?: TreeCursor;
  private coverCursor?: DocumentCursor;
  private index?: TargetIndex;

  constructor(
    readonly target: DocumentTreeRoot,
    readonly outputContext?: OutputContext
  ) {}

  get config(): Config {
    return this.target.config;
  }

  get tree(): TreeCursor {
    this.treeCursor ??= new TreeCursor(this.target.tree, undefined, this, TreePosition.root);
    return this.treeCursor;
  }

  get coverDocument(): DocumentCursor | undefined {
    const cover = this.target.coverDocument;
    if (!cover) return undefined;
    this.coverCursor ??= new DocumentCursor(cover, this.tree, TreePosition.root);
    return this.coverCursor;
  }

  /**
   * All link targets of the tree, in the state before the current pass
   */
  get targetIndex(): TargetIndex {
    this.index ??= new TargetIndex(this.target.allDocuments, this.target.staticDocuments);
    return this.index;
  }

  /**
   * All documents except the cover, in navigation order
   */
  get allDocuments(): DocumentCursor[] {
    return this.tree.allDocuments;
  }

  rewriteTarget(builder: RewriteRulesBuilder): ConfigResult<DocumentTreeRoot> {
    const cover = this.coverDocument;
    const coverResult = cover ? rewriteDocument(cover, builder) : ok(undefined);
    const treeResult = this.tree.rewriteTarget(builder);
    const errors = [coverResult, treeResult].flatMap(result => (result.ok ? [] : [result.error]));
    if (!coverResult.ok || !treeResult.ok) return err(TreeConfigErrors.of(errors));
    return ok(this.target.with({ tree: treeResult.value, coverDocument: coverResult.value }));
  }
}

export class TreeCursor {
  readonly config: Config;
  readonly resolver: ReferenceResolver;
  private childCursors?: Cursor[];
  private titleCursor?: DocumentCursor;

  constructor(
    readonly target: DocumentTree,
    readonly parent: TreeCursor | undefined,
    readonly root: RootCursor,
    readonly position: TreePosition
  ) {
    this.config = parent ? target.config.withFallback(parent.config) : target.config;
    this.resolver = ReferenceResolver.forTree(this);
  }

  get path(): Path {
    return this.target.path;
  }

  /**
   * The title document shares the position of its tree
   */
  get titleDocument(): DocumentCursor | undefined {
    const doc = this.target.titleDocument;
    if (!doc) return undefined;
    this.titleCursor ??= new DocumentCursor(doc, this, this.position);
    return this.titleCursor;
  }

  /**
   * Cursors for the content of this tree, sorted by navigation order.
   * Positions are assigned after sorting.
   */
  get children(): Cursor[] {
    this.childCursors ??= this.sortedContent().map((item, index) => {
      const position = this.position.forChild(index + 1);
      return item instanceof Document
        ? new DocumentCursor(item, this, position)
        : new TreeCursor(item, this, this.root, position);
    });
    return this.childCursors;
  }

  /**
   * All documents of this tree and its subtrees, depth-first in navigation order
   */
  get allDocuments(): DocumentCursor[] {
    const title = this.titleDocument;
    return [
      ...(title ? [title] : []),
      ...this.children.flatMap(child => (child instanceof TreeCursor ? child.allDocuments : [child]))
    ];
  }

  /**
   * Paths shared by more than one document or subtree of this tree level,
   * each reported once
   */
  get duplicatePaths(): Path[] {
    const title = this.target.titleDocument;
    const seen = new Map<string, number>();
    const duplicates: Path[] = [];
    for (const item of [...(title ? [title] : []), ...this.target.content]) {
      const key = item.path.toString();
      const count = (seen.get(key) ?? 0) + 1;
      seen.set(key, count);
      if (count === 2) duplicates.push(item.path);
    }
    return duplicates;
  }

  rewriteTarget(builder: RewriteRulesBuilder): ConfigResult<DocumentTree> {
    const duplicates = this.duplicatePaths.map(path => new DuplicatePath(path));
    const order = navigationOrder(this.target.config);
    const title = this.titleDocument;
    const titleResult = title ? rewriteDocument(title, builder) : ok(undefined);
    const childResults: ConfigResult<TreeContent>[] = this.children.map(child =>
      child instanceof TreeCursor ? child.rewriteTarget(builder) : rewriteDocument(child, builder)
    );
    const content = collectResults(childResults);
    const errors: ConfigError[] = [
      ...duplicates,
      ...(order.ok ? [] : [order.error]),
      ...(titleResult.ok ? [] : [titleResult.error]),
      ...(content.ok ? [] : content.error)
    ];
    if (errors.length > 0 || !titleResult.ok || !content.ok) return err(TreeConfigErrors.of(errors));
    return ok(this.target.with({
      content: content.value,
      titleDocument: titleResult.value,
      position: this.position
    }));
  }

  private sortedContent(): TreeContent[] {
    const order = navigationOrder(this.target.config);
    return applyNavigationOrder(this.target.content, order.ok ? order.value : undefined);
  }
}

function rewriteDocument(cursor: DocumentCursor, builder: RewriteRulesBuilder): ConfigResult<Document> {
  const rules = builder(cursor);
  if (!rules.ok) return err(new DocumentConfigErrors(cursor.path, [rules.error]));
  return cursor.rewriteTarget(rules.value);
}

export interface Siblings {
  readonly previousDocument?: DocumentCursor;
  readonly nextDocument?: DocumentCursor;
}

function siblingsIn(documents: readonly DocumentCursor[], path: Path): Siblings {
  const index = documents.findIndex(doc => doc.path.equals(path));
  if (index < 0) return {};
  return { previousDocument: documents[index - 1], nextDocument: documents[index + 1] };
}

/**
 * Move every DocumentFragment out of the content, at any nesting depth
 */
function extractFragments(root: RootElement): { content: RootElement; fragments: Map<string, Element> } {
  const fragments = new Map<string, Element>();
  const rules = RewriteRules.forBlocks(block => {
    if (!(block instanceof DocumentFragment)) return undefined;
    fragments.set(block.name, block.root);
    return Remove;
  });
  return { content: root.withContent(rules.rewriteBlocks(root.content)), fragments };
}

export class DocumentCursor {
  readonly config: Config;
  readonly resolver: ReferenceResolver;

  constructor(
    readonly target: Document,
    readonly parent: TreeCursor,
    readonly position: TreePosition,
    resolver?: ReferenceResolver
  ) {
    this.config = target.config.withFallback(parent.config);
    this.resolver = resolver ?? ReferenceResolver.forDocument(this);
  }

  get root(): RootCursor {
    return this.parent.root;
  }

  get path(): Path {
    return this.target.path;
  }

  resolveReference(key: Key | string): unknown {
    return this.resolver.resolve(key);
  }

  /**
   * A cursor for the same document with an additional scope binding the
   * value to `_`, used for the bodies of directives like `for`
   */
  withReferenceContext(value: unknown): DocumentCursor {
    return new DocumentCursor(this.target, this.parent, this.position, this.resolver.child({ _: value }));
  }

  get previousDocument(): DocumentCursor | undefined {
    return this.siblings.previousDocument;
  }

  get nextDocument(): DocumentCursor | undefined {
    return this.siblings.nextDocument;
  }

  /**
   * Previous and next document across the whole tree, in navigation order
   */
  get flattenedSiblings(): Siblings {
    return siblingsIn(this.root.allDocuments, this.path);
  }

  validate(target: InternalTarget): Result<ResolvedInternalTarget, string> {
    return this.root.targetIndex.validate(target, this.path);
  }

  /**
   * Apply the rules to the content and the fragments of the document.
   * DocumentFragments produced by the rules get moved to the fragments.
   */
  rewriteTarget(rules: RewriteRules): ConfigResult<Document> {
    const rewritten = rules.rewriteBlock(this.target.content);
    const root = rewritten instanceof RootElement ? rewritten : new RootElement([rewritten]);
    const { content, fragments: extracted } = extractFragments(root);
    const fragments = new Map<string, Element>();
    for (const [name, fragment] of this.target.fragments) {
      fragments.set(name, rules.rewriteElement(fragment));
    }
    for (const [name, fragment] of extracted) {
      fragments.set(name, fragment);
    }
    return ok(this.target.with({ content, fragments, position: this.position }));
  }

  private get siblings(): Siblings {
    const documents = this.parent.children.filter((child): child is DocumentCursor => child instanceof DocumentCursor);
    return siblingsIn(documents, this.path);
  }
}
