/**
 * Documents and document trees
 *
 * Documents are created by parsers and rewritten (never mutated) by the
 * rewrite phases. A DocumentTree mirrors the virtual directory structure,
 * the DocumentTreeRoot adds what applies to the tree as a whole.
 */

import type { Element } from './element.js';
import { collectElements } from './element.js';
import { RootElement, Section, Title } from './blocks.js';
import { SpanSequence } from './spans.js';
import type { TemplateRoot } from './templates.js';
import { RelativePath } from './path.js';
import type { Path } from './path.js';
import { TreePosition } from './tree-position.js';
import { ObjectConfig } from '../config/config.js';
import type { Config } from '../config/config.js';
import type { StyleDeclarationSet } from '../style/selectors.js';

/**
 * Outline entry for a section of a document
 */
export interface SectionInfo {
  readonly id: string;
  readonly title: SpanSequence;
  readonly content: readonly SectionInfo[];
}

function extractSections(blocks: readonly Element[]): SectionInfo[] {
  return blocks.flatMap(block => {
    if (!(block instanceof Section)) return [];
    const id = block.header.options.id;
    const children = extractSections(block.content);
    if (id === undefined) return children;
    return [{ id, title: new SpanSequence(block.header.content), content: children }];
  });
}

function configuredTitle(config: Config): SpanSequence | undefined {
  const title = config.lookup('title');
  return typeof title === 'string' ? SpanSequence.text(title) : undefined;
}

export interface DocumentInit {
  readonly path: Path;
  readonly content: RootElement;
  readonly fragments?: ReadonlyMap<string, Element>;
  readonly config?: Config;
  readonly position?: TreePosition;
}

export class Document {
  readonly path: Path;
  readonly content: RootElement;
  readonly fragments: ReadonlyMap<string, Element>;
  readonly config: Config;
  readonly position: TreePosition;

  constructor(init: DocumentInit) {
    this.path = init.path;
    this.content = init.content;
    this.fragments = init.fragments ?? new Map();
    this.config = init.config ?? ObjectConfig.empty;
    this.position = init.position ?? TreePosition.root;
  }

  /**
   * The title from the `title` config key, or else the first Title element
   */
  get title(): SpanSequence | undefined {
    const fromConfig = configuredTitle(this.config);
    if (fromConfig) return fromConfig;
    const [title] = collectElements(this.content, element => element instanceof Title ? element : undefined);
    return title ? new SpanSequence(title.content) : undefined;
  }

  get sections(): SectionInfo[] {
    return extractSections(this.content.content);
  }

  /**
   * The output formats this document is rendered for, undefined means all formats
   */
  get targetFormats(): readonly string[] | undefined {
    const formats = this.config.lookup('targetFormats');
    if (!Array.isArray(formats)) return undefined;
    return formats.filter((format): format is string => typeof format === 'string');
  }

  isTargetedAt(format: string): boolean {
    const formats = this.targetFormats;
    return formats === undefined || formats.includes(format);
  }

  with(changes: Partial<DocumentInit>): Document {
    return new Document({ ...this.init, ...changes });
  }

  withContent(content: RootElement): Document {
    return this.with({ content });
  }

  private get init(): DocumentInit {
    return {
      path: this.path,
      content: this.content,
      fragments: this.fragments,
      config: this.config,
      position: this.position
    };
  }
}

export class TemplateDocument {
  readonly config: Config;

  constructor(readonly path: Path, readonly content: TemplateRoot, config?: Config) {
    this.config = config ?? ObjectConfig.empty;
  }
}

/**
 * A document that gets copied to the output unchanged (CSS, JavaScript, images)
 */
export class StaticDocument {
  constructor(readonly path: Path, readonly formats: readonly string[] = []) {}
}

export type TreeContent = Document | DocumentTree;

export interface DocumentTreeInit {
  readonly path: Path;
  readonly content?: readonly TreeContent[];
  readonly titleDocument?: Document;
  readonly templates?: readonly TemplateDocument[];
  readonly config?: Config;
  readonly position?: TreePosition;
}

export class DocumentTree {
  readonly path: Path;
  readonly content: readonly TreeContent[];
  readonly titleDocument?: Document;
  readonly templates: readonly TemplateDocument[];
  readonly config: Config;
  readonly position: TreePosition;

  constructor(init: DocumentTreeInit) {
    this.path = init.path;
    this.content = init.content ?? [];
    this.titleDocument = init.titleDocument;
    this.templates = init.templates ?? [];
    this.config = init.config ?? ObjectConfig.empty;
    this.position = init.position ?? TreePosition.root;
  }

  get name(): string {
    return this.path.name;
  }

  /**
   * The title from the `title` config key, or else the title of the title document
   */
  get title(): SpanSequence | undefined {
    return configuredTitle(this.config) ?? this.titleDocument?.title;
  }

  get documents(): Document[] {
    return this.content.filter((item): item is Document => item instanceof Document);
  }

  get subtrees(): DocumentTree[] {
    return this.content.filter((item): item is DocumentTree => item instanceof DocumentTree);
  }

  /**
   * All documents of this tree and its subtrees, depth-first
   */
  get allDocuments(): Document[] {
    const own = this.titleDocument ? [this.titleDocument] : [];
    return [
      ...own,
      ...this.content.flatMap(item => item instanceof Document ? [item] : item.allDocuments)
    ];
  }

  selectDocument(path: RelativePath | string): Document | undefined {
    const relative = typeof path === 'string' ? RelativePath.parse(path) : path;
    if (relative.parentLevels > 0 || relative.segments.length === 0) return undefined;
    if (relative.segments.length > 1) {
      return this.selectSubtree(relative.parent)?.selectDocument(relative.name);
    }
    const candidates = this.titleDocument ? [this.titleDocument, ...this.documents] : this.documents;
    return candidates.find(doc => doc.path.name === relative.name);
  }

  selectSubtree(path: RelativePath | string): DocumentTree | undefined {
    const relative = typeof path === 'string' ? RelativePath.parse(path) : path;
    if (relative.parentLevels > 0) return undefined;
    if (relative.segments.length === 0) return this;
    const [first, ...rest] = relative.segments;
    const subtree = this.subtrees.find(tree => tree.name === first);
    return subtree?.selectSubtree(RelativePath.of(rest));
  }

  selectTemplate(path: RelativePath | string): TemplateDocument | undefined {
    const relative = typeof path === 'string' ? RelativePath.parse(path) : path;
    if (relative.parentLevels > 0 || relative.segments.length === 0) return undefined;
    if (relative.segments.length > 1) {
      return this.selectSubtree(relative.parent)?.selectTemplate(relative.name);
    }
    return this.templates.find(template => template.path.name === relative.name);
  }

  with(changes: Partial<DocumentTreeInit>): DocumentTree {
    return new DocumentTree({
      path: this.path,
      content: this.content,
      titleDocument: this.titleDocument,
      templates: this.templates,
      config: this.config,
      position: this.position,
      ...changes
    });
  }
}

export interface DocumentTreeRootInit {
  readonly tree: DocumentTree;
  readonly coverDocument?: Document;
  readonly staticDocuments?: readonly StaticDocument[];
  readonly styles?: ReadonlyMap<string, StyleDeclarationSet>;
}

export class DocumentTreeRoot {
  readonly tree: DocumentTree;
  readonly coverDocument?: Document;
  readonly staticDocuments: readonly StaticDocument[];
  /** Style declarations per output format */
  readonly styles: ReadonlyMap<string, StyleDeclarationSet>;

  constructor(init: DocumentTreeRootInit) {
    this.tree = init.tree;
    this.coverDocument = init.coverDocument;
    this.staticDocuments = init.staticDocuments ?? [];
    this.styles = init.styles ?? new Map();
  }

  get config(): Config {
    return this.tree.config;
  }

  get allDocuments(): Document[] {
    return this.coverDocument ? [this.coverDocument, ...this.tree.allDocuments] : this.tree.allDocuments;
  }

  with(changes: Partial<DocumentTreeRootInit>): DocumentTreeRoot {
    return new DocumentTreeRoot({
      tree: this.tree,
      coverDocument: this.coverDocument,
      staticDocuments: this.staticDocuments,
      styles: this.styles,
      ...changes
    });
  }

  withTree(tree: DocumentTree): DocumentTreeRoot {
    return this.with({ tree });
  }
}
