/**
 * Block elements - top-level content units
 */

import { Block, Element, Options } from './element.js';
import type { RewritableContainer, Span } from './element.js';
import type { RewriteRules } from '../rewrite/rewrite-rules.js';

/**
 * A block that contains other blocks
 */
export abstract class BlockContainer extends Block implements RewritableContainer {
  abstract readonly content: readonly Block[];

  withContent(content: readonly Block[]): this {
    return this.copy({ content });
  }

  rewriteChildren(rules: RewriteRules): this {
    return this.withContent(rules.rewriteBlocks(this.content));
  }

  override childElements(): readonly Element[] {
    return this.content;
  }
}

/**
 * A block that contains spans
 */
export abstract class TextBlock extends Block implements RewritableContainer {
  abstract readonly content: readonly Span[];

  withContent(content: readonly Span[]): this {
    return this.copy({ content });
  }

  rewriteChildren(rules: RewriteRules): this {
    return this.withContent(rules.rewriteSpans(this.content));
  }

  override childElements(): readonly Element[] {
    return this.content;
  }
}

/**
 * The root of a markup document
 */
export class RootElement extends BlockContainer {
  readonly kind = 'RootElement';

  constructor(readonly content: readonly Block[], options?: Options) {
    super(options);
  }
}

export class BlockSequence extends BlockContainer {
  readonly kind = 'BlockSequence';
  static readonly empty = new BlockSequence([]);

  constructor(readonly content: readonly Block[], options?: Options) {
    super(options);
  }
}

export class Paragraph extends TextBlock {
  readonly kind = 'Paragraph';

  constructor(readonly content: readonly Span[], options?: Options) {
    super(options);
  }
}

export class Header extends TextBlock {
  readonly kind = 'Header';

  constructor(readonly level: number, readonly content: readonly Span[], options?: Options) {
    super(options);
  }
}

/** The title of a document, promoted from its first level-1 header */
export class Title extends TextBlock {
  readonly kind = 'Title';

  constructor(readonly content: readonly Span[], options?: Options) {
    super(options);
  }
}

export class CodeBlock extends TextBlock {
  readonly kind = 'CodeBlock';

  constructor(readonly language: string, readonly content: readonly Span[], options?: Options) {
    super(options);
  }
}

export class LiteralBlock extends Block {
  readonly kind = 'LiteralBlock';

  constructor(readonly content: string, options?: Options) {
    super(options);
  }
}

export class QuotedBlock extends BlockContainer {
  readonly kind = 'QuotedBlock';

  constructor(
    readonly content: readonly Block[],
    readonly attribution: readonly Span[] = [],
    options?: Options
  ) {
    super(options);
  }

  override rewriteChildren(rules: RewriteRules): this {
    return this.copy({
      content: rules.rewriteBlocks(this.content),
      attribution: rules.rewriteSpans(this.attribution)
    });
  }

  override childElements(): readonly Element[] {
    return [...this.content, ...this.attribution];
  }
}

/**
 * A section: a header followed by all blocks up to the next header
 * of the same or a higher level.
 */
export class Section extends BlockContainer {
  readonly kind = 'Section';

  constructor(readonly header: Header, readonly content: readonly Block[], options?: Options) {
    super(options);
  }

  /**
   * The header is rewritten as a single block. If a rule replaces it with
   * anything but a Header, the replacement is prepended to the content and
   * the section keeps an empty header.
   */
  override rewriteChildren(rules: RewriteRules): this {
    const content = rules.rewriteBlocks(this.content);
    const header = rules.rewriteBlock(this.header);
    if (header instanceof Header) {
      return this.copy({ header, content });
    }
    return this.copy({ header: this.header.withContent([]), content: [header, ...content] });
  }

  override childElements(): readonly Element[] {
    return [this.header, ...this.content];
  }
}

export class Rule extends Block {
  readonly kind = 'Rule';

  constructor(options?: Options) {
    super(options);
  }
}

/** Only rendered by page-oriented output formats */
export class PageBreak extends Block {
  readonly kind = 'PageBreak';

  constructor(options?: Options) {
    super(options);
  }
}

export class Figure extends BlockContainer {
  readonly kind = 'Figure';

  constructor(
    readonly image: Span,
    readonly caption: readonly Span[],
    readonly content: readonly Block[],
    options?: Options
  ) {
    super(options);
  }

  override rewriteChildren(rules: RewriteRules): this {
    return this.copy({
      image: rules.rewriteSpan(this.image),
      caption: rules.rewriteSpans(this.caption),
      content: rules.rewriteBlocks(this.content)
    });
  }

  override childElements(): readonly Element[] {
    return [this.image, ...this.caption, ...this.content];
  }
}

/**
 * A block that is only rendered for the specified output formats
 */
export class TargetFormat extends Block implements RewritableContainer {
  readonly kind = 'TargetFormat';

  constructor(readonly formats: readonly string[], readonly element: Block, options?: Options) {
    super(options);
  }

  rewriteChildren(rules: RewriteRules): this {
    return this.copy({ element: rules.rewriteBlock(this.element) });
  }

  override childElements(): readonly Element[] {
    return [this.element];
  }
}

/**
 * A named part of a document that is rendered separately from the main
 * content (e.g. in a sidebar). Extracted from the content after each rewrite.
 */
export class DocumentFragment extends Block implements RewritableContainer {
  readonly kind = 'DocumentFragment';

  constructor(readonly name: string, readonly root: Element, options?: Options) {
    super(options);
  }

  rewriteChildren(rules: RewriteRules): this {
    return this.copy({ root: rules.rewriteElement(this.root) });
  }

  override childElements(): readonly Element[] {
    return [this.root];
  }
}

/**
 * Replaces a block that could not be processed. Carries the error message and
 * the original source as a fallback for renderers.
 */
export class InvalidBlock extends Block {
  readonly kind = 'InvalidBlock';

  constructor(readonly message: string, readonly source: string, options?: Options) {
    super(options);
  }
}
