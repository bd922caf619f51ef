/**
 * Span elements - inline content
 */

import { Element, Options, Span } from './element.js';
import type { RewritableContainer } from './element.js';
import { SpanResolver } from './resolvers.js';
import type { Target } from './targets.js';
import { Key } from '../config/key.js';
import type { DocumentCursor } from '../rewrite/cursor.js';
import type { RewritePhase } from '../rewrite/phases.js';
import type { RewriteRules } from '../rewrite/rewrite-rules.js';

/**
 * A span that contains other spans
 */
export abstract class SpanContainer extends Span implements RewritableContainer {
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

export class Text extends Span {
  readonly kind = 'Text';

  constructor(readonly content: string, options?: Options) {
    super(options);
  }
}

/** Literal text that must not be interpreted further */
export class Literal extends Span {
  readonly kind = 'Literal';

  constructor(readonly content: string, options?: Options) {
    super(options);
  }
}

export class SpanSequence extends SpanContainer {
  readonly kind = 'SpanSequence';
  static readonly empty = new SpanSequence([]);

  constructor(readonly content: readonly Span[], options?: Options) {
    super(options);
  }

  static text(text: string): SpanSequence {
    return new SpanSequence([new Text(text)]);
  }
}

export class Emphasized extends SpanContainer {
  readonly kind = 'Emphasized';

  constructor(readonly content: readonly Span[], options?: Options) {
    super(options);
  }
}

export class Strong extends SpanContainer {
  readonly kind = 'Strong';

  constructor(readonly content: readonly Span[], options?: Options) {
    super(options);
  }
}

export class InlineCode extends SpanContainer {
  readonly kind = 'InlineCode';

  constructor(readonly language: string, readonly content: readonly Span[], options?: Options) {
    super(options);
  }
}

export class SpanLink extends SpanContainer {
  readonly kind = 'SpanLink';

  constructor(
    readonly content: readonly Span[],
    readonly target: Target,
    readonly title?: string,
    options?: Options
  ) {
    super(options);
  }
}

/**
 * A link to a path in the virtual tree that still needs to be validated
 * and resolved. Replaced by a SpanLink or an InvalidSpan in the resolve phase.
 */
export class LinkPathReference extends SpanContainer {
  readonly kind = 'LinkPathReference';

  constructor(
    readonly content: readonly Span[],
    readonly path: string,
    readonly source: string,
    readonly title?: string,
    options?: Options
  ) {
    super(options);
  }
}

/** A link without link text, rendered as the bare URL (e.g. in attributes of HTML head elements) */
export class RawLink extends Span {
  readonly kind = 'RawLink';

  constructor(readonly target: Target, options?: Options) {
    super(options);
  }
}

export interface ImageAttributes {
  readonly width?: string;
  readonly height?: string;
  readonly alt?: string;
  readonly title?: string;
}

export class Image extends Span {
  readonly kind = 'Image';

  constructor(
    readonly target: Target,
    readonly attributes: ImageAttributes = {},
    options?: Options
  ) {
    super(options);
  }
}

export class Icon extends Span {
  readonly kind = 'Icon';

  constructor(readonly key: string, readonly glyph: string, options?: Options) {
    super(options);
  }
}

/**
 * A reference to an icon by key. The glyph is looked up in the
 * `icons` config object when rendering, so that each output format
 * can configure its own icon set.
 */
export class IconReference extends SpanResolver {
  readonly kind = 'IconReference';
  readonly unresolvedMessage: string;

  constructor(readonly key: string, readonly source: string, options?: Options) {
    super(options);
    this.unresolvedMessage = `Unresolved icon reference with key '${key}'`;
  }

  runsIn(phase: RewritePhase): boolean {
    return phase.name === 'render';
  }

  resolve(cursor: DocumentCursor): Span {
    const glyph = cursor.config.lookup(new Key(['icons', this.key]));
    return typeof glyph === 'string'
      ? new Icon(this.key, glyph, this.options)
      : new InvalidSpan(this.unresolvedMessage, this.source, this.options);
  }
}

/**
 * Autonumber of a section, inserted as the first span of a header
 */
export class SectionNumber extends Span {
  readonly kind = 'SectionNumber';

  constructor(readonly position: readonly number[], options?: Options) {
    super(options);
  }

  get content(): string {
    return this.position.join('.') + ' ';
  }
}

/**
 * Replaces a span that could not be processed. Carries the error message and
 * the original source as a fallback for renderers.
 */
export class InvalidSpan extends Span {
  readonly kind = 'InvalidSpan';

  constructor(readonly message: string, readonly source: string, options?: Options) {
    super(options);
  }
}
