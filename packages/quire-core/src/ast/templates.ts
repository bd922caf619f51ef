/**
 * Template elements
 *
 * A template is a sequence of template spans: literal strings, context
 * references like ${cursor.currentDocument.content} and directives. Applying a
 * template to a document resolves all of them against the document's cursor.
 */

import { Block, Element, Options, Span, TemplateSpan } from './element.js';
import type { RewritableContainer } from './element.js';
import { RootElement } from './blocks.js';
import { InvalidSpan, Text } from './spans.js';
import { SpanResolver, TemplateSpanResolver } from './resolvers.js';
import { Path, RelativePath } from './path.js';
import { Key } from '../config/key.js';
import type { DocumentCursor } from '../rewrite/cursor.js';
import type { RewriteRules } from '../rewrite/rewrite-rules.js';

/**
 * The root element of a template document
 */
export class TemplateRoot extends Block implements RewritableContainer {
  readonly kind = 'TemplateRoot';

  constructor(readonly content: readonly TemplateSpan[], options?: Options) {
    super(options);
  }

  /**
   * The template used when no template is configured: it embeds
   * the content of the document and nothing else
   */
  static get fallback(): TemplateRoot {
    return new TemplateRoot([
      new TemplateContextReference(Key.parse('cursor.currentDocument.content'), true, '${cursor.currentDocument.content}')
    ]);
  }

  withContent(content: readonly TemplateSpan[]): this {
    return this.copy({ content });
  }

  rewriteChildren(rules: RewriteRules): this {
    return this.withContent(rules.rewriteTemplateSpans(this.content));
  }

  override childElements(): readonly Element[] {
    return this.content;
  }
}

export class TemplateString extends TemplateSpan {
  readonly kind = 'TemplateString';

  constructor(readonly content: string, options?: Options) {
    super(options);
  }
}

export class TemplateSpanSequence extends TemplateSpan implements RewritableContainer {
  readonly kind = 'TemplateSpanSequence';
  static readonly empty = new TemplateSpanSequence([]);

  constructor(readonly content: readonly TemplateSpan[], options?: Options) {
    super(options);
  }

  withContent(content: readonly TemplateSpan[]): this {
    return this.copy({ content });
  }

  rewriteChildren(rules: RewriteRules): this {
    return this.withContent(rules.rewriteTemplateSpans(this.content));
  }

  override childElements(): readonly Element[] {
    return this.content;
  }
}

/**
 * Wraps a markup element so that it can appear inside a template
 */
export class TemplateElement extends TemplateSpan implements RewritableContainer {
  readonly kind = 'TemplateElement';

  constructor(readonly element: Element, readonly indent: number = 0, options?: Options) {
    super(options);
  }

  withIndent(indent: number): this {
    return this.copy({ indent });
  }

  rewriteChildren(rules: RewriteRules): this {
    return this.copy({ element: rules.rewriteElement(this.element) });
  }

  override childElements(): readonly Element[] {
    return [this.element];
  }
}

/**
 * The content of a markup document embedded into a template
 */
export class EmbeddedRoot extends TemplateSpan implements RewritableContainer {
  readonly kind = 'EmbeddedRoot';

  constructor(readonly content: readonly Block[], readonly indent: number = 0, options?: Options) {
    super(options);
  }

  withIndent(indent: number): this {
    return this.copy({ indent });
  }

  rewriteChildren(rules: RewriteRules): this {
    return this.copy({ content: rules.rewriteBlocks(this.content) });
  }

  override childElements(): readonly Element[] {
    return this.content;
  }
}

type SimpleValue = string | number | boolean | Path | RelativePath;

function isSimpleValue(value: unknown): value is SimpleValue {
  return typeof value === 'string'
    || typeof value === 'number'
    || typeof value === 'boolean'
    || value instanceof Path
    || value instanceof RelativePath;
}

function renderSimpleValue(value: SimpleValue): string {
  return typeof value === 'object' ? value.toString() : String(value);
}

function missingReference(ref: Key): string {
  return `Missing required reference: '${ref}'`;
}

function unsupportedReference(ref: Key): string {
  return `value with key '${ref}' is a structured value (Array, Object) which is not supported in references`;
}

/**
 * A reference to a value in the context of the current document,
 * written as ${some.key} (required) or ${?some.key} (optional)
 */
export class TemplateContextReference extends TemplateSpanResolver {
  readonly kind = 'TemplateContextReference';
  readonly unresolvedMessage: string;

  constructor(
    readonly ref: Key,
    readonly required: boolean,
    readonly source: string,
    options?: Options
  ) {
    super(options);
    this.unresolvedMessage = `Unresolved template context reference with key '${ref}'`;
  }

  runsIn(): boolean {
    return true;
  }

  resolve(cursor: DocumentCursor): TemplateSpan {
    const value = cursor.resolveReference(this.ref);
    if (value === undefined || value === null) {
      return this.required
        ? new TemplateElement(new InvalidSpan(missingReference(this.ref), this.source))
        : new TemplateString('');
    }
    if (value instanceof TemplateSpan) return value;
    if (value instanceof RootElement) return new EmbeddedRoot(value.content);
    if (value instanceof Element) return new TemplateElement(value);
    if (isSimpleValue(value)) return new TemplateString(renderSimpleValue(value));
    return new TemplateElement(new InvalidSpan(unsupportedReference(this.ref), this.source));
  }
}

/**
 * A reference to a value in the context of the current document,
 * used inside markup instead of templates
 */
export class MarkupContextReference extends SpanResolver {
  readonly kind = 'MarkupContextReference';
  readonly unresolvedMessage: string;

  constructor(
    readonly ref: Key,
    readonly required: boolean,
    readonly source: string,
    options?: Options
  ) {
    super(options);
    this.unresolvedMessage = `Unresolved markup context reference with key '${ref}'`;
  }

  runsIn(): boolean {
    return true;
  }

  resolve(cursor: DocumentCursor): Span {
    const value = cursor.resolveReference(this.ref);
    if (value === undefined || value === null) {
      return this.required ? new InvalidSpan(missingReference(this.ref), this.source) : new Text('');
    }
    if (value instanceof Span) return value;
    if (isSimpleValue(value)) return new Text(renderSimpleValue(value));
    return new InvalidSpan(unsupportedReference(this.ref), this.source);
  }
}
