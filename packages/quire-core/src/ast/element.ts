/**
 * Element AST - base types
 *
 * Every node of a document is an Element. Three roles overlay the hierarchy:
 * - Block: top-level content units (paragraphs, sections, lists)
 * - Span: inline content units (text, links, emphasis)
 * - TemplateSpan: inline units that only occur in templates (a TemplateSpan is also a Span)
 *
 * Some structural elements (table rows, cells, navigation choices) have none of
 * these roles. Elements are immutable, every with* method returns a modified copy.
 */

import type { RewriteRules } from '../rewrite/rewrite-rules.js';

/**
 * An optional id plus a set of style names attached to an element
 */
export class Options {
  static readonly empty = new Options(undefined, new Set());

  constructor(
    readonly id: string | undefined,
    readonly styles: ReadonlySet<string>
  ) {}

  static id(id: string): Options {
    return new Options(id, new Set());
  }

  static styles(...names: string[]): Options {
    return new Options(undefined, new Set(names));
  }

  get isEmpty(): boolean {
    return this.id === undefined && this.styles.size === 0;
  }

  /**
   * Later id wins, style sets are merged
   */
  merge(other: Options): Options {
    if (other.isEmpty) return this;
    if (this.isEmpty) return other;
    return new Options(other.id ?? this.id, new Set([...this.styles, ...other.styles]));
  }
}

export type ElementRole = 'block' | 'span' | 'template' | 'structural';

export abstract class Element {
  /** Type name of the element, used for diagnostics and style selectors */
  abstract readonly kind: string;
  abstract readonly role: ElementRole;
  readonly options: Options;

  protected constructor(options: Options = Options.empty) {
    this.options = options;
  }

  /**
   * Create a shallow copy of this element with the specified fields replaced.
   * Subclasses use this to implement their with* methods.
   */
  protected copy(changes: object): this {
    const copied: this = Object.create(Object.getPrototypeOf(this));
    return Object.assign(copied, this, changes);
  }

  withOptions(options: Options): this {
    return this.copy({ options });
  }

  mergeOptions(options: Options): this {
    return this.withOptions(this.options.merge(options));
  }

  withId(id: string): this {
    return this.withOptions(new Options(id, this.options.styles));
  }

  withStyles(...styles: string[]): this {
    return this.mergeOptions(Options.styles(...styles));
  }

  /**
   * Direct children of this element, in document order
   */
  childElements(): readonly Element[] {
    return [];
  }
}

export abstract class Block extends Element {
  readonly role = 'block' as const;
}

export abstract class Span extends Element {
  readonly role: 'span' | 'template' = 'span';
}

export abstract class TemplateSpan extends Span {
  override readonly role = 'template' as const;
}

/**
 * Elements without a block, span or template role (rows, cells, choices)
 */
export abstract class StructuralElement extends Element {
  readonly role = 'structural' as const;
}

/**
 * A container whose children get rewritten before the container itself
 */
export interface RewritableContainer {
  rewriteChildren(rules: RewriteRules): this;
}

export function isRewritableContainer(element: Element): element is Element & RewritableContainer {
  return 'rewriteChildren' in element && typeof element.rewriteChildren === 'function';
}

export function isBlock(element: Element): element is Block {
  return element instanceof Block;
}

export function isSpan(element: Element): element is Span {
  return element instanceof Span;
}

export function isTemplateSpan(element: Element): element is TemplateSpan {
  return element instanceof TemplateSpan;
}

/**
 * Leaf elements carrying plain text
 */
export interface TextContainer {
  readonly content: string;
}

export function isTextContainer(element: Element): element is Element & TextContainer {
  return 'content' in element && typeof element.content === 'string';
}

/**
 * Visit the element and all its descendants depth-first, collecting
 * every value the function returns
 */
export function collectElements<T>(element: Element, f: (element: Element) => T | undefined): T[] {
  const results: T[] = [];
  const visit = (current: Element): void => {
    const value = f(current);
    if (value !== undefined) results.push(value);
    current.childElements().forEach(visit);
  };
  visit(element);
  return results;
}

/**
 * Concatenate the text of all text containers below the specified elements
 */
export function extractText(elements: readonly Element[]): string {
  return elements
    .map(element => isTextContainer(element) ? element.content : extractText(element.childElements()))
    .join('');
}
