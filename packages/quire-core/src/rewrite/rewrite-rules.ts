/**
 * Rewrite Rules
 *
 * A rule inspects a single element and decides what happens to it:
 * - Retain: keep the element (with its already rewritten children)
 * - Replace: substitute another element, which is not processed again by the same pass
 * - Remove: drop the element from its parent
 *
 * A rule that does not match returns undefined, which counts as Retain.
 *
 * Rules are kept in separate chains for spans, blocks and template spans.
 * Within a chain, the output of a rule is the input of the next one, and a
 * Remove ends the chain. Traversal is bottom-up: the children of a container
 * are rewritten before the rules see the container itself.
 */

import { isRewritableContainer } from '../ast/element.js';
import type { Block, Element, Span, TemplateSpan } from '../ast/element.js';
import { BlockSequence } from '../ast/blocks.js';
import { SpanSequence } from '../ast/spans.js';
import { TemplateSpanSequence } from '../ast/templates.js';

export type RewriteAction<T> =
  | { readonly type: 'retain' }
  | { readonly type: 'remove' }
  | { readonly type: 'replace'; readonly element: T };

export const Retain = { type: 'retain' } as const;
export const Remove = { type: 'remove' } as const;

export function Replace<T>(element: T): RewriteAction<T> {
  return { type: 'replace', element };
}

export type RewriteRule<T> = (element: T) => RewriteAction<T> | undefined;

export interface RewriteRuleSet {
  readonly spanRules?: readonly RewriteRule<Span>[];
  readonly blockRules?: readonly RewriteRule<Block>[];
  readonly templateRules?: readonly RewriteRule<TemplateSpan>[];
}

/**
 * Apply a rule chain to a single element
 */
function applyChain<T>(rules: readonly RewriteRule<T>[], element: T): RewriteAction<T> {
  let action: RewriteAction<T> = Retain;
  for (const rule of rules) {
    if (action.type === 'remove') break;
    const input: T = action.type === 'replace' ? action.element : element;
    const result: RewriteAction<T> = rule(input) ?? Retain;
    if (result.type !== 'retain') action = result;
  }
  return action;
}

export class RewriteRules {
  static readonly empty = new RewriteRules({});

  readonly spanRules: readonly RewriteRule<Span>[];
  readonly blockRules: readonly RewriteRule<Block>[];
  readonly templateRules: readonly RewriteRule<TemplateSpan>[];

  constructor(rules: RewriteRuleSet) {
    this.spanRules = rules.spanRules ?? [];
    this.blockRules = rules.blockRules ?? [];
    this.templateRules = rules.templateRules ?? [];
  }

  static forSpans(...rules: RewriteRule<Span>[]): RewriteRules {
    return new RewriteRules({ spanRules: rules });
  }

  static forBlocks(...rules: RewriteRule<Block>[]): RewriteRules {
    return new RewriteRules({ blockRules: rules });
  }

  static forTemplates(...rules: RewriteRule<TemplateSpan>[]): RewriteRules {
    return new RewriteRules({ templateRules: rules });
  }

  get isEmpty(): boolean {
    return this.spanRules.length === 0 && this.blockRules.length === 0 && this.templateRules.length === 0;
  }

  /**
   * Chain the rules of this instance with the specified rules.
   * Rules of this instance see each element first.
   */
  concat(other: RewriteRules): RewriteRules {
    if (other.isEmpty) return this;
    if (this.isEmpty) return other;
    return new RewriteRules({
      spanRules: [...this.spanRules, ...other.spanRules],
      blockRules: [...this.blockRules, ...other.blockRules],
      templateRules: [...this.templateRules, ...other.templateRules]
    });
  }

  static concatAll(rules: readonly RewriteRules[]): RewriteRules {
    return rules.reduce((acc, next) => acc.concat(next), RewriteRules.empty);
  }

  rewriteBlocks(blocks: readonly Block[]): Block[] {
    return this.rewrite(this.blockRules, blocks);
  }

  rewriteSpans(spans: readonly Span[]): Span[] {
    return this.rewrite(this.spanRules, spans);
  }

  rewriteTemplateSpans(spans: readonly TemplateSpan[]): TemplateSpan[] {
    return this.rewrite(this.templateRules, spans);
  }

  /**
   * Rewrite a single block. A removed block becomes an empty BlockSequence.
   */
  rewriteBlock(block: Block): Block {
    const [first, ...rest] = this.rewriteBlocks([block]);
    if (first !== undefined && rest.length === 0) return first;
    return new BlockSequence(first === undefined ? [] : [first, ...rest]);
  }

  rewriteSpan(span: Span): Span {
    const [first, ...rest] = this.rewriteSpans([span]);
    if (first !== undefined && rest.length === 0) return first;
    return new SpanSequence(first === undefined ? [] : [first, ...rest]);
  }

  rewriteTemplateSpan(span: TemplateSpan): TemplateSpan {
    const [first, ...rest] = this.rewriteTemplateSpans([span]);
    if (first !== undefined && rest.length === 0) return first;
    return new TemplateSpanSequence(first === undefined ? [] : [first, ...rest]);
  }

  /**
   * Rewrite an element of any kind, dispatching on its role:
   * blocks, template spans and spans get their rule chains,
   * other containers only get their children rewritten.
   */
  rewriteElement(element: Element): Element {
    if (isBlockElement(element)) return this.rewriteBlock(element);
    if (isTemplateSpanElement(element)) return this.rewriteTemplateSpan(element);
    if (isSpanElement(element)) return this.rewriteSpan(element);
    if (isRewritableContainer(element)) return element.rewriteChildren(this);
    return element;
  }

  private rewrite<T extends Element>(rules: readonly RewriteRule<T>[], elements: readonly T[]): T[] {
    const result: T[] = [];
    for (const element of elements) {
      const withChildren = isRewritableContainer(element) ? element.rewriteChildren(this) : element;
      const action = rules.length === 0 ? Retain : applyChain(rules, withChildren);
      if (action.type === 'retain') result.push(withChildren);
      else if (action.type === 'replace') result.push(action.element);
    }
    return result;
  }
}

function isBlockElement(element: Element): element is Block {
  return element.role === 'block';
}

function isSpanElement(element: Element): element is Span {
  return element.role === 'span';
}

function isTemplateSpanElement(element: Element): element is TemplateSpan {
  return element.role === 'template';
}
