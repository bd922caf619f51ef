/**
 * Directive Registry
 *
 * Maps directive names to their definitions, one map per element kind.
 * Parsers look directives up by name, the core itself never dispatches
 * on directive names.
 */

import type { Block, Span, TemplateSpan } from '../ast/element.js';
import type { Directive } from './api.js';

function byName<E extends Block | Span>(directives: readonly Directive<E>[]): Map<string, Directive<E>> {
  return new Map(directives.map(directive => [directive.name, directive]));
}

export class DirectiveRegistry {
  static readonly empty = new DirectiveRegistry(new Map(), new Map(), new Map());

  constructor(
    readonly blocks: ReadonlyMap<string, Directive<Block>>,
    readonly spans: ReadonlyMap<string, Directive<Span>>,
    readonly templates: ReadonlyMap<string, Directive<TemplateSpan>>
  ) {}

  static of(directives: {
    blocks?: readonly Directive<Block>[];
    spans?: readonly Directive<Span>[];
    templates?: readonly Directive<TemplateSpan>[];
  }): DirectiveRegistry {
    return new DirectiveRegistry(
      byName(directives.blocks ?? []),
      byName(directives.spans ?? []),
      byName(directives.templates ?? [])
    );
  }

  block(name: string): Directive<Block> | undefined {
    return this.blocks.get(name);
  }

  span(name: string): Directive<Span> | undefined {
    return this.spans.get(name);
  }

  template(name: string): Directive<TemplateSpan> | undefined {
    return this.templates.get(name);
  }

  /**
   * Combine two registries. Directives of the other registry replace
   * directives of this registry with the same name.
   */
  merge(other: DirectiveRegistry): DirectiveRegistry {
    return new DirectiveRegistry(
      new Map([...this.blocks, ...other.blocks]),
      new Map([...this.spans, ...other.spans]),
      new Map([...this.templates, ...other.templates])
    );
  }
}
