/**
 * Directive instances
 *
 * The elements a parser inserts for a directive occurrence. Each instance
 * is a resolver that runs in the phase of its directive: resolving it
 * processes the directive with the cursor of the current document.
 * A failing directive turns into an invalid element that carries all error
 * messages and the original source of the directive.
 */

import { InvalidBlock } from '../ast/blocks.js';
import type { Block, Options, Span, TemplateSpan } from '../ast/element.js';
import { BlockResolver, SpanResolver, TemplateSpanResolver } from '../ast/resolvers.js';
import { InvalidSpan } from '../ast/spans.js';
import { TemplateElement } from '../ast/templates.js';
import type { DocumentCursor } from '../rewrite/cursor.js';
import type { RewritePhase } from '../rewrite/phases.js';
import { formatDirectiveErrors } from './api.js';
import type { Directive, DirectiveAttributes, DirectiveBody, DirectiveContext, PartResult } from './api.js';

function runDirective<E extends Block | Span>(
  directive: Directive<E>,
  instance: { attributes: DirectiveAttributes; body?: DirectiveBody; source: string },
  cursor: DocumentCursor,
  phase: RewritePhase
): PartResult<E> {
  const context: DirectiveContext = {
    name: directive.name,
    attributes: instance.attributes,
    body: instance.body,
    cursor,
    source: instance.source,
    phase
  };
  const result = directive.process(context);
  if (process.env.DEBUG_DIRECTIVES) {
    const outcome = result.ok ? result.value.kind : `failed: ${result.error.join(', ')}`;
    console.error(`DEBUG_DIRECTIVES: @:${directive.name} in ${cursor.path} (${phase.name}) -> ${outcome}`);
  }
  return result;
}

export class BlockDirectiveInstance extends BlockResolver {
  readonly kind = 'BlockDirectiveInstance';
  readonly unresolvedMessage: string;

  constructor(
    readonly directive: Directive<Block>,
    readonly attributes: DirectiveAttributes,
    readonly body: DirectiveBody | undefined,
    readonly source: string,
    options?: Options
  ) {
    super(options);
    this.unresolvedMessage = `Unresolved block directive instance with name '${directive.name}'`;
  }

  runsIn(phase: RewritePhase): boolean {
    return phase.name === this.directive.phase;
  }

  resolve(cursor: DocumentCursor, phase: RewritePhase): Block {
    const result = runDirective(this.directive, this, cursor, phase);
    if (!result.ok) return new InvalidBlock(formatDirectiveErrors(this.directive.name, result.error), this.source);
    return result.value.mergeOptions(this.options);
  }
}

export class SpanDirectiveInstance extends SpanResolver {
  readonly kind = 'SpanDirectiveInstance';
  readonly unresolvedMessage: string;

  constructor(
    readonly directive: Directive<Span>,
    readonly attributes: DirectiveAttributes,
    readonly body: DirectiveBody | undefined,
    readonly source: string,
    options?: Options
  ) {
    super(options);
    this.unresolvedMessage = `Unresolved span directive instance with name '${directive.name}'`;
  }

  runsIn(phase: RewritePhase): boolean {
    return phase.name === this.directive.phase;
  }

  resolve(cursor: DocumentCursor, phase: RewritePhase): Span {
    const result = runDirective(this.directive, this, cursor, phase);
    if (!result.ok) return new InvalidSpan(formatDirectiveErrors(this.directive.name, result.error), this.source);
    return result.value.mergeOptions(this.options);
  }
}

export class TemplateDirectiveInstance extends TemplateSpanResolver {
  readonly kind = 'TemplateDirectiveInstance';
  readonly unresolvedMessage: string;

  constructor(
    readonly directive: Directive<TemplateSpan>,
    readonly attributes: DirectiveAttributes,
    readonly body: DirectiveBody | undefined,
    readonly source: string,
    options?: Options
  ) {
    super(options);
    this.unresolvedMessage = `Unresolved template directive instance with name '${directive.name}'`;
  }

  runsIn(phase: RewritePhase): boolean {
    return phase.name === this.directive.phase;
  }

  resolve(cursor: DocumentCursor, phase: RewritePhase): TemplateSpan {
    const result = runDirective(this.directive, this, cursor, phase);
    if (!result.ok) {
      return new TemplateElement(new InvalidSpan(formatDirectiveErrors(this.directive.name, result.error), this.source));
    }
    return result.value.mergeOptions(this.options);
  }
}
