/**
 * Resolvers - placeholder elements that replace themselves during a rewrite phase
 *
 * A resolver is inserted by a parser (or a directive) when the final element
 * depends on information that is only available later: other documents,
 * configuration, the output format. The rewrite pass for the phase the
 * resolver runs in calls resolve() with the cursor of the current document.
 *
 * Resolvers left over after the render phase are replaced by invalid elements
 * carrying their unresolvedMessage.
 */

import { Block, Element, Span, TemplateSpan } from './element.js';
import type { DocumentCursor } from '../rewrite/cursor.js';
import type { RewritePhase } from '../rewrite/phases.js';

export interface Unresolved {
  /** The original source, used as fallback when rendering an error */
  readonly source: string;
  readonly unresolvedMessage: string;
  runsIn(phase: RewritePhase): boolean;
}

export abstract class BlockResolver extends Block implements Unresolved {
  abstract readonly source: string;
  abstract readonly unresolvedMessage: string;
  abstract runsIn(phase: RewritePhase): boolean;
  abstract resolve(cursor: DocumentCursor, phase: RewritePhase): Block;
}

export abstract class SpanResolver extends Span implements Unresolved {
  abstract readonly source: string;
  abstract readonly unresolvedMessage: string;
  abstract runsIn(phase: RewritePhase): boolean;
  abstract resolve(cursor: DocumentCursor, phase: RewritePhase): Span;
}

export abstract class TemplateSpanResolver extends TemplateSpan implements Unresolved {
  abstract readonly source: string;
  abstract readonly unresolvedMessage: string;
  abstract runsIn(phase: RewritePhase): boolean;
  abstract resolve(cursor: DocumentCursor, phase: RewritePhase): TemplateSpan;
}

export function isUnresolved(element: Element): element is Element & Unresolved {
  return element instanceof BlockResolver
    || element instanceof SpanResolver
    || element instanceof TemplateSpanResolver;
}
