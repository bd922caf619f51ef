/**
 * Control flow directives for templates
 *
 *   @:for(persons) ${_.name} @:empty no persons @:@
 *   @:if(showToc) ... @:elseIf(showNav) ... @:else ... @:@
 *
 * Both run in the build phase. The body of `for` is resolved once per
 * value, with the value bound to `_` in the reference context.
 */

import type { TemplateSpan } from '../../ast/element.js';
import { TemplateSpanSequence } from '../../ast/templates.js';
import { ConfigDecoders } from '../../config/decoders.js';
import type { DocumentCursor } from '../../rewrite/cursor.js';
import type { RewritePhase } from '../../rewrite/phases.js';
import { resolverRules } from '../../rewrite/template-rewriter.js';
import { Templates, cursor, map2, map3, map4, phase, positional } from '../api.js';
import type { Directive } from '../api.js';

/**
 * Only `true`, "true" and "on" count as true
 */
export function isTruthy(value: unknown): boolean {
  return value === true || value === 'true' || value === 'on';
}

function isEmptyValue(value: unknown): boolean {
  return value === undefined || value === null || value === '' || value === false;
}

function rewriteBody(
  spans: readonly TemplateSpan[],
  docCursor: DocumentCursor,
  currentPhase: RewritePhase
): TemplateSpanSequence {
  return new TemplateSpanSequence(spans).rewriteChildren(resolverRules(docCursor, currentPhase));
}

const emptySeparator = Templates.separator('empty', Templates.body(), { max: 1 });

export const forDirective: Directive<TemplateSpan> = Templates.create('for', map4(
  positional(0, ConfigDecoders.string),
  Templates.separatedBody([emptySeparator]),
  cursor(),
  phase(),
  (ref, multipart, docCursor, currentPhase): TemplateSpan => {
    const forValue = (value: unknown): TemplateSpanSequence =>
      rewriteBody(multipart.mainBody, docCursor.withReferenceContext(value), currentPhase);
    const [emptyBody] = multipart.children;
    const fallback = emptyBody ? rewriteBody(emptyBody, docCursor, currentPhase) : TemplateSpanSequence.empty;

    const value = docCursor.resolveReference(ref);
    if (Array.isArray(value)) {
      return value.length === 0 ? fallback : new TemplateSpanSequence(value.map(forValue));
    }
    return isEmptyValue(value) ? fallback : forValue(value);
  }
));

type IfSeparator =
  | { readonly kind: 'elseIf'; readonly ref: string; readonly body: TemplateSpan[] }
  | { readonly kind: 'else'; readonly body: TemplateSpan[] };

const elseIfSeparator = Templates.separator('elseIf', map2(
  positional(0, ConfigDecoders.string),
  Templates.body(),
  (ref, body): IfSeparator => ({ kind: 'elseIf', ref, body })
));

const elseSeparator = Templates.separator(
  'else',
  Templates.body().map((body): IfSeparator => ({ kind: 'else', body })),
  { max: 1 }
);

export const ifDirective: Directive<TemplateSpan> = Templates.create('if', map3(
  positional(0, ConfigDecoders.string),
  Templates.separatedBody([elseIfSeparator, elseSeparator]),
  cursor(),
  (ref, multipart, docCursor): TemplateSpan => {
    const alternatives = [
      { ref, body: multipart.mainBody },
      ...multipart.children.flatMap(child => (child.kind === 'elseIf' ? [child] : []))
    ];
    const taken = alternatives.find(alternative => isTruthy(docCursor.resolveReference(alternative.ref)));
    if (taken) return new TemplateSpanSequence(taken.body);
    const otherwise = multipart.children.find(child => child.kind === 'else');
    return otherwise ? new TemplateSpanSequence(otherwise.body) : TemplateSpanSequence.empty;
  }
));
