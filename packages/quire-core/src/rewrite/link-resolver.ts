/**
 * Link Resolver
 *
 * Resolve phase rules that turn LinkPathReferences into SpanLinks. Internal
 * targets are validated against the target index of the root cursor, so a
 * missing document, a missing id or an id that occurs more than once in the
 * target document is reported inline as an InvalidSpan.
 */

import { Image, InvalidSpan, LinkPathReference, RawLink, SpanLink } from '../ast/spans.js';
import { InternalTarget, parseTarget } from '../ast/targets.js';
import type { Target } from '../ast/targets.js';
import type { Path } from '../ast/path.js';
import type { DocumentCursor } from './cursor.js';
import { Replace, RewriteRules } from './rewrite-rules.js';

function resolveTarget(target: Target, refPath: Path): Target {
  return target instanceof InternalTarget ? target.relativeTo(refPath) : target;
}

export function linkResolverRules(cursor: DocumentCursor): RewriteRules {
  return RewriteRules.forSpans(span => {
    if (span instanceof LinkPathReference) {
      const target = parseTarget(span.path, cursor.path);
      if (!(target instanceof InternalTarget)) {
        return Replace(new SpanLink(span.content, target, span.title, span.options));
      }
      const validated = cursor.validate(target);
      return validated.ok
        ? Replace(new SpanLink(span.content, validated.value, span.title, span.options))
        : Replace(new InvalidSpan(validated.error, span.source, span.options));
    }
    if (span instanceof Image && span.target instanceof InternalTarget) {
      return Replace(new Image(resolveTarget(span.target, cursor.path), span.attributes, span.options));
    }
    if (span instanceof RawLink && span.target instanceof InternalTarget) {
      return Replace(new RawLink(resolveTarget(span.target, cursor.path), span.options));
    }
    return undefined;
  });
}
