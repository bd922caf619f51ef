/**
 * Rewrite pipeline
 *
 * Runs the rewrite phases over a document tree:
 *
 *   build -> resolve -> render(output context) -> apply templates
 *
 * For every document and phase the rules are assembled in this order:
 * user rules, the default rules of the phase, the resolvers of the phase
 * and, in the render phase, the detector for leftover resolvers.
 */

import type { DocumentTreeRoot } from '../ast/documents.js';
import type { Element } from '../ast/element.js';
import { ConfigErrors } from '../config/errors.js';
import type { ConfigResult } from '../config/errors.js';
import { collectResults, err, ok } from '../result.js';
import { RootCursor } from './cursor.js';
import type { DocumentCursor, RewriteRulesBuilder } from './cursor.js';
import { linkResolverRules } from './link-resolver.js';
import { RewritePhase, phaseLabel } from './phases.js';
import type { OutputContext } from './phases.js';
import { renderRules, unresolvedDetectorRules } from './render-rules.js';
import { RewriteRules } from './rewrite-rules.js';
import { sectionBuilderRules } from './section-builder.js';
import { applyTemplates, resolverRules } from './template-rewriter.js';

/**
 * Turns an element into text for debug output. Supplied by a backend,
 * the core has no rendering of its own.
 */
export type ElementFormatter = (element: Element) => string;

/**
 * The rules every document gets in the specified phase, before its resolvers
 */
export function defaultRules(cursor: DocumentCursor, phase: RewritePhase): ConfigResult<RewriteRules> {
  switch (phase.name) {
    case 'build':
      return sectionBuilderRules(cursor);
    case 'resolve':
      return ok(linkResolverRules(cursor));
    case 'render':
      return ok(renderRules(phase.context));
  }
}

export function rewriteRulesFor(
  cursor: DocumentCursor,
  phase: RewritePhase,
  userRules: readonly RewriteRulesBuilder[] = []
): ConfigResult<RewriteRules> {
  const collected = collectResults([...userRules.map(builder => builder(cursor)), defaultRules(cursor, phase)]);
  if (!collected.ok) {
    const [single, ...others] = collected.error;
    return err(single !== undefined && others.length === 0 ? single : new ConfigErrors(collected.error));
  }
  let rules = RewriteRules.empty;
  const resolvers = resolverRules(cursor, phase, () => rules);
  const detector = phase.name === 'render' ? [unresolvedDetectorRules] : [];
  rules = RewriteRules.concatAll([...collected.value, resolvers, ...detector]);
  return ok(rules);
}

/**
 * Rewrite all documents of the tree for a single phase
 */
export function rewriteTree(
  root: DocumentTreeRoot,
  phase: RewritePhase,
  userRules: readonly RewriteRulesBuilder[] = []
): ConfigResult<DocumentTreeRoot> {
  const outputContext = phase.name === 'render' ? phase.context : undefined;
  const cursor = new RootCursor(root, outputContext);
  return cursor.rewriteTarget(docCursor => {
    if (process.env.DEBUG_REWRITE) {
      console.error(`DEBUG_REWRITE: ${docCursor.path} (${phaseLabel(phase)})`);
    }
    return rewriteRulesFor(docCursor, phase, userRules);
  });
}

export interface ProcessOptions {
  readonly outputContext: OutputContext;
  /** Additional rules, applied before the default rules in every phase */
  readonly rules?: readonly RewriteRulesBuilder[];
  /** Prints the processed documents when DEBUG_REWRITE is set */
  readonly formatter?: ElementFormatter;
}

/**
 * Run all phases and apply the templates, returning the tree a renderer consumes
 */
export function processTree(root: DocumentTreeRoot, options: ProcessOptions): ConfigResult<DocumentTreeRoot> {
  const userRules = options.rules ?? [];
  const phases = [RewritePhase.Build, RewritePhase.Resolve, RewritePhase.Render(options.outputContext)];
  let current = root;
  for (const phase of phases) {
    const result = rewriteTree(current, phase, userRules);
    if (!result.ok) return result;
    current = result.value;
  }
  const result = applyTemplates(current, options.outputContext);
  const formatter = options.formatter;
  if (process.env.DEBUG_REWRITE && formatter && result.ok) {
    for (const doc of result.value.allDocuments) {
      console.error(`DEBUG_REWRITE: processed ${doc.path}\n${formatter(doc.content)}`);
    }
  }
  return result;
}
