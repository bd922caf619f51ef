/**
 * Template Rewriter
 *
 * Resolves the resolvers of a phase (directives, context references) and
 * applies templates to the documents of a tree after the render phase.
 *
 * Template application runs the template through all three phases against
 * the cursor of the document it gets applied to, so a template can use
 * build phase directives like `for` as well as render phase directives
 * like `linkCSS`.
 */

import { RootElement } from '../ast/blocks.js';
import { TemplateDocument } from '../ast/documents.js';
import type { Document, DocumentTree, DocumentTreeRoot, TreeContent } from '../ast/documents.js';
import { BlockResolver, SpanResolver, TemplateSpanResolver } from '../ast/resolvers.js';
import { EmbeddedRoot, TemplateElement, TemplateRoot } from '../ast/templates.js';
import { ConfigDecoders } from '../config/decoders.js';
import { TemplateNotFound, TreeConfigErrors, ValidationFailed } from '../config/errors.js';
import type { ConfigError, ConfigResult } from '../config/errors.js';
import { collectResults, err, ok } from '../result.js';
import { RootCursor, TreeCursor } from './cursor.js';
import type { DocumentCursor } from './cursor.js';
import type { OutputContext } from './phases.js';
import { RewritePhase } from './phases.js';
import { formatTemplate, templateFormatterRules, unresolvedDetectorRules } from './render-rules.js';
import { Replace, RewriteRules } from './rewrite-rules.js';

/**
 * Rules that replace every resolver running in the specified phase with
 * the result of its resolve method. The result is rewritten again with
 * the rules returned by `recurse` (by default these rules), so resolvers
 * nested in the output of a directive get resolved in the same pass.
 */
export function resolverRules(
  cursor: DocumentCursor,
  phase: RewritePhase,
  recurse?: () => RewriteRules
): RewriteRules {
  const rules: RewriteRules = new RewriteRules({
    blockRules: [
      block => block instanceof BlockResolver && block.runsIn(phase)
        ? Replace(again().rewriteBlock(block.resolve(cursor, phase)))
        : undefined
    ],
    spanRules: [
      span => span instanceof SpanResolver && span.runsIn(phase)
        ? Replace(again().rewriteSpan(span.resolve(cursor, phase)))
        : undefined
    ],
    templateRules: [
      span => span instanceof TemplateSpanResolver && span.runsIn(phase)
        ? Replace(again().rewriteTemplateSpan(span.resolve(cursor, phase)))
        : undefined
    ]
  });
  const again = (): RewriteRules => recurse?.() ?? rules;
  return rules;
}

function templateRulesFor(cursor: DocumentCursor, phase: RewritePhase): RewriteRules {
  const resolvers = resolverRules(cursor, phase);
  return phase.name === 'render'
    ? RewriteRules.concatAll([templateFormatterRules, resolvers, unresolvedDetectorRules])
    : resolvers;
}

function asRootElement(root: TemplateRoot): RootElement {
  const [single, ...rest] = root.content;
  if (single !== undefined && rest.length === 0) {
    if (single instanceof TemplateElement && single.element instanceof RootElement) return single.element;
    if (single instanceof EmbeddedRoot) return new RootElement(single.content);
  }
  return new RootElement([root]);
}

/**
 * Apply the template to the document of the cursor. The cursor must belong
 * to a root cursor with an output context.
 */
export function applyTemplate(cursor: DocumentCursor, template: TemplateDocument): ConfigResult<Document> {
  const context = cursor.root.outputContext;
  if (!context) {
    return err(new ValidationFailed(`No output context for applying template '${template.path}' to '${cursor.path}'`));
  }
  const phases = [RewritePhase.Build, RewritePhase.Resolve, RewritePhase.Render(context)];
  const applied = phases.reduce(
    (root, phase) => root.rewriteChildren(templateRulesFor(cursor, phase)),
    template.content
  );
  if (process.env.DEBUG_TEMPLATE) {
    console.error(`DEBUG_TEMPLATE: applied ${template.path} to ${cursor.path} (${context})`);
  }
  return ok(cursor.target.withContent(asRootElement(formatTemplate(applied))));
}

function findTemplate(tree: TreeCursor | undefined, name: string): TemplateDocument | undefined {
  for (let current = tree; current; current = current.parent) {
    const template = current.target.templates.find(t => t.path.name === name);
    if (template) return template;
  }
  return undefined;
}

/**
 * Select the template for a document:
 * - the template configured with the `template` key, relative to the document
 * - else the nearest template named `default.template.<suffix>`, from the
 *   tree of the document up to the root
 * - else a template that only embeds the document content
 */
export function selectTemplate(cursor: DocumentCursor, suffix: string): ConfigResult<TemplateDocument> {
  const configured = cursor.config.getOpt('template', ConfigDecoders.pathRelativeTo(cursor.path.parent));
  if (!configured.ok) return configured;
  if (configured.value) {
    const path = configured.value;
    const template = cursor.root.tree.target.selectTemplate(path.relative);
    if (process.env.DEBUG_TEMPLATE) {
      console.error(`DEBUG_TEMPLATE: ${cursor.path} uses configured template ${path}`);
    }
    return template ? ok(template) : err(new TemplateNotFound(path));
  }
  const name = `default.template.${suffix}`;
  const found = findTemplate(cursor.parent, name);
  if (process.env.DEBUG_TEMPLATE) {
    console.error(`DEBUG_TEMPLATE: ${cursor.path} uses ${found ? found.path : 'the fallback template'}`);
  }
  return ok(found ?? new TemplateDocument(cursor.root.tree.path.child(name), TemplateRoot.fallback));
}

function applySelectedTemplate(cursor: DocumentCursor, context: OutputContext): ConfigResult<Document> {
  const template = selectTemplate(cursor, context.fileSuffix);
  return template.ok ? applyTemplate(cursor, template.value) : template;
}

function applyToTree(cursor: TreeCursor, context: OutputContext): ConfigResult<DocumentTree> {
  const selected = (doc: DocumentCursor): boolean => doc.target.isTargetedAt(context.formatSelector);
  const title = cursor.titleDocument;
  const titleResult = title && selected(title) ? applySelectedTemplate(title, context) : ok(undefined);
  const children = cursor.children.flatMap((child): ConfigResult<TreeContent>[] => {
    if (child instanceof TreeCursor) return [applyToTree(child, context)];
    return selected(child) ? [applySelectedTemplate(child, context)] : [];
  });
  const content = collectResults(children);
  const errors: ConfigError[] = [
    ...(titleResult.ok ? [] : [titleResult.error]),
    ...(content.ok ? [] : content.error)
  ];
  if (!titleResult.ok || !content.ok) return err(TreeConfigErrors.of(errors));
  return ok(cursor.target.with({ titleDocument: titleResult.value, content: content.value }));
}

/**
 * Apply the selected template to every document of the tree that is
 * rendered for the output format. Other documents are removed from the tree.
 * All failures are collected into a single TreeConfigErrors.
 */
export function applyTemplates(root: DocumentTreeRoot, context: OutputContext): ConfigResult<DocumentTreeRoot> {
  const cursor = new RootCursor(root, context);
  const cover = cursor.coverDocument;
  const coverResult = cover && cover.target.isTargetedAt(context.formatSelector)
    ? applySelectedTemplate(cover, context)
    : ok(undefined);
  const treeResult = applyToTree(cursor.tree, context);
  const errors = [coverResult, treeResult].flatMap(result => (result.ok ? [] : [result.error]));
  if (!coverResult.ok || !treeResult.ok) return err(TreeConfigErrors.of(errors));
  return ok(root.with({ tree: treeResult.value, coverDocument: coverResult.value }));
}
