/**
 * Quire Core - the document rewrite engine
 *
 * This is the core library containing:
 * - Virtual paths and the element AST
 * - Rewrite rules, cursors and the reference resolver
 * - Config abstraction with zod decoders
 * - Directive protocol, standard directives and the template parser
 * - Style selectors
 * - Renderer interface (backend abstraction)
 */

export * from './result.js';

// AST
export * from './ast/path.js';
export * from './ast/element.js';
export * from './ast/blocks.js';
export * from './ast/spans.js';
export * from './ast/lists.js';
export * from './ast/navigation.js';
export * from './ast/templates.js';
export * from './ast/targets.js';
export * from './ast/resolvers.js';
export * from './ast/tree-position.js';
export * from './ast/documents.js';
export { navigationContext, navigationItemFor, sectionNavigationItems } from './ast/navigation-builder.js';
export type { NavigationBuilderContext } from './ast/navigation-builder.js';

// Config
export * from './config/key.js';
export * from './config/config.js';
export * from './config/errors.js';
export { ConfigDecoders } from './config/decoders.js';

// Rewriting
export * from './rewrite/rewrite-rules.js';
export * from './rewrite/phases.js';
export { RootCursor, TreeCursor, DocumentCursor } from './rewrite/cursor.js';
export type { Cursor, RewriteRulesBuilder, Siblings } from './rewrite/cursor.js';
export { ReferenceResolver, navigate } from './rewrite/reference-resolver.js';
export type { ReferenceScope } from './rewrite/reference-resolver.js';
export { TargetIndex } from './rewrite/target-index.js';
export { applyNavigationOrder, navigationOrder } from './rewrite/navigation-order.js';
export { IdGenerator, sectionBuilderRules, slug } from './rewrite/section-builder.js';
export { linkResolverRules } from './rewrite/link-resolver.js';
export {
  formatFilterRules,
  navigationFilterRules,
  renderRules,
  templateFormatterRules,
  unresolvedDetectorRules
} from './rewrite/render-rules.js';
export { applyTemplate, applyTemplates, resolverRules, selectTemplate } from './rewrite/template-rewriter.js';
export { defaultRules, processTree, rewriteRulesFor, rewriteTree } from './rewrite/pipeline.js';
export type { ElementFormatter, ProcessOptions } from './rewrite/pipeline.js';

// Directives and templates
export * from './directive/api.js';
export * from './directive/instances.js';
export { DirectiveRegistry } from './directive/registry.js';
export * from './directive/std/index.js';
export { TemplateParser, parseTemplate } from './template/template-parser.js';

// Styles and rendering
export * from './style/selectors.js';
export { renderTree } from './render/renderer.js';
export type { DocumentRenderer, RenderOptions, RenderedDocument } from './render/renderer.js';
