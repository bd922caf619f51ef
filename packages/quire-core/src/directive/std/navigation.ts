/**
 * Navigation directives: navigationTree, breadcrumb and toc
 *
 * All of them run in the resolve phase, when the structure of every
 * document (sections, titles) is final.
 *
 *   @:navigationTree {
 *     entries = [
 *       { target = "/", excludeRoot = true, depth = 2 },
 *       { title = "Project", entries = [{ title = "Issues", target = "https://example.com/issues" }] }
 *     ]
 *   }
 */

import { z } from 'zod';
import { BlockSequence, Paragraph } from '../../ast/blocks.js';
import { Options } from '../../ast/element.js';
import type { Block, TemplateSpan } from '../../ast/element.js';
import { NavigationItem, NavigationLink, NavigationList } from '../../ast/navigation.js';
import { navigationContext, navigationItemFor, sectionNavigationItems } from '../../ast/navigation-builder.js';
import { Path, parseVirtualPath } from '../../ast/path.js';
import { SpanSequence, Text } from '../../ast/spans.js';
import { ExternalTarget, isExternalUrl } from '../../ast/targets.js';
import { TemplateElement } from '../../ast/templates.js';
import { ConfigDecoders } from '../../config/decoders.js';
import { collectResults, err, ok } from '../../result.js';
import type { Result } from '../../result.js';
import type { DocumentCursor, TreeCursor } from '../../rewrite/cursor.js';
import { Blocks, Templates, allAttributes, cursor, map2, map3, namedOpt } from '../api.js';
import type { Directive, DirectiveAttributes } from '../api.js';

export interface NavigationNodeConfig {
  readonly title?: string;
  readonly target?: string;
  readonly depth?: number;
  readonly excludeRoot?: boolean;
  readonly excludeSections?: boolean;
  readonly entries: NavigationNodeConfig[];
}

const NavigationNode: z.ZodType<NavigationNodeConfig, z.ZodTypeDef, unknown> = z.lazy(() => z.object({
  title: z.string().optional(),
  target: z.string().optional(),
  depth: z.number().int().positive().optional(),
  excludeRoot: z.boolean().optional(),
  excludeSections: z.boolean().optional(),
  entries: z.array(NavigationNode).default([])
}));

export const NavigationBuilderConfig = z.object({
  entries: z.array(NavigationNode).default([]),
  defaultDepth: z.number().int().positive().default(Number.MAX_SAFE_INTEGER),
  itemStyles: z.array(z.string()).default([]),
  excludeRoot: z.boolean().default(false),
  excludeSections: z.boolean().default(false),
  excludeSelf: z.boolean().default(false)
});

export type NavigationBuilderConfig = z.infer<typeof NavigationBuilderConfig>;

type ItemsResult = Result<NavigationItem[], string[]>;

function flatten(results: readonly ItemsResult[]): ItemsResult {
  const collected = collectResults(results);
  return collected.ok ? ok(collected.value.flat()) : err(collected.error.flat());
}

function manualNode(
  node: NavigationNodeConfig,
  config: NavigationBuilderConfig,
  docCursor: DocumentCursor,
  currentLevel: number
): ItemsResult {
  if (node.title === undefined) return err(['manual navigation entries need a title']);
  const title = SpanSequence.text(node.title);
  const link = node.target !== undefined ? new NavigationLink(new ExternalTarget(node.target)) : undefined;
  if (currentLevel >= config.defaultDepth) {
    return ok(link ? [new NavigationItem(title, [], link)] : []);
  }
  const children = flatten(node.entries.map(child => generate(child, config, docCursor, currentLevel + 1)));
  if (!children.ok) return children;
  return ok([new NavigationItem(title, children.value, link, undefined, Options.styles(`level${currentLevel}`))]);
}

function generatedNode(
  node: NavigationNodeConfig,
  target: string,
  config: NavigationBuilderConfig,
  docCursor: DocumentCursor,
  currentLevel: number
): ItemsResult {
  const parsed = parseVirtualPath(target);
  const path = parsed instanceof Path ? parsed : docCursor.path.parent.resolve(parsed);
  const tree = docCursor.root.target.tree;
  const content = tree.selectDocument(path.relative) ?? tree.selectSubtree(path.relative);
  if (!content) return err([`Unable to resolve document or tree with path: ${target}`]);

  const excludeRoot = node.excludeRoot ?? config.excludeRoot;
  const context = navigationContext({
    refPath: docCursor.path,
    itemStyles: config.itemStyles,
    maxLevels: node.depth ?? config.defaultDepth,
    currentLevel: excludeRoot ? currentLevel - 1 : currentLevel,
    excludeSections: node.excludeSections ?? config.excludeSections,
    excludeSelf: config.excludeSelf
  });
  const item = navigationItemFor(content, context);
  if (excludeRoot) return ok([...item.content]);
  return ok([node.title === undefined ? item : item.withTitle(SpanSequence.text(node.title))]);
}

function generate(
  node: NavigationNodeConfig,
  config: NavigationBuilderConfig,
  docCursor: DocumentCursor,
  currentLevel: number
): ItemsResult {
  return node.target === undefined || isExternalUrl(node.target)
    ? manualNode(node, config, docCursor, currentLevel)
    : generatedNode(node, node.target, config, docCursor, currentLevel);
}

export function buildNavigation(config: NavigationBuilderConfig, docCursor: DocumentCursor): Result<NavigationList, string> {
  const items = flatten(config.entries.map(entry => generate(entry, config, docCursor, 1)));
  return items.ok
    ? ok(new NavigationList(items.value))
    : err(`One or more errors generating navigation: ${items.error.join(',')}`);
}

function decodeConfig(attributes: DirectiveAttributes): Result<NavigationBuilderConfig, string> {
  const decoded = NavigationBuilderConfig.safeParse(attributes.named);
  if (decoded.success) return ok(decoded.data);
  return err(decoded.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; '));
}

function evalNavigation(attributes: DirectiveAttributes, docCursor: DocumentCursor): Result<NavigationList, string> {
  const config = decodeConfig(attributes);
  return config.ok ? buildNavigation(config.value, docCursor) : config;
}

export const blockNavigationTree: Directive<Block> = Blocks.evaluate(
  'navigationTree',
  map2(allAttributes(), cursor(), evalNavigation),
  { phase: 'resolve' }
);

export const templateNavigationTree: Directive<TemplateSpan> = Templates.evaluate(
  'navigationTree',
  map2(allAttributes(), cursor(), (attributes, docCursor): Result<TemplateSpan, string> => {
    const list = evalNavigation(attributes, docCursor);
    return list.ok ? ok(new TemplateElement(list.value)) : list;
  }),
  { phase: 'resolve' }
);

/**
 * The trees from the root down to the tree of the document, followed by
 * the document itself unless it is the title document of its tree
 */
function breadcrumb(docCursor: DocumentCursor, itemStyles: readonly string[]): NavigationList {
  const trees: TreeCursor[] = [];
  for (let tree: TreeCursor | undefined = docCursor.parent; tree; tree = tree.parent) trees.unshift(tree);
  const context = navigationContext({ refPath: docCursor.path, itemStyles, maxLevels: 1 });
  const treeItems = trees.map((tree, index) =>
    navigationItemFor(tree.target, { ...context, currentLevel: index + 1 })
  );
  const isTitle = docCursor.parent.target.titleDocument?.path.equals(docCursor.path) ?? false;
  const docItem = isTitle
    ? []
    : [navigationItemFor(docCursor.target, { ...context, currentLevel: trees.length + 1 })];
  return new NavigationList([...treeItems, ...docItem], Options.styles('breadcrumb'));
}

const breadcrumbPart = map2(
  namedOpt('itemStyles', ConfigDecoders.stringList),
  cursor(),
  (itemStyles, docCursor) => breadcrumb(docCursor, itemStyles ?? [])
);

export const blockBreadcrumb: Directive<Block> = Blocks.create('breadcrumb', breadcrumbPart, { phase: 'resolve' });

export const templateBreadcrumb: Directive<TemplateSpan> = Templates.create(
  'breadcrumb',
  breadcrumbPart.map(list => new TemplateElement(list)),
  { phase: 'resolve' }
);

/**
 * `@:toc { title = Contents, depth = 2 }` lists the sections of the current document.
 * The heading is a styled paragraph, so it never becomes the title of the document.
 */
function toc(title: string | undefined, depth: number | undefined, docCursor: DocumentCursor): Block {
  const context = navigationContext({ refPath: docCursor.path, maxLevels: depth ?? Number.MAX_SAFE_INTEGER });
  const list = new NavigationList(sectionNavigationItems(docCursor.target, context));
  const heading = title === undefined ? [] : [new Paragraph([new Text(title)], Options.styles('toc', 'title'))];
  return new BlockSequence([...heading, list], Options.styles('toc'));
}

const tocPart = map3(
  namedOpt('title', ConfigDecoders.string),
  namedOpt('depth', ConfigDecoders.int),
  cursor(),
  toc
);

export const blockToc: Directive<Block> = Blocks.create('toc', tocPart, { phase: 'resolve' });

export const templateToc: Directive<TemplateSpan> = Templates.create(
  'toc',
  tocPart.map(block => new TemplateElement(block)),
  { phase: 'resolve' }
);
