/**
 * Standard directives for styling, fragments, images and links
 */

import { z } from 'zod';
import { BlockSequence, DocumentFragment, PageBreak, Paragraph, TargetFormat } from '../../ast/blocks.js';
import { Options } from '../../ast/element.js';
import type { Block, Span, TemplateSpan } from '../../ast/element.js';
import { Path, RelativePath } from '../../ast/path.js';
import { IconReference, Image, RawLink, SpanLink, SpanSequence, Text } from '../../ast/spans.js';
import type { ImageAttributes } from '../../ast/spans.js';
import { ExternalTarget, parseTarget } from '../../ast/targets.js';
import { TemplateElement, TemplateSpanSequence, TemplateString } from '../../ast/templates.js';
import { ConfigDecoders } from '../../config/decoders.js';
import { err, ok } from '../../result.js';
import type { Result } from '../../result.js';
import type { DocumentCursor } from '../../rewrite/cursor.js';
import {
  Blocks,
  Spans,
  Templates,
  allPositional,
  cursor,
  empty,
  map2,
  map3,
  namedOpt,
  positional,
  positionalOpt,
  source
} from '../api.js';
import type { Directive } from '../api.js';

function asBlock(blocks: readonly Block[], options: Options = Options.empty): Block {
  const [single, ...rest] = blocks;
  if (single !== undefined && rest.length === 0) return single.mergeOptions(options);
  return new BlockSequence(blocks, options);
}

function asSpan(spans: readonly Span[], options: Options = Options.empty): Span {
  const [single, ...rest] = spans;
  if (single !== undefined && rest.length === 0) return single.mergeOptions(options);
  return new SpanSequence(spans, options);
}

/**
 * `@:callout(warning) ... @:@`, the style defaults to info
 */
export const callout: Directive<Block> = Blocks.create('callout', map2(
  positionalOpt(0, ConfigDecoders.string),
  Blocks.body(),
  (style, body) => new BlockSequence(body, Options.styles('callout', style ?? 'info'))
));

/**
 * `@:format(html, epub) ... @:@` renders the body only for the listed formats
 */
export const format: Directive<Block> = Blocks.evaluate('format', map2(
  allPositional(ConfigDecoders.string),
  Blocks.body(),
  (formats, body): Result<Block, string> =>
    formats.length === 0 ? err('no formats provided') : ok(new TargetFormat(formats, asBlock(body)))
));

export const blockStyle: Directive<Block> = Blocks.create('style', map2(
  positional(0, ConfigDecoders.string),
  Blocks.body(),
  (style, body) => asBlock(body, Options.styles(style))
));

export const spanStyle: Directive<Span> = Spans.create('style', map2(
  positional(0, ConfigDecoders.string),
  Spans.body(),
  (style, body) => asSpan(body, Options.styles(style))
));

export const spanIcon: Directive<Span> = Spans.create('icon', map2(
  positional(0, ConfigDecoders.string),
  source(),
  (key, src) => new IconReference(key, src)
));

export const templateIcon: Directive<TemplateSpan> = Templates.create('icon', map2(
  positional(0, ConfigDecoders.string),
  source(),
  (key, src) => new TemplateElement(new IconReference(key, src))
));

export const blockFragment: Directive<Block> = Blocks.create('fragment', map2(
  positional(0, ConfigDecoders.string),
  Blocks.body(),
  (name, body) => new DocumentFragment(name, asBlock(body, Options.styles(name)))
));

export const templateFragment: Directive<TemplateSpan> = Templates.create('fragment', map2(
  positional(0, ConfigDecoders.string),
  Templates.body(),
  (name, body) => new TemplateElement(new DocumentFragment(name, new TemplateSpanSequence(body)))
));

export const pageBreak: Directive<Block> = Blocks.create('pageBreak', empty(new PageBreak()));

/**
 * `@:target(../doc.md)` renders the URL of a target, validated and
 * relative to the current document
 */
export const target: Directive<TemplateSpan> = Templates.evaluate('target', map2(
  positional(0, ConfigDecoders.string),
  cursor(),
  (str, docCursor): Result<TemplateSpan, string> => {
    const parsed = parseTarget(str, docCursor.path);
    if (parsed instanceof ExternalTarget) return ok(new TemplateElement(new RawLink(parsed)));
    const resolved = docCursor.validate(parsed);
    return resolved.ok ? ok(new TemplateElement(new RawLink(resolved.value))) : resolved;
  }
), { phase: 'render' });

/**
 * `@:attribute(title, config.key)` renders ` title="value"`, or nothing
 * when the key is missing
 */
export const attribute: Directive<TemplateSpan> = Templates.evaluate('attribute', map3(
  positional(0, ConfigDecoders.string),
  positional(1, ConfigDecoders.string),
  cursor(),
  (name, ref, docCursor): Result<TemplateSpan, string> => {
    const value = docCursor.resolveReference(ref);
    if (value === undefined || value === null) return ok(new TemplateString(''));
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean'
      || value instanceof Path || value instanceof RelativePath) {
      return ok(new TemplateString(` ${name}="${String(value)}"`));
    }
    return err(`value with key '${ref}' is a structured value (Array, Object, AST) which is not supported by this directive`);
  }
));

const imagePart = map2(
  map3(
    positional(0, ConfigDecoders.string),
    namedOpt('width', ConfigDecoders.string),
    namedOpt('height', ConfigDecoders.string),
    (path, width, height) => ({ path, width, height })
  ),
  map3(
    namedOpt('alt', ConfigDecoders.string),
    namedOpt('title', ConfigDecoders.string),
    namedOpt('style', ConfigDecoders.string),
    (alt, title, style) => ({ alt, title, style })
  ),
  (first, second) => ({ ...first, ...second })
).and(cursor()).map(([attrs, docCursor]) => {
  const attributes: ImageAttributes = { width: attrs.width, height: attrs.height, alt: attrs.alt, title: attrs.title };
  const options = attrs.style ? Options.styles(attrs.style) : Options.empty;
  return new Image(parseTarget(attrs.path, docCursor.path), attributes, options);
});

export const spanImage: Directive<Span> = Spans.create('image', imagePart);

export const blockImage: Directive<Block> = Blocks.create(
  'image',
  imagePart.map(image => new Paragraph([image], Options.styles('image-block')))
);

const ApiLinks = z.array(z.object({
  baseUri: z.string(),
  packagePrefix: z.string().default('*'),
  packageSummary: z.string().default('index.html')
}));

const SourceLinks = z.array(z.object({
  baseUri: z.string(),
  suffix: z.string(),
  packagePrefix: z.string().default('*')
}));

/**
 * The entry with the longest matching package prefix, else the entry with prefix `*`
 */
function matchingLink<T extends { packagePrefix: string }>(links: readonly T[], linkId: string): T | undefined {
  const matching = links
    .filter(link => link.packagePrefix !== '*' && linkId.startsWith(link.packagePrefix))
    .sort((a, b) => b.packagePrefix.length - a.packagePrefix.length);
  return matching[0] ?? links.find(link => link.packagePrefix === '*');
}

function splitAtLast(str: string, char: string): [string, string | undefined] {
  const index = str.lastIndexOf(char);
  return index < 0 ? [str, undefined] : [str.slice(0, index), str.slice(index + 1)];
}

function linkConfig<T>(docCursor: DocumentCursor, key: string, schema: z.ZodType<T[], z.ZodTypeDef, unknown>): Result<T[], string> {
  const links = docCursor.config.get(key, schema, []);
  return links.ok ? links : err(links.error.message);
}

/**
 * `@:api(com.example.Parser#parse)` links to API documentation
 */
export const api: Directive<Span> = Spans.evaluate('api', map2(
  positional(0, ConfigDecoders.string),
  cursor(),
  (linkId, docCursor): Result<Span, string> => {
    const links = linkConfig(docCursor, 'links.api', ApiLinks);
    if (!links.ok) return links;
    const link = matchingLink(links.value, linkId);
    if (!link) return err(`No base URI defined for '${linkId}' and no default URI available.`);

    const [fqName, method] = splitAtLast(linkId, '#');
    const [packageName, className] = splitAtLast(fqName, '.');
    const isPackage = className === 'package';
    const typeText = isPackage ? packageName : className ?? fqName;
    const text = typeText + (method === undefined ? '' : '.' + method.split('(')[0]);
    const typePath = isPackage
      ? packageName.replaceAll('.', '/') + '/' + link.packageSummary
      : fqName.replaceAll('.', '/') + '.html';
    const uri = link.baseUri + typePath + (method === undefined ? '' : '#' + method);
    return ok(new SpanLink([new Text(text)], new ExternalTarget(uri)));
  }
));

/**
 * `@:source(com.example.Parser)` links to the source of a type
 */
export const sourceLink: Directive<Span> = Spans.evaluate('source', map2(
  positional(0, ConfigDecoders.string),
  cursor(),
  (linkId, docCursor): Result<Span, string> => {
    const links = linkConfig(docCursor, 'links.source', SourceLinks);
    if (!links.ok) return links;
    const link = matchingLink(links.value, linkId);
    if (!link) return err(`No base URI defined for '${linkId}' and no default URI available.`);
    const [, className] = splitAtLast(linkId, '.');
    const uri = link.baseUri + linkId.replaceAll('.', '/') + '.' + link.suffix;
    return ok(new SpanLink([new Text(className ?? linkId)], new ExternalTarget(uri)));
  }
));
