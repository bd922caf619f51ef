/**
 * Section Builder
 *
 * Build phase rules that give a document its structure:
 * - every header without an id gets a slug id derived from its text,
 *   unique within the document
 * - the first header, if it is a level 1 header, becomes the document Title
 *   (config `firstHeaderAsTitle`, enabled by default)
 * - the remaining flat list of headers and blocks is nested into Sections
 * - section headers and the title get SectionNumbers according to
 *   `autonumbering.scope` and `autonumbering.depth`
 */

import { z } from 'zod';
import { Header, RootElement, Section, Title } from '../ast/blocks.js';
import type { Block } from '../ast/element.js';
import { collectElements, extractText } from '../ast/element.js';
import { SectionNumber } from '../ast/spans.js';
import type { ConfigResult } from '../config/errors.js';
import { ok } from '../result.js';
import type { DocumentCursor } from './cursor.js';
import { Replace, RewriteRules } from './rewrite-rules.js';

const AutonumberingConfig = z.object({
  scope: z.enum(['documents', 'sections', 'all', 'none']).default('none'),
  depth: z.number().int().positive().optional()
});

export type AutonumberingConfig = z.infer<typeof AutonumberingConfig>;

/**
 * Lowercase the text and collapse everything that is not a letter or digit into single dashes
 */
export function slug(text: string): string {
  const slugged = text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}]+/gu, '-')
    .replace(/^-+|-+$/g, '');
  return slugged === '' ? 'section' : slugged;
}

/**
 * Hands out ids that are unique within one document. The second use
 * of "intro" yields "intro-1", the third "intro-2".
 */
export class IdGenerator {
  private readonly used = new Map<string, number>();

  /**
   * Mark an id set explicitly in the document as taken
   */
  reserve(id: string): void {
    if (!this.used.has(id)) this.used.set(id, 0);
  }

  next(base: string): string {
    const count = this.used.get(base);
    if (count === undefined) {
      this.used.set(base, 0);
      return base;
    }
    let candidate: string;
    let suffix = count;
    do {
      suffix++;
      candidate = `${base}-${suffix}`;
    } while (this.used.has(candidate));
    this.used.set(base, suffix);
    this.used.set(candidate, 0);
    return candidate;
  }
}

class Numbering {
  constructor(
    private readonly config: AutonumberingConfig,
    private readonly documentPosition: readonly number[]
  ) {}

  private get documents(): boolean {
    return this.config.scope === 'documents' || this.config.scope === 'all';
  }

  private get sections(): boolean {
    return this.config.scope === 'sections' || this.config.scope === 'all';
  }

  private withinDepth(numbers: readonly number[]): boolean {
    return this.config.depth === undefined || numbers.length <= this.config.depth;
  }

  title(title: Title): Title {
    const numbers = this.documentPosition;
    if (!this.documents || numbers.length === 0 || !this.withinDepth(numbers)) return title;
    return title.withContent([new SectionNumber(numbers), ...title.content]);
  }

  header(header: Header, sectionPosition: readonly number[]): Header {
    if (!this.sections) return header;
    const numbers = this.documents ? [...this.documentPosition, ...sectionPosition] : sectionPosition;
    if (!this.withinDepth(numbers)) return header;
    return header.withContent([new SectionNumber(numbers), ...header.content]);
  }
}

function nest(blocks: readonly Block[], numbering: Numbering, parentPosition: readonly number[]): Block[] {
  const result: Block[] = [];
  let current: { header: Header; content: Block[] } | undefined;
  let count = 0;

  const close = (): void => {
    if (!current) return;
    count++;
    const position = [...parentPosition, count];
    const header = numbering.header(current.header, position);
    result.push(new Section(header, nest(current.content, numbering, position)));
    current = undefined;
  };

  for (const block of blocks) {
    if (block instanceof Header && (!current || block.level <= current.header.level)) {
      close();
      current = { header: block, content: [] };
    } else if (current) {
      current.content.push(block);
    } else {
      result.push(block);
    }
  }
  close();
  return result;
}

function buildStructure(root: RootElement, firstHeaderAsTitle: boolean, numbering: Numbering): RootElement {
  const headerIndex = root.content.findIndex(block => block instanceof Header);
  const first = root.content[headerIndex];
  if (firstHeaderAsTitle && first instanceof Header && first.level === 1) {
    const title = numbering.title(new Title(first.content, first.options));
    const before = root.content.slice(0, headerIndex);
    const after = root.content.slice(headerIndex + 1);
    return root.withContent([...before, title, ...nest(after, numbering, [])]);
  }
  return root.withContent(nest(root.content, numbering, []));
}

/**
 * Build phase rules for section ids and structure, created per document
 */
export function sectionBuilderRules(cursor: DocumentCursor): ConfigResult<RewriteRules> {
  const autonumbering = cursor.config.get('autonumbering', AutonumberingConfig, { scope: 'none' });
  if (!autonumbering.ok) return autonumbering;
  const firstHeaderAsTitle = cursor.config.get('firstHeaderAsTitle', z.boolean(), true);
  if (!firstHeaderAsTitle.ok) return firstHeaderAsTitle;

  const promoteTitle = firstHeaderAsTitle.value;
  const ids = new IdGenerator();
  collectElements(cursor.target.content, element => element.options.id).forEach(id => ids.reserve(id));
  const numbering = new Numbering(autonumbering.value, cursor.position.coordinates);

  return ok(RewriteRules.forBlocks(
    block => {
      if (!(block instanceof Header) || block.options.id !== undefined) return undefined;
      return Replace(block.withId(ids.next(slug(extractText(block.content)))));
    },
    block => {
      if (!(block instanceof RootElement)) return undefined;
      return Replace(buildStructure(block, promoteTitle, numbering));
    }
  ));
}
