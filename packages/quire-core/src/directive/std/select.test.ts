/**
 * Select directive tests - choices, labels and separator limits
 */

import { describe, it, expect } from 'vitest';
import { InvalidBlock, Paragraph, RootElement } from '../../ast/blocks.js';
import { Document, DocumentTree, DocumentTreeRoot } from '../../ast/documents.js';
import { Choice, Selection } from '../../ast/lists.js';
import { Path, Root } from '../../ast/path.js';
import { Text } from '../../ast/spans.js';
import { configOf } from '../../config/config.js';
import type { ConfigObject } from '../../config/config.js';
import { RootCursor } from '../../rewrite/cursor.js';
import type { DocumentCursor } from '../../rewrite/cursor.js';
import { RewritePhase } from '../../rewrite/phases.js';
import type { DirectiveBody, ParsedSeparator } from '../api.js';
import { BlockDirectiveInstance } from '../instances.js';
import { select } from './select.js';

function cursorFor(config: ConfigObject): DocumentCursor {
  const doc = new Document({ path: Path.parse('/install.md'), content: new RootElement([]), config: configOf(config) });
  const [cursor] = new RootCursor(new DocumentTreeRoot({ tree: new DocumentTree({ path: Root, content: [doc] }) })).allDocuments;
  if (!cursor) throw new Error('cursor missing');
  return cursor;
}

function choice(name: string, text: string): ParsedSeparator {
  return {
    name: 'choice',
    attributes: { positional: [name], named: {} },
    content: [new Paragraph([new Text(text)])],
    source: `@:choice(${name})`
  };
}

function run(body: DirectiveBody, config: ConfigObject) {
  return select.process({
    name: 'select',
    attributes: { positional: ['tool'], named: {} },
    body,
    cursor: cursorFor(config),
    source: '@:select(tool)',
    phase: RewritePhase.Build
  });
}

const labels: ConfigObject = {
  selections: { tool: { choices: [{ name: 'npm', label: 'npm' }, { name: 'yarn', label: 'Yarn' }] } }
};

describe('select directive', () => {
  it('should create a selection with the configured labels', () => {
    const result = run({ content: [], separators: [choice('npm', 'npm ci'), choice('yarn', 'yarn install')] }, labels);
    expect(result).toEqual({
      ok: true,
      value: new Selection('tool', [
        new Choice('npm', 'npm', [new Paragraph([new Text('npm ci')])]),
        new Choice('yarn', 'Yarn', [new Paragraph([new Text('yarn install')])])
      ])
    });
  });

  it('should report choices without label', () => {
    const config: ConfigObject = { selections: { tool: { choices: [{ name: 'npm', label: 'npm' }] } } };
    const result = run({ content: [], separators: [choice('npm', 'a'), choice('yarn', 'b')] }, config);
    expect(result).toEqual({ ok: false, error: ["No label defined for choice 'yarn' in selection 'tool'"] });
  });

  it('should require at least one choice', () => {
    expect(run({ content: [], separators: [] }, labels)).toEqual({
      ok: false,
      error: ["too few occurrences of separator directive 'choice': expected min: 1, actual: 0"]
    });
  });

  it('should report unknown separators', () => {
    const other: ParsedSeparator = { ...choice('npm', 'a'), name: 'option' };
    expect(run({ content: [], separators: [choice('npm', 'a'), other] }, labels)).toEqual({
      ok: false,
      error: ["unknown separator directive 'option'"]
    });
  });

  it('should turn a failing instance into an invalid block', () => {
    const instance = new BlockDirectiveInstance(
      select,
      { positional: ['tool'], named: {} },
      { content: [], separators: [] },
      '@:select(tool) @:@'
    );
    expect(instance.resolve(cursorFor(labels), RewritePhase.Build)).toEqual(new InvalidBlock(
      "One or more errors processing directive 'select': "
        + "too few occurrences of separator directive 'choice': expected min: 1, actual: 0",
      '@:select(tool) @:@'
    ));
  });
});
