/**
 * Pipeline tests - user rules, phase order and error collection
 */

import { describe, it, expect } from 'vitest';
import { Paragraph, RootElement } from '../ast/blocks.js';
import { Document, DocumentTree, DocumentTreeRoot } from '../ast/documents.js';
import { Path, Root } from '../ast/path.js';
import { Text } from '../ast/spans.js';
import { configOf } from '../config/config.js';
import type { ConfigObject } from '../config/config.js';
import { DocumentConfigErrors, TreeConfigErrors } from '../config/errors.js';
import { ok } from '../result.js';
import { OutputContext, RewritePhase } from './phases.js';
import { processTree, rewriteTree } from './pipeline.js';
import { Replace, RewriteRules } from './rewrite-rules.js';

function rootWith(content: Paragraph[], config: ConfigObject = {}): DocumentTreeRoot {
  const doc = new Document({ path: Path.parse('/doc.md'), content: new RootElement(content), config: configOf(config) });
  return new DocumentTreeRoot({ tree: new DocumentTree({ path: Root, content: [doc] }) });
}

describe('processTree', () => {
  it('should apply user rules and the fallback template', () => {
    const replaceX = RewriteRules.forSpans(span =>
      span instanceof Text && span.content === 'x' ? Replace(new Text('y')) : undefined
    );
    const result = processTree(rootWith([new Paragraph([new Text('x')])]), {
      outputContext: new OutputContext('html'),
      rules: [() => ok(replaceX)]
    });
    const [doc] = result.ok ? result.value.allDocuments : [];
    expect(doc?.content).toEqual(new RootElement([new Paragraph([new Text('y')])]));
  });

  it('should fail for two documents with the same path', () => {
    const doc = new Document({ path: Path.parse('/doc.md'), content: new RootElement([]) });
    const root = new DocumentTreeRoot({ tree: new DocumentTree({ path: Root, content: [doc, doc.with({})] }) });
    const result = processTree(root, { outputContext: new OutputContext('html') });
    expect(result.ok).toBe(false);
    expect(!result.ok && result.error.message)
      .toBe('One or more errors processing the document tree:\n  Duplicate path: /doc.md');
  });

  it('should leave out documents not targeted at the output format', () => {
    const result = processTree(rootWith([], { targetFormats: ['pdf'] }), { outputContext: new OutputContext('html') });
    expect(result.ok && result.value.allDocuments).toEqual([]);
  });
});

describe('rewriteTree', () => {
  it('should report invalid config of a document with its path', () => {
    const result = rewriteTree(rootWith([], { autonumbering: { scope: 'chapters' } }), RewritePhase.Build);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(TreeConfigErrors);
      const [first] = result.error instanceof TreeConfigErrors ? result.error.errors : [];
      expect(first).toBeInstanceOf(DocumentConfigErrors);
      expect(first?.message.startsWith("One or more errors processing document '/doc.md': Error decoding 'autonumbering': scope: "))
        .toBe(true);
    }
  });
});
