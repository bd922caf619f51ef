/**
 * Directive registry tests - lookup by kind and merging
 */

import { describe, it, expect } from 'vitest';
import { PageBreak } from '../ast/blocks.js';
import { Blocks, empty } from './api.js';
import { DirectiveRegistry } from './registry.js';
import { standardDirectives } from './std/index.js';
import { blockStyle, callout, spanStyle } from './std/standard.js';

describe('DirectiveRegistry', () => {
  it('should look up directives per element kind', () => {
    const registry = standardDirectives();
    expect(registry.block('callout')).toBe(callout);
    expect(registry.block('style')).toBe(blockStyle);
    expect(registry.span('style')).toBe(spanStyle);
    expect(registry.template('for')?.name).toBe('for');
    expect(registry.span('callout')).toBeUndefined();
  });

  it('should let the merged registry replace directives with the same name', () => {
    const custom = Blocks.create('callout', empty(new PageBreak()));
    const merged = standardDirectives().merge(DirectiveRegistry.of({ blocks: [custom] }));
    expect(merged.block('callout')).toBe(custom);
    expect(merged.block('style')).toBe(blockStyle);
  });

  it('should start empty', () => {
    expect(DirectiveRegistry.empty.block('callout')).toBeUndefined();
  });
});
