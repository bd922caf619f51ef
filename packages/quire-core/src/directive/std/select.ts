/**
 * The select directive
 *
 *   @:select(build-tool)
 *   @:choice(npm)
 *   ...
 *   @:choice(yarn)
 *   ...
 *   @:@
 *
 * Labels for the choices come from the config of the selection:
 *
 *   selections.build-tool.choices = [{ name = npm, label = "npm" }, { name = yarn, label = "Yarn" }]
 */

import { z } from 'zod';
import type { Block } from '../../ast/element.js';
import { Choice, Selection } from '../../ast/lists.js';
import { Key } from '../../config/key.js';
import { ConfigDecoders } from '../../config/decoders.js';
import { err, ok } from '../../result.js';
import type { Result } from '../../result.js';
import { Blocks, cursor, map2, map3, positional } from '../api.js';
import type { Directive } from '../api.js';

const SelectionChoices = z.array(z.object({ name: z.string(), label: z.string() }));

interface ParsedChoice {
  readonly name: string;
  readonly content: Block[];
}

const choiceSeparator = Blocks.separator('choice', map2(
  positional(0, ConfigDecoders.string),
  Blocks.body(),
  (name, content): ParsedChoice => ({ name, content })
), { min: 1 });

export const select: Directive<Block> = Blocks.evaluate('select', map3(
  positional(0, ConfigDecoders.string),
  Blocks.separatedBody([choiceSeparator]),
  cursor(),
  (name, multipart, docCursor): Result<Block, string> => {
    const configured = docCursor.config.get(new Key(['selections', name, 'choices']), SelectionChoices, []);
    if (!configured.ok) return err(configured.error.message);
    const labels = new Map(configured.value.map(choice => [choice.name, choice.label]));

    const choices: Choice[] = [];
    const missing: string[] = [];
    for (const parsed of multipart.children) {
      const label = labels.get(parsed.name);
      if (label === undefined) missing.push(`No label defined for choice '${parsed.name}' in selection '${name}'`);
      else choices.push(new Choice(parsed.name, label, parsed.content));
    }
    return missing.length > 0 ? err(missing.join(', ')) : ok(new Selection(name, choices));
  }
));
