/**
 * Shared zod schemas for decoding config values
 */

import { z } from 'zod';
import { Path, RelativePath } from '../ast/path.js';

const absolutePath = z.union([
  z.custom<Path>(value => value instanceof Path, { message: 'Expected a path' }),
  z.string()
    .refine(str => str.startsWith('/'), { message: 'Expected an absolute path starting with /' })
    .transform(str => Path.parse(str))
]);

/**
 * A path relative to some base path. Absolute paths are returned as they are.
 */
function pathRelativeTo(base: Path) {
  return z.union([
    z.custom<Path>(value => value instanceof Path, { message: 'Expected a path' }),
    z.custom<RelativePath>(value => value instanceof RelativePath).transform(rel => base.resolve(rel)),
    z.string().transform(str => (str.startsWith('/') ? Path.parse(str) : base.resolve(RelativePath.parse(str))))
  ]);
}

export const ConfigDecoders = {
  string: z.string(),
  boolean: z.boolean(),
  int: z.number().int(),
  stringList: z.array(z.string()),
  absolutePath,
  pathList: z.array(absolutePath),
  pathRelativeTo
};
