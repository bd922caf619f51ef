/**
 * Navigation order of the children of a tree
 *
 * The `navigationOrder` config key lists child names (documents with suffix,
 * subtrees by directory name). Listed children come first, in the listed
 * order, all others follow in their original order. Without the key the
 * original order is kept.
 */

import type { Config } from '../config/config.js';
import { ConfigDecoders } from '../config/decoders.js';
import type { ConfigResult } from '../config/errors.js';
import type { TreeContent } from '../ast/documents.js';

export function navigationOrder(config: Config): ConfigResult<readonly string[] | undefined> {
  return config.getOpt('navigationOrder', ConfigDecoders.stringList);
}

export function applyNavigationOrder<T extends TreeContent>(
  content: readonly T[],
  order: readonly string[] | undefined
): T[] {
  if (!order || order.length === 0) return [...content];
  const rank = (item: T): number => {
    const index = order.indexOf(item.path.name);
    return index < 0 ? order.length : index;
  };
  // Array.prototype.sort is stable, unlisted items keep their relative order
  return [...content].sort((a, b) => rank(a) - rank(b));
}
