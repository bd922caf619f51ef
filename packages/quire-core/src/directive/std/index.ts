/**
 * Standard directives
 */

import { DirectiveRegistry } from '../registry.js';
import { forDirective, ifDirective } from './control-flow.js';
import { linkCSS, linkJS } from './html-head.js';
import {
  blockBreadcrumb,
  blockNavigationTree,
  blockToc,
  templateBreadcrumb,
  templateNavigationTree,
  templateToc
} from './navigation.js';
import { select } from './select.js';
import {
  api,
  attribute,
  blockFragment,
  blockImage,
  blockStyle,
  callout,
  format,
  pageBreak,
  sourceLink,
  spanIcon,
  spanImage,
  spanStyle,
  target,
  templateFragment,
  templateIcon
} from './standard.js';

export { isTruthy } from './control-flow.js';
export { buildNavigation, NavigationBuilderConfig } from './navigation.js';
export type { NavigationNodeConfig } from './navigation.js';

/**
 * A registry with all standard directives
 */
export function standardDirectives(): DirectiveRegistry {
  return DirectiveRegistry.of({
    blocks: [
      blockNavigationTree,
      blockBreadcrumb,
      blockToc,
      blockFragment,
      blockStyle,
      blockImage,
      callout,
      format,
      select,
      pageBreak
    ],
    spans: [spanStyle, spanIcon, spanImage, api, sourceLink],
    templates: [
      forDirective,
      ifDirective,
      templateNavigationTree,
      templateBreadcrumb,
      templateToc,
      templateFragment,
      templateIcon,
      target,
      attribute,
      linkCSS,
      linkJS
    ]
  });
}
