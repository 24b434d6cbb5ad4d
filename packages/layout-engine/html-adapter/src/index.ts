/**
 * @linewright/html-adapter
 *
 * Turns raw HTML into the document tree and token stream the layout engine
 * consumes: normalize → parse (jsdom) → flatten.
 */

import { flattenDocument, type FlatToken } from '@linewright/contracts';
import { normalizeMarkup } from './normalize.js';
import { parseDocument, type ParseOptions } from './parse.js';

export { normalizeMarkup } from './normalize.js';
export { parseDocument, DEFAULT_IGNORED_TAGS, type ParseOptions } from './parse.js';
export { flattenDocument, getNodes, getTextNodes } from '@linewright/contracts';

/** normalize → parse → flatten in one call. */
export function markupToTokens(markup: string, options: ParseOptions = {}): FlatToken[] {
  return flattenDocument(parseDocument(normalizeMarkup(markup), options));
}
