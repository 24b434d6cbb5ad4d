import { getTextPayload, isTextNode } from '@linewright/contracts';
import { markupToTokens } from '@linewright/html-adapter';
import type { DocumentFetcher } from '@linewright/layout-bridge';
import { fetchMarkup } from '../lib/document.js';

export interface TokenRow {
  index: number;
  depth: number;
  tag: string;
  text?: string;
}

export interface TokensResult {
  url: string;
  tokens: TokenRow[];
}

/**
 * Fetch a document and list its document-order token stream
 */
export async function tokens(url: string, fetcher?: DocumentFetcher): Promise<TokensResult> {
  const markup = await fetchMarkup(url, fetcher);
  const rows = markupToTokens(markup).map((token): TokenRow => {
    const row: TokenRow = { index: token.index, depth: token.depth, tag: token.tag };
    if (isTextNode(token.node)) {
      row.text = getTextPayload(token.node);
    }
    return row;
  });
  return { url, tokens: rows };
}
