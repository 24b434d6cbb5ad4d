import { getTextNodes, getTextPayload } from '@linewright/contracts';
import { normalizeMarkup, parseDocument } from '@linewright/html-adapter';
import type { DocumentFetcher } from '@linewright/layout-bridge';
import { fetchMarkup } from '../lib/document.js';

export interface TextResult {
  url: string;
  texts: string[];
}

/**
 * Fetch a document and extract its text leaves in document order
 */
export async function text(url: string, fetcher?: DocumentFetcher): Promise<TextResult> {
  const markup = await fetchMarkup(url, fetcher);
  const root = parseDocument(normalizeMarkup(markup));
  return { url, texts: getTextNodes(root).map(getTextPayload) };
}
