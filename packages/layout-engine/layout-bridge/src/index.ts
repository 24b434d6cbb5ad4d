/**
 * @linewright/layout-bridge
 *
 * Connects the pipeline stages into a document view: fetch → normalize →
 * parse → flatten → layout → viewport → surface.
 */

export { createBrowserSession, type BrowserSession, type BrowserSessionOptions } from './browser-session.js';
export {
  fetchDocument,
  DEFAULT_USER_AGENT,
  type DocumentFetcher,
  type FetchDocumentOptions,
} from './fetch-document.js';
