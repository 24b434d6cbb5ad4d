import { toPipelineError } from '@linewright/contracts';
import { fetchDocument, type DocumentFetcher } from '@linewright/layout-bridge';

/** Fetch raw markup, normalizing foreign failures into transport errors. */
export async function fetchMarkup(url: string, fetcher: DocumentFetcher = fetchDocument): Promise<string> {
  try {
    return await fetcher(url);
  } catch (error) {
    throw toPipelineError(error, 'TRANSPORT_ERROR');
  }
}
