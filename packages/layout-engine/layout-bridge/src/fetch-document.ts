import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { PipelineError, toPipelineError } from '@linewright/contracts';

/** Anything that can turn a URL into raw markup. */
export type DocumentFetcher = (url: string) => Promise<string>;

export type FetchDocumentOptions = {
  /** Sent with http(s) requests. */
  userAgent?: string;
  signal?: AbortSignal;
};

export const DEFAULT_USER_AGENT = 'Mozilla/5.0 (compatible; linewright)';

const SUPPORTED_PROTOCOLS = new Set(['http:', 'https:', 'file:']);

function parseUrl(url: string): URL {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new PipelineError('TRANSPORT_ERROR', `URL "${url}" is missing a scheme or is malformed`);
  }
  if (!SUPPORTED_PROTOCOLS.has(parsed.protocol)) {
    throw new PipelineError('TRANSPORT_ERROR', `Unsupported URL scheme "${parsed.protocol.replace(/:$/, '')}"`, {
      url,
    });
  }
  return parsed;
}

async function readLocalFile(parsed: URL): Promise<string> {
  try {
    return await readFile(fileURLToPath(parsed), 'utf8');
  } catch (error) {
    throw toPipelineError(error, 'TRANSPORT_ERROR');
  }
}

async function fetchRemote(parsed: URL, options: FetchDocumentOptions): Promise<string> {
  let response: Response;
  try {
    response = await fetch(parsed, {
      headers: { 'User-Agent': options.userAgent ?? DEFAULT_USER_AGENT },
      signal: options.signal,
    });
  } catch (error) {
    throw toPipelineError(error, 'TRANSPORT_ERROR');
  }
  if (!response.ok) {
    throw new PipelineError('TRANSPORT_ERROR', `Request for ${parsed.href} failed with status ${response.status}`, {
      status: response.status,
    });
  }
  try {
    return await response.text();
  } catch (error) {
    throw toPipelineError(error, 'TRANSPORT_ERROR');
  }
}

/**
 * Retrieve the markup behind `url`.
 *
 * `http:`/`https:` go through the global `fetch`; `file:` reads from disk as
 * UTF-8. Nothing is retried.
 *
 * @throws {PipelineError} TRANSPORT_ERROR for a malformed URL, an unsupported
 *   scheme, a failed request, a non-2xx status or an unreadable file
 */
export async function fetchDocument(url: string, options: FetchDocumentOptions = {}): Promise<string> {
  const parsed = parseUrl(url);
  if (parsed.protocol === 'file:') {
    return readLocalFile(parsed);
  }
  return fetchRemote(parsed, options);
}
