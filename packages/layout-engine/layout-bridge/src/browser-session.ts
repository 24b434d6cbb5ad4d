import {
  resolveViewportConfig,
  toPipelineError,
  type DisplayList,
  type FontProvider,
  type RenderSurface,
  type StyleMode,
  type TextStyle,
  type ViewportConfig,
} from '@linewright/contracts';
import { normalizeMarkup, parseDocument, type ParseOptions } from '@linewright/html-adapter';
import { layoutDocument } from '@linewright/layout-engine';
import { getSharedFontCache } from '@linewright/measuring-dom';
import { Viewport } from '@linewright/painter-dom';
import { fetchDocument as defaultFetchDocument, type DocumentFetcher } from './fetch-document.js';

export type BrowserSessionOptions = {
  surface: RenderSurface;
  viewport?: Partial<ViewportConfig>;
  /** Defaults to {@link defaultFetchDocument}. */
  fetchDocument?: DocumentFetcher;
  /** Defaults to the process-wide font cache. */
  fonts?: FontProvider;
  styleMode?: StyleMode;
  baseStyle?: Readonly<TextStyle>;
  parse?: ParseOptions;
};

export type BrowserSession = {
  readonly config: Readonly<ViewportConfig>;
  /**
   * Fetch, parse and lay out `url`, then draw from the top.
   * Resolves with the new display list, or with the current one when a later
   * load superseded this one while it was fetching.
   */
  load(url: string): Promise<DisplayList>;
  /** Same as {@link load} for markup already in hand. */
  loadMarkup(markup: string): DisplayList;
  onScrollDown(): void;
  scrollBy(delta: number): void;
  /** Redraw the visible band; returns the number of words drawn. */
  draw(): number;
  getDisplayList(): DisplayList;
  getScrollY(): number;
};

const layoutDebugEnabled =
  typeof process !== 'undefined' && typeof process.env !== 'undefined' && Boolean(process.env.LW_DEBUG_LAYOUT);

const layoutLog = (...args: unknown[]): void => {
  if (!layoutDebugEnabled) return;

  console.log(...args);
};

/**
 * A document view: owns the current display list and scroll offset and
 * repaints the surface after every load and scroll.
 *
 * A failed load rethrows as a {@link PipelineError} and leaves the previous
 * display list and scroll offset untouched.
 *
 * @throws {PipelineError} INVALID_CONFIG when the viewport overrides are invalid
 */
export function createBrowserSession(options: BrowserSessionOptions): BrowserSession {
  const config = resolveViewportConfig(options.viewport);
  const surface = options.surface;
  const fetchDocument = options.fetchDocument ?? defaultFetchDocument;
  const viewport = new Viewport({ height: config.height, scrollStep: config.scrollStep });

  let displayList: DisplayList = [];
  // Bumped by every load; a fetch that returns under an older number is dropped.
  let generation = 0;

  const draw = (): number => viewport.draw(displayList, surface);

  const commit = (markup: string): DisplayList => {
    const root = parseDocument(normalizeMarkup(markup), options.parse);
    const next = layoutDocument(root, {
      fonts: options.fonts ?? getSharedFontCache(),
      viewport: config,
      baseStyle: options.baseStyle,
      styleMode: options.styleMode,
    });
    displayList = next;
    viewport.reset();
    draw();
    return next;
  };

  const loadMarkup = (markup: string): DisplayList => {
    generation += 1;
    try {
      return commit(markup);
    } catch (error) {
      const failure = toPipelineError(error, 'INVARIANT_VIOLATION');
      console.warn('[BrowserSession] Layout failed:', { code: failure.code, message: failure.message });
      throw failure;
    }
  };

  const load = async (url: string): Promise<DisplayList> => {
    generation += 1;
    const ticket = generation;

    let markup: string;
    try {
      markup = await fetchDocument(url);
    } catch (error) {
      const failure = toPipelineError(error, 'TRANSPORT_ERROR');
      console.warn('[BrowserSession] Load failed:', { url, code: failure.code, message: failure.message });
      throw failure;
    }

    if (ticket !== generation) {
      layoutLog('[BrowserSession] Discarding superseded load', { url });
      return displayList;
    }

    try {
      const next = commit(markup);
      layoutLog('[BrowserSession] Loaded', { url, entries: next.length });
      return next;
    } catch (error) {
      const failure = toPipelineError(error, 'INVARIANT_VIOLATION');
      console.warn('[BrowserSession] Load failed:', { url, code: failure.code, message: failure.message });
      throw failure;
    }
  };

  return {
    config,
    load,
    loadMarkup,
    onScrollDown: () => {
      viewport.scrollDown();
      draw();
    },
    scrollBy: (delta: number) => {
      viewport.scrollBy(delta);
      draw();
    },
    draw,
    getDisplayList: () => displayList,
    getScrollY: () => viewport.scrollY,
  };
}
