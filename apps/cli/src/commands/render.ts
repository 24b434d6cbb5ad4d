import type { DrawCommand, FontProvider, StyleMode, ViewportConfig } from '@linewright/contracts';
import { createBrowserSession, type DocumentFetcher } from '@linewright/layout-bridge';
import { RecordingSurface } from '@linewright/painter-dom';

export interface RenderOptions {
  fetchDocument?: DocumentFetcher;
  fonts?: FontProvider;
  viewport?: Partial<ViewportConfig>;
  styleMode?: StyleMode;
  /** Scroll offset applied after the initial draw. */
  scroll?: number;
}

export interface RenderResult {
  url: string;
  scrollY: number;
  /** Words in the whole display list. */
  entries: number;
  /** Draw commands of the visible band, in viewport coordinates. */
  commands: DrawCommand[];
}

/**
 * Load a document into a recording surface and report what the viewport drew.
 */
export async function render(url: string, options: RenderOptions = {}): Promise<RenderResult> {
  const surface = new RecordingSurface();
  const session = createBrowserSession({
    surface,
    viewport: options.viewport,
    fetchDocument: options.fetchDocument,
    fonts: options.fonts,
    styleMode: options.styleMode,
  });

  await session.load(url);
  if (options.scroll) {
    session.scrollBy(options.scroll);
  }

  return {
    url,
    scrollY: session.getScrollY(),
    entries: session.getDisplayList().length,
    commands: [...surface.commands],
  };
}
