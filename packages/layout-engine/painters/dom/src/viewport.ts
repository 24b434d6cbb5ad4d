import type { DisplayEntry, DisplayList, RenderSurface } from '@linewright/contracts';

/**
 * True when any part of the entry's line box falls inside
 * `[scrollY, scrollY + viewportHeight]`. Both edges are inclusive.
 */
export function isEntryVisible(entry: DisplayEntry, scrollY: number, viewportHeight: number): boolean {
  if (entry.y > scrollY + viewportHeight) return false;
  if (entry.y + entry.font.metrics().linespace < scrollY) return false;
  return true;
}

/** Entries intersecting the visible band, in display-list order. */
export function cullDisplayList(displayList: DisplayList, scrollY: number, viewportHeight: number): DisplayEntry[] {
  return displayList.filter((entry) => isEntryVisible(entry, scrollY, viewportHeight));
}

/**
 * Clear the surface and draw the visible entries shifted by the scroll offset.
 * No text is measured again; only the culling comparisons run per entry.
 *
 * @returns number of entries drawn
 */
export function drawDisplayList(
  displayList: DisplayList,
  scrollY: number,
  viewportHeight: number,
  surface: RenderSurface,
): number {
  surface.clear();
  let drawn = 0;
  for (const entry of displayList) {
    if (!isEntryVisible(entry, scrollY, viewportHeight)) continue;
    surface.drawText(entry.x, entry.y - scrollY, entry.text, entry.font);
    drawn += 1;
  }
  return drawn;
}

export type ViewportOptions = {
  height: number;
  scrollStep: number;
};

/**
 * Scroll state of one viewport. The offset never goes below zero and has no
 * upper bound: scrolling past the end of the document shows an empty band.
 */
export class Viewport {
  readonly height: number;
  readonly scrollStep: number;
  private offset = 0;

  constructor(options: ViewportOptions) {
    this.height = options.height;
    this.scrollStep = options.scrollStep;
  }

  get scrollY(): number {
    return this.offset;
  }

  scrollDown(): number {
    return this.scrollBy(this.scrollStep);
  }

  scrollBy(delta: number): number {
    if (!Number.isFinite(delta)) return this.offset;
    this.offset = Math.max(0, this.offset + delta);
    return this.offset;
  }

  reset(): void {
    this.offset = 0;
  }

  visibleEntries(displayList: DisplayList): DisplayEntry[] {
    return cullDisplayList(displayList, this.offset, this.height);
  }

  draw(displayList: DisplayList, surface: RenderSurface): number {
    return drawDisplayList(displayList, this.offset, this.height, surface);
  }
}

export function createViewport(options: ViewportOptions): Viewport {
  return new Viewport(options);
}
