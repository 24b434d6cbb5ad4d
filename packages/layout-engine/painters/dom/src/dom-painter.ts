import { fontKeyToString, type FontHandle, type RenderSurface } from '@linewright/contracts';
import { DOM_CLASS_NAMES, FONT_KEY_ATTRIBUTE } from './constants.js';

type PainterOptions = {
  /** CSS font family for painted words (default: serif). */
  fontFamily?: string;
  /** Viewport size applied to the painter root. */
  width?: number;
  height?: number;
};

/**
 * DOM render surface: every drawn word becomes an absolutely positioned span
 * inside a clipped root element.
 *
 * @example
 * ```typescript
 * const painter = new DomPainter(document.getElementById('view')!, { width: 800, height: 600 });
 * viewport.draw(displayList, painter);
 * ```
 */
export class DomPainter implements RenderSurface {
  private readonly root: HTMLElement;
  private readonly doc: Document;
  private readonly fontFamily: string;

  constructor(mount: HTMLElement, options: PainterOptions = {}) {
    this.doc = mount.ownerDocument;
    this.fontFamily = options.fontFamily ?? 'serif';

    this.root = this.doc.createElement('div');
    this.root.classList.add(DOM_CLASS_NAMES.VIEWPORT);
    Object.assign(this.root.style, {
      position: 'relative',
      overflow: 'hidden',
    });
    if (typeof options.width === 'number') this.root.style.width = `${options.width}px`;
    if (typeof options.height === 'number') this.root.style.height = `${options.height}px`;
    mount.appendChild(this.root);
  }

  get element(): HTMLElement {
    return this.root;
  }

  clear(): void {
    this.root.replaceChildren();
  }

  drawText(x: number, y: number, text: string, font: FontHandle): void {
    try {
      const span = this.doc.createElement('span');
      span.classList.add(DOM_CLASS_NAMES.WORD);
      span.textContent = text;
      span.setAttribute(FONT_KEY_ATTRIBUTE, fontKeyToString(font.key));
      Object.assign(span.style, {
        position: 'absolute',
        left: `${x}px`,
        top: `${y}px`,
        fontSize: `${font.key.size}px`,
        fontWeight: font.key.weight,
        fontStyle: font.key.style === 'italic' ? 'italic' : 'normal',
        fontFamily: this.fontFamily,
        whiteSpace: 'pre',
      });
      this.root.appendChild(span);
    } catch (error) {
      console.error('[DomPainter] Word rendering failed:', { text, x, y, error });
    }
  }

  /** Remove the painter root from its mount. */
  destroy(): void {
    this.root.remove();
  }
}
