export { DomPainter } from './dom-painter.js';
export { RecordingSurface } from './recording-surface.js';
export {
  Viewport,
  createViewport,
  cullDisplayList,
  drawDisplayList,
  isEntryVisible,
  type ViewportOptions,
} from './viewport.js';
export { DOM_CLASS_NAMES, FONT_KEY_ATTRIBUTE, type DomClassName } from './constants.js';
