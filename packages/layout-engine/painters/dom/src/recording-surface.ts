import type { DrawCommand, FontHandle, RenderSurface } from '@linewright/contracts';

/**
 * Surface that keeps the draw commands of the latest frame instead of
 * painting them. Used by the CLI and by tests.
 */
export class RecordingSurface implements RenderSurface {
  private frame: DrawCommand[] = [];
  private frameCount = 0;

  get commands(): readonly DrawCommand[] {
    return this.frame;
  }

  /** Number of times the surface has been cleared. */
  get frames(): number {
    return this.frameCount;
  }

  clear(): void {
    this.frame = [];
    this.frameCount += 1;
  }

  drawText(x: number, y: number, text: string, font: FontHandle): void {
    this.frame.push({ x, y, text, font: font.key });
  }
}
