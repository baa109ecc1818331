/**
 * Render surface contract and a 2D canvas implementation.
 *
 * The game issues draw calls only; it never owns pixels. Any host that can
 * fill circles, blit images and print text can implement RenderSurface.
 * `TImage` is whatever decoded image type the host's loader produces.
 */

export type TextAlign = 'left' | 'center' | 'right'

export interface TextStyle {
  color: string
  size: number
  align?: TextAlign
}

/**
 * Decoded image plus the metadata the game needs
 */
export interface ImageAsset<TImage = unknown> {
  readonly src: string
  readonly width: number
  readonly height: number
  readonly source: TImage
}

export interface RenderSurface<TImage = unknown> {
  readonly width: number
  readonly height: number
  clear(color: string): void
  fillCircle(x: number, y: number, radius: number, color: string): void
  drawImage(image: ImageAsset<TImage>, x: number, y: number, width: number, height: number): void
  drawText(text: string, x: number, y: number, style: TextStyle): void
  present(): void
}

/**
 * The subset of CanvasRenderingContext2D this adapter draws with
 */
export interface Canvas2DContext<TImage> {
  fillStyle: string | object
  font: string
  textAlign: string
  textBaseline: string
  fillRect(x: number, y: number, w: number, h: number): void
  beginPath(): void
  arc(x: number, y: number, radius: number, startAngle: number, endAngle: number): void
  fill(): void
  fillText(text: string, x: number, y: number): void
  drawImage(image: TImage, dx: number, dy: number, dw: number, dh: number): void
}

const FONT_FAMILY = 'monospace'

/**
 * RenderSurface over a 2D canvas context
 */
export class CanvasSurface<TImage> implements RenderSurface<TImage> {
  private ctx: Canvas2DContext<TImage>
  private onPresent: (() => void) | null = null
  public readonly width: number
  public readonly height: number

  constructor(ctx: Canvas2DContext<TImage>, width: number, height: number) {
    this.ctx = ctx
    this.width = width
    this.height = height
  }

  /**
   * Hook run after each completed frame (e.g. to swap buffers on an offscreen canvas)
   */
  presented(callback: () => void): this {
    this.onPresent = callback
    return this
  }

  clear(color: string): void {
    this.ctx.fillStyle = color
    this.ctx.fillRect(0, 0, this.width, this.height)
  }

  fillCircle(x: number, y: number, radius: number, color: string): void {
    this.ctx.fillStyle = color
    this.ctx.beginPath()
    this.ctx.arc(x, y, radius, 0, Math.PI * 2)
    this.ctx.fill()
  }

  drawImage(image: ImageAsset<TImage>, x: number, y: number, width: number, height: number): void {
    this.ctx.drawImage(image.source, x, y, width, height)
  }

  drawText(text: string, x: number, y: number, style: TextStyle): void {
    this.ctx.fillStyle = style.color
    this.ctx.font = `${style.size}px ${FONT_FAMILY}`
    this.ctx.textAlign = style.align ?? 'left'
    this.ctx.textBaseline = 'top'
    this.ctx.fillText(text, x, y)
  }

  present(): void {
    this.onPresent?.()
  }
}
