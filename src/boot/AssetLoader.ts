/**
 * Background loading
 * Loads one background image per level and falls back to a solid colour
 * for every level whose image is missing.
 */

import { SafeConsole } from '../core/SafeConsole.ts'
import type { ImageAsset } from '../core/Surface.ts'

/**
 * Dark blue shown when a level has no usable image
 */
export const FALLBACK_BACKGROUND_COLOR = '#000032'

export interface BackgroundManifest {
  /** Image path per level, level 1 first */
  levels: string[]
  /** Tried for any level whose own image fails */
  fallbackImage?: string
}

export interface LoadProgress {
  loaded: number
  total: number
  percent: number
  currentAsset: string
}

export type ProgressCallback = (progress: LoadProgress) => void

/**
 * Decodes an image at `src`; rejects when it cannot
 */
export type ImageLoader<TImage> = (src: string) => Promise<ImageAsset<TImage>>

export type Background<TImage = unknown> =
  | { kind: 'image'; image: ImageAsset<TImage> }
  | { kind: 'solid'; color: string }

/**
 * Per-level background lookup
 */
export class BackgroundLibrary<TImage = unknown> {
  private slots: Array<ImageAsset<TImage> | null>
  private fallbackColor: string

  constructor(slots: Array<ImageAsset<TImage> | null> = [], fallbackColor: string = FALLBACK_BACKGROUND_COLOR) {
    this.slots = slots
    this.fallbackColor = fallbackColor
  }

  /**
   * Number of level slots (loaded or not)
   */
  get size(): number {
    return this.slots.length
  }

  /**
   * Background for a zero-based level index, clamped to the last slot
   */
  getBackground(index: number): Background<TImage> {
    if (this.slots.length === 0) {
      return { kind: 'solid', color: this.fallbackColor }
    }

    const clamped = Math.min(Math.max(0, Math.floor(index)), this.slots.length - 1)
    const image = this.slots[clamped]
    if (!image) {
      return { kind: 'solid', color: this.fallbackColor }
    }
    return { kind: 'image', image }
  }
}

/**
 * Load every level background with progress reporting.
 * Never rejects: failed images become solid-colour slots.
 */
export class AssetLoader<TImage> {
  private manifest: BackgroundManifest
  private loadImage: ImageLoader<TImage>
  private onProgress: ProgressCallback | null = null

  constructor(manifest: BackgroundManifest, loadImage: ImageLoader<TImage>) {
    this.manifest = manifest
    this.loadImage = loadImage
  }

  /**
   * Set progress callback
   */
  progress(callback: ProgressCallback): this {
    this.onProgress = callback
    return this
  }

  async load(): Promise<BackgroundLibrary<TImage>> {
    const paths = this.manifest.levels
    const total = paths.length
    let loaded = 0
    let fallback: ImageAsset<TImage> | null | undefined

    const reportProgress = (asset: string) => {
      loaded++
      this.onProgress?.({
        loaded,
        total,
        percent: Math.round((loaded / total) * 100),
        currentAsset: asset,
      })
    }

    const slots: Array<ImageAsset<TImage> | null> = []

    for (const src of paths) {
      let image = await this.tryLoad(src)

      if (!image && this.manifest.fallbackImage) {
        // Only ever attempt the shared fallback once
        if (fallback === undefined) {
          fallback = await this.tryLoad(this.manifest.fallbackImage)
        }
        image = fallback
      }

      if (!image) {
        SafeConsole.warn(`No background for ${src}, using solid ${FALLBACK_BACKGROUND_COLOR}`)
      }
      slots.push(image)
      reportProgress(src)
    }

    return new BackgroundLibrary(slots)
  }

  private async tryLoad(src: string): Promise<ImageAsset<TImage> | null> {
    try {
      return await this.loadImage(src)
    } catch (e) {
      SafeConsole.warn(`Failed to load image: ${src}`, e)
      return null
    }
  }
}
