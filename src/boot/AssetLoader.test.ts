import { describe, it, expect, vi, afterEach } from 'vitest'
import { AssetLoader, BackgroundLibrary, FALLBACK_BACKGROUND_COLOR, type LoadProgress } from './AssetLoader.ts'
import { SafeConsole } from '../core/SafeConsole.ts'
import type { ImageAsset } from '../core/Surface.ts'

const image = (src: string): ImageAsset<string> => ({ src, width: 800, height: 600, source: `decoded:${src}` })

/**
 * Loader that resolves every path except those listed as missing
 */
function createImageLoader(missing: string[] = []) {
  return vi.fn(async (src: string): Promise<ImageAsset<string>> => {
    if (missing.includes(src)) {
      throw new Error(`404 ${src}`)
    }
    return image(src)
  })
}

describe('BackgroundLibrary', () => {
  it('should fall back to a solid colour when empty', () => {
    const library = new BackgroundLibrary<string>()
    expect(library.size).toBe(0)
    expect(library.getBackground(0)).toEqual({ kind: 'solid', color: FALLBACK_BACKGROUND_COLOR })
  })

  it('should return the image for a loaded slot', () => {
    const sky = image('sky.png')
    const library = new BackgroundLibrary([sky, null])
    expect(library.getBackground(0)).toEqual({ kind: 'image', image: sky })
  })

  it('should return the solid colour for a missing slot', () => {
    const library = new BackgroundLibrary([image('sky.png'), null])
    expect(library.getBackground(1)).toEqual({ kind: 'solid', color: '#000032' })
  })

  it('should clamp the index to the available slots', () => {
    const first = image('1.png')
    const last = image('2.png')
    const library = new BackgroundLibrary([first, last])

    expect(library.getBackground(7)).toEqual({ kind: 'image', image: last })
    expect(library.getBackground(-3)).toEqual({ kind: 'image', image: first })
    expect(library.getBackground(0.9)).toEqual({ kind: 'image', image: first })
  })

  it('should accept a custom fallback colour', () => {
    const library = new BackgroundLibrary<string>([], '#101010')
    expect(library.getBackground(0)).toEqual({ kind: 'solid', color: '#101010' })
  })
})

const silenceWarnings = () => vi.spyOn(SafeConsole, 'warn').mockImplementation(() => {})

describe('AssetLoader', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('should load one background per level in order', async () => {
    const warn = silenceWarnings()
    const loadImage = createImageLoader()
    const library = await new AssetLoader({ levels: ['1.png', '2.png'] }, loadImage).load()

    expect(loadImage.mock.calls.map(call => call[0])).toEqual(['1.png', '2.png'])
    expect(library.size).toBe(2)
    expect(library.getBackground(1)).toEqual({ kind: 'image', image: image('2.png') })
    expect(warn).not.toHaveBeenCalled()
  })

  it('should report progress per level', async () => {
    const progress: LoadProgress[] = []
    await new AssetLoader({ levels: ['1.png', '2.png', '3.png', '4.png'] }, createImageLoader())
      .progress(p => progress.push(p))
      .load()

    expect(progress.map(p => p.percent)).toEqual([25, 50, 75, 100])
    expect(progress[3]).toEqual({ loaded: 4, total: 4, percent: 100, currentAsset: '4.png' })
  })

  it('should not reject when an image fails', async () => {
    const warn = silenceWarnings()
    const library = await new AssetLoader({ levels: ['1.png', 'gone.png'] }, createImageLoader(['gone.png'])).load()

    expect(library.getBackground(1)).toEqual({ kind: 'solid', color: FALLBACK_BACKGROUND_COLOR })
    expect(warn).toHaveBeenCalledWith('Failed to load image: gone.png', expect.any(Error))
    expect(warn).toHaveBeenCalledWith('No background for gone.png, using solid #000032')
  })

  it('should substitute the fallback image, loading it only once', async () => {
    silenceWarnings()
    const loadImage = createImageLoader(['a.png', 'b.png'])
    const library = await new AssetLoader(
      { levels: ['a.png', 'b.png', 'c.png'], fallbackImage: 'default.png' },
      loadImage
    ).load()

    expect(loadImage.mock.calls.map(call => call[0])).toEqual(['a.png', 'default.png', 'b.png', 'c.png'])
    expect(library.getBackground(0)).toEqual({ kind: 'image', image: image('default.png') })
    expect(library.getBackground(1)).toEqual({ kind: 'image', image: image('default.png') })
    expect(library.getBackground(2)).toEqual({ kind: 'image', image: image('c.png') })
  })

  it('should fall back to solid when the fallback image fails too', async () => {
    silenceWarnings()
    const loadImage = createImageLoader(['a.png', 'b.png', 'default.png'])
    const library = await new AssetLoader({ levels: ['a.png', 'b.png'], fallbackImage: 'default.png' }, loadImage).load()

    expect(loadImage).toHaveBeenCalledTimes(3)
    expect(library.getBackground(0)).toEqual({ kind: 'solid', color: FALLBACK_BACKGROUND_COLOR })
    expect(library.getBackground(1)).toEqual({ kind: 'solid', color: FALLBACK_BACKGROUND_COLOR })
  })
})
