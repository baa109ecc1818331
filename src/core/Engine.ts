import type { Game } from '../game/Game.ts'
import type { InputSource } from './Input.ts'
import type { RenderSurface } from './Surface.ts'
import { SafeConsole } from './SafeConsole.ts'
import { EngineError } from './errors.ts'

export interface EngineOptions {
  /** Milliseconds, monotonic */
  now?: () => number
  /** Iteration cap; defaults to the game's loop.targetFps */
  targetFps?: number
}

/**
 * Drives the game: one iteration polls input, updates with the measured
 * wall-clock delta, renders, then waits out the rest of the frame budget.
 */
export class Engine<TImage = unknown> {
  private game: Game<TImage>
  private input: InputSource
  private surface: RenderSurface<TImage>
  private now: () => number
  private readonly frameBudget: number

  private lastTime = 0
  private running = false
  private disposed = false
  private timer: ReturnType<typeof setTimeout> | null = null
  private onStop: (() => void) | null = null

  constructor(game: Game<TImage>, input: InputSource, surface: RenderSurface<TImage>, options: EngineOptions = {}) {
    this.game = game
    this.input = input
    this.surface = surface
    this.now = options.now ?? (() => performance.now())
    this.frameBudget = 1000 / (options.targetFps ?? game.getConfig().loop.targetFps)
  }

  /**
   * Set callback for when the loop ends (quit or stop)
   */
  stopped(callback: () => void): this {
    this.onStop = callback
    return this
  }

  isRunning(): boolean {
    return this.running
  }

  start(): void {
    if (this.disposed) {
      throw new EngineError('Cannot start a disposed engine')
    }
    if (this.running) return
    this.running = true
    this.lastTime = this.now()
    SafeConsole.info('[Engine] Started')
    this.schedule(0)
  }

  stop(): void {
    if (!this.running) return
    this.running = false
    if (this.timer !== null) {
      clearTimeout(this.timer)
      this.timer = null
    }
    SafeConsole.info('[Engine] Stopped')
    this.onStop?.()
  }

  /**
   * Stop for good; start() afterwards throws
   */
  dispose(): void {
    this.stop()
    this.disposed = true
  }

  /**
   * Run exactly one iteration with the time elapsed since the previous one.
   * Returns the delta used, in seconds.
   */
  tick(): number {
    const currentTime = this.now()
    const dt = Math.max(0, currentTime - this.lastTime) / 1000
    this.lastTime = currentTime

    this.game.update(dt, this.input.poll())
    this.game.render(this.surface)
    return dt
  }

  private schedule(delay: number): void {
    this.timer = setTimeout(this.loop, delay)
  }

  private loop = (): void => {
    this.timer = null
    if (!this.running) return

    const frameStart = this.now()
    this.tick()

    if (this.game.isQuitRequested()) {
      this.stop()
      return
    }

    // Cap the rate: sleep whatever the frame budget has left
    const elapsed = this.now() - frameStart
    this.schedule(Math.max(0, this.frameBudget - elapsed))
  }
}
