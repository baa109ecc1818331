import { Vector2 } from '../math/Vector2.ts'

/**
 * The four signals the game reads each frame
 */
export interface InputState {
  pointer: Vector2 | null  // null until the pointer has been seen
  fire: boolean       // Left mouse / Space held
  restart: boolean    // R - edge triggered
  quit: boolean       // Escape - edge triggered, or window close
}

/**
 * Anything that can hand the game one input snapshot per frame
 */
export interface InputSource {
  poll(): InputState
}

export const MOUSE_LEFT = 0

/**
 * Collects device events between frames and exposes them as a polled
 * snapshot. Hosts forward their window/canvas events to the on* methods.
 */
export class Input implements InputSource {
  private keys: Set<string> = new Set()
  private keysPressed: Set<string> = new Set() // Just pressed since last poll
  private mouseButtons: Set<number> = new Set()
  private pointer: Vector2 | null = null
  private quitRequested = false

  onPointerMove(x: number, y: number): void {
    const next = new Vector2(x, y)
    // Keep the last good position when a host reports garbage
    if (next.isFinite()) {
      this.pointer = next
    }
  }

  onMouseDown(button: number): void {
    this.mouseButtons.add(button)
  }

  onMouseUp(button: number): void {
    this.mouseButtons.delete(button)
  }

  onKeyDown(code: string): void {
    if (!this.keys.has(code)) {
      this.keysPressed.add(code)
    }
    this.keys.add(code)
  }

  onKeyUp(code: string): void {
    this.keys.delete(code)
  }

  /**
   * Window close or equivalent
   */
  onQuit(): void {
    this.quitRequested = true
  }

  /**
   * Clear held inputs when the window loses focus
   */
  onBlur(): void {
    this.keys.clear()
    this.mouseButtons.clear()
  }

  isKeyDown(code: string): boolean {
    return this.keys.has(code)
  }

  isKeyPressed(code: string): boolean {
    return this.keysPressed.has(code)
  }

  isMouseDown(button: number): boolean {
    return this.mouseButtons.has(button)
  }

  /**
   * Snapshot current state and clear edge-triggered state
   */
  poll(): InputState {
    const state: InputState = {
      pointer: this.pointer,
      fire: this.isMouseDown(MOUSE_LEFT) || this.isKeyDown('Space'),
      restart: this.isKeyPressed('KeyR'),
      quit: this.quitRequested || this.isKeyPressed('Escape'),
    }

    this.keysPressed.clear()
    this.quitRequested = false
    return state
  }
}
