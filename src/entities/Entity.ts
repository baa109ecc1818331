import { EPSILON, Vector2 } from '../math/Vector2.ts'

export type EntityKind = 'player' | 'enemy' | 'projectile'

/**
 * Playfield rectangle, origin at the top-left corner
 */
export interface Bounds {
  width: number
  height: number
}

/**
 * Anything the collision pass can test: a circle that may be switched off
 */
export interface Collidable {
  getPosition(): Vector2
  getCollisionRadius(): number
  isActive(): boolean
}

/**
 * Base class for all game entities.
 * Holds the shared circle body and active flag; subclasses own their timers.
 * An entity's update never touches another entity - cross-entity effects
 * belong to the controller.
 */
export abstract class Entity implements Collidable {
  public readonly id: number
  abstract readonly kind: EntityKind
  protected position: Vector2
  protected radius: number
  protected active = true

  constructor(id: number, position: Vector2, radius: number) {
    this.id = id
    this.position = position
    this.radius = radius
  }

  get x(): number {
    return this.position.x
  }

  get y(): number {
    return this.position.y
  }

  getPosition(): Vector2 {
    return this.position
  }

  getCollisionRadius(): number {
    return this.radius
  }

  isActive(): boolean {
    return this.active
  }

  /**
   * Run a timer down by `dt`. Remainders within EPSILON of zero snap to 0 so
   * repeated small steps expire on the frame the exact sum would.
   */
  protected countDown(timer: number, dt: number): number {
    const left = timer - dt
    return left > EPSILON ? left : 0
  }

  /**
   * Check if the centre lies within the rectangle grown by `margin` on every side
   */
  isInBounds(bounds: Bounds, margin = 0): boolean {
    return (
      this.x >= -margin &&
      this.x <= bounds.width + margin &&
      this.y >= -margin &&
      this.y <= bounds.height + margin
    )
  }

  /**
   * Advance timers and position by `dt` seconds
   */
  abstract update(dt: number, ...args: never[]): void
}
