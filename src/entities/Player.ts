import { Entity, type Bounds } from './Entity.ts'
import { Projectile } from './Projectile.ts'
import { Vector2 } from '../math/Vector2.ts'
import type { PlayerConfig, ProjectileConfig } from '../game/GameConfig.ts'

export interface PlayerOptions {
  position: Vector2
  config: PlayerConfig
  projectile: ProjectileConfig
  bounds: Bounds
}

/**
 * Player entity - the avatar that trails the pointer.
 *
 * Follow policy is exponential smoothing: each update closes the fraction
 * `1 - exp(-smoothingRate * dt)` of the remaining gap to the pointer, so
 * splitting a step in two lands on the same spot as taking it whole.
 */
export class Player extends Entity {
  readonly kind = 'player'
  public target: Vector2
  public facing: Vector2 = new Vector2(0, -1)
  public fireCooldown = 0
  public contactCooldown = 0
  public inContact = false

  private readonly config: PlayerConfig
  private readonly projectileConfig: ProjectileConfig
  private readonly bounds: Bounds

  constructor(id: number, options: PlayerOptions) {
    super(id, options.position, options.config.radius)
    this.target = options.position
    this.config = options.config
    this.projectileConfig = options.projectile
    this.bounds = options.bounds
  }

  /**
   * Follow the pointer; a missing or non-finite pointer keeps the last target
   */
  update(dt: number, pointer: Vector2 | null): void {
    if (pointer && pointer.isFinite()) {
      this.target = pointer
    }

    const t = 1 - Math.exp(-this.config.smoothingRate * dt)
    const next = this.position
      .lerp(this.target, t)
      .clamp(this.radius, this.bounds.width - this.radius, this.radius, this.bounds.height - this.radius)

    const step = next.subtract(this.position)
    if (!step.isZero()) {
      this.facing = step.normalized()
    }
    this.position = next

    this.fireCooldown = this.countDown(this.fireCooldown, dt)
    this.contactCooldown = this.countDown(this.contactCooldown, dt)
  }

  canFire(): boolean {
    return this.fireCooldown <= 0
  }

  /**
   * Fire along `direction` (or the facing direction when it is ~zero).
   * Returns null while the cooldown runs.
   */
  tryFire(id: number, direction: Vector2): Projectile | null {
    if (!this.canFire()) return null

    const aim = direction.isZero() ? this.facing : direction.normalized()
    this.fireCooldown = this.config.fireCooldown

    return new Projectile(id, {
      position: this.position,
      direction: aim,
      speed: this.projectileConfig.speed,
      lifetime: this.projectileConfig.lifetime,
      radius: this.projectileConfig.radius,
      damage: this.projectileConfig.damage,
      bounds: this.bounds,
    })
  }

  /**
   * Report an enemy overlap this frame. True at most once per contact
   * episode: on the first overlapping frame with the contact cooldown
   * elapsed. An overlap that begins inside the cooldown is charged once the
   * cooldown runs out, if it is still going.
   */
  applyHit(): boolean {
    if (this.inContact) return false
    if (this.contactCooldown > 0) return false

    this.inContact = true
    this.contactCooldown = this.config.contactCooldown
    return true
  }

  /**
   * Report that the enemy is not overlapping this frame - ends the episode
   */
  clearContact(): void {
    this.inContact = false
  }
}
