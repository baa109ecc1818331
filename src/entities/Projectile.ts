import { Entity, type Bounds } from './Entity.ts'
import { Vector2 } from '../math/Vector2.ts'

/**
 * Why a projectile left play
 */
export type ExpiryReason = 'lifetime' | 'bounds' | 'impact'

export interface ProjectileOptions {
  position: Vector2
  direction: Vector2
  speed: number
  lifetime: number
  radius: number
  damage: number
  bounds: Bounds
}

/**
 * Projectile entity - short-lived shot fired by the player
 */
export class Projectile extends Entity {
  readonly kind = 'projectile'
  public readonly direction: Vector2
  public readonly speed: number
  public readonly damage: number
  public lifetime: number
  public expiredBy: ExpiryReason | null = null

  private readonly bounds: Bounds

  constructor(id: number, options: ProjectileOptions) {
    super(id, options.position, options.radius)
    this.direction = options.direction.normalized()
    this.speed = options.speed
    this.damage = options.damage
    this.lifetime = options.lifetime
    this.bounds = options.bounds
  }

  getVelocity(): Vector2 {
    return this.direction.scale(this.speed)
  }

  update(dt: number): void {
    if (!this.active) return

    this.position = this.position.add(this.direction.scale(this.speed * dt))
    this.lifetime -= dt

    if (this.lifetime <= 0) {
      this.expire('lifetime')
    } else if (!this.isInBounds(this.bounds, this.radius)) {
      this.expire('bounds')
    }
  }

  /**
   * Remove from play after striking a target
   */
  deactivate(): void {
    this.expire('impact')
  }

  private expire(reason: ExpiryReason): void {
    if (!this.active) return
    this.active = false
    this.expiredBy = reason
  }
}
