import { Entity, type Bounds } from './Entity.ts'
import { Vector2 } from '../math/Vector2.ts'
import { randomPick, randomRange, type RandomSource } from '../math/SeededRandom.ts'
import type { EnemyConfig } from '../game/GameConfig.ts'

/**
 * Outcome of a damage attempt:
 * - ignored: invulnerable, nothing changed
 * - hit: hit points dropped, still alive
 * - destroyed: hit points ran out and the enemy respawned
 */
export type DamageResult = 'ignored' | 'hit' | 'destroyed'

export interface EnemyOptions {
  position: Vector2
  config: EnemyConfig
  bounds: Bounds
  rng: RandomSource
}

/**
 * Enemy entity - chases the player, respawns instead of dying
 */
export class Enemy extends Entity {
  readonly kind = 'enemy'
  public hitPoints: number
  public readonly maxHitPoints: number
  public invulnerable = 0
  public speed: number
  public respawns = 0

  private readonly config: EnemyConfig
  private readonly bounds: Bounds
  private readonly rng: RandomSource

  constructor(id: number, options: EnemyOptions) {
    super(id, options.position, options.config.radius)
    this.config = options.config
    this.bounds = options.bounds
    this.rng = options.rng
    this.maxHitPoints = options.config.maxHitPoints
    this.hitPoints = this.maxHitPoints
    this.speed = options.config.speed
  }

  /**
   * Straight-line pursuit of `target`; no pathfinding
   */
  update(dt: number, target: Vector2): void {
    const direction = target.subtract(this.position).normalized()
    this.position = this.position.add(direction.scale(this.speed * dt))
    this.invulnerable = this.countDown(this.invulnerable, dt)
  }

  canTakeDamage(): boolean {
    return this.invulnerable <= 0
  }

  applyDamage(amount: number): DamageResult {
    if (!this.canTakeDamage()) return 'ignored'

    this.hitPoints = Math.max(0, this.hitPoints - amount)
    if (this.hitPoints > 0) {
      this.invulnerable = this.config.invulnerabilityWindow
      return 'hit'
    }

    this.respawn()
    return 'destroyed'
  }

  setSpeed(speed: number): void {
    this.speed = speed
  }

  private respawn(): void {
    this.position = this.pickRespawnPoint()
    this.radius = randomPick(this.rng, this.config.respawnRadii) ?? this.radius
    this.hitPoints = this.maxHitPoints
    this.invulnerable = this.config.respawnGrace
    this.respawns++
  }

  private pickRespawnPoint(): Vector2 {
    const fixed = this.config.respawnPoint
    if (fixed) return new Vector2(fixed.x, fixed.y)

    const margin = this.config.respawnMargin
    return new Vector2(
      randomRange(this.rng, margin, this.bounds.width - margin),
      randomRange(this.rng, margin, this.bounds.height - margin)
    )
  }
}
