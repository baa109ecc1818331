import { Player } from '../entities/Player.ts'
import { Enemy, type DamageResult } from '../entities/Enemy.ts'
import type { Projectile } from '../entities/Projectile.ts'
import type { Bounds } from '../entities/Entity.ts'
import { Vector2 } from '../math/Vector2.ts'
import { SeededRandom, type RandomSource } from '../math/SeededRandom.ts'
import { CollisionSystem } from '../systems/CollisionSystem.ts'
import { BackgroundLibrary } from '../boot/AssetLoader.ts'
import { HUD, type HUDGameState } from '../ui/HUD.ts'
import type { InputState } from '../core/Input.ts'
import type { RenderSurface } from '../core/Surface.ts'
import { SafeConsole } from '../core/SafeConsole.ts'
import { DEFAULT_GAME_CONFIG, validateGameConfig, type GameConfig } from './GameConfig.ts'

export type GameState = 'playing' | 'gameover'

export type GameEntity = Player | Enemy | Projectile

export const ENTITY_COLORS = {
  player: '#00ff00',
  enemy: '#ff0000',
  enemyInvulnerable: '#ff9090',
  projectile: '#ffff00',
  gameOverBackground: '#000000',
} as const

export interface GameOptions<TImage> {
  config?: GameConfig
  backgrounds?: BackgroundLibrary<TImage>
  /** Respawn placement; seeded from config.seed when omitted */
  rng?: RandomSource
}

/**
 * Plain read-only view of the controller, for tooling and tests
 */
export interface GameSnapshot {
  state: GameState
  frame: number
  score: number
  level: number
  kills: number
  player: { x: number; y: number; fireCooldown: number; contactCooldown: number }
  enemy: { x: number; y: number; radius: number; hitPoints: number; invulnerable: number; speed: number }
  projectiles: Array<{ id: number; x: number; y: number; lifetime: number }>
}

const PLAYER_ID = 1
const ENEMY_ID = 2
const FIRST_PROJECTILE_ID = 3

/**
 * Game controller - owns every entity, the score and the play/game-over
 * state machine. The only place where one entity affects another.
 */
export class Game<TImage = unknown> {
  private readonly config: GameConfig
  private readonly bounds: Bounds
  private readonly backgrounds: BackgroundLibrary<TImage>
  private readonly rng: RandomSource
  private readonly collisions = new CollisionSystem()
  private readonly hud = new HUD()

  private state: GameState = 'playing'
  private player: Player
  private enemy: Enemy
  private projectiles: Projectile[] = []
  private nextProjectileId = FIRST_PROJECTILE_ID
  private score: number
  private level = 1
  private kills = 0
  private frame = 0
  private quitRequested = false

  constructor(options: GameOptions<TImage> = {}) {
    this.config = options.config ?? DEFAULT_GAME_CONFIG
    validateGameConfig(this.config)
    this.bounds = { width: this.config.screen.width, height: this.config.screen.height }
    this.backgrounds = options.backgrounds ?? new BackgroundLibrary<TImage>()
    this.rng = options.rng ?? new SeededRandom(this.config.seed)

    this.player = this.createPlayer()
    this.enemy = this.createEnemy()
    this.score = this.config.scoring.initialScore
  }

  private createPlayer(): Player {
    const { width, height } = this.bounds
    return new Player(PLAYER_ID, {
      position: new Vector2(width / 4, height / 2),
      config: this.config.player,
      projectile: this.config.projectile,
      bounds: this.bounds,
    })
  }

  private createEnemy(): Enemy {
    const { width, height } = this.bounds
    return new Enemy(ENEMY_ID, {
      position: new Vector2(width / 2, height / 4),
      config: this.config.enemy,
      bounds: this.bounds,
      rng: this.rng,
    })
  }

  /**
   * Back to a fresh round: new entities, initial score, level 1, playing
   */
  reset(): void {
    this.player = this.createPlayer()
    this.enemy = this.createEnemy()
    this.projectiles = []
    this.nextProjectileId = FIRST_PROJECTILE_ID
    this.score = this.config.scoring.initialScore
    this.level = 1
    this.kills = 0
    this.frame = 0
    this.state = 'playing'
  }

  /**
   * Advance one frame. Order is fixed: input, restart/game-over gate,
   * entity updates, collisions, score check.
   */
  update(dt: number, input: InputState): void {
    const step = this.sanitizeDelta(dt)

    if (input.quit) {
      this.quitRequested = true
    }

    if (this.state === 'gameover') {
      if (input.restart) {
        this.reset()
        SafeConsole.info('[Game] Restarted')
      }
      return
    }

    this.frame++
    this.updateEntities(step, input)
    this.resolveCollisions()
    this.checkGameOver()
  }

  private sanitizeDelta(dt: number): number {
    if (!Number.isFinite(dt) || dt < 0) return 0
    return Math.min(dt, this.config.loop.maxFrameDelta)
  }

  private updateEntities(dt: number, input: InputState): void {
    this.player.update(dt, input.pointer)

    if (input.fire) {
      const aimAt = input.pointer && input.pointer.isFinite() ? input.pointer : this.player.target
      const shot = this.player.tryFire(this.nextProjectileId, aimAt.subtract(this.player.getPosition()))
      if (shot) {
        this.nextProjectileId++
        this.projectiles.push(shot)
      }
    }

    this.enemy.update(dt, this.player.getPosition())

    for (const projectile of this.projectiles) {
      projectile.update(dt)
    }
    this.compactProjectiles()
  }

  /**
   * Drop inactive projectiles, keeping order, without reallocating
   */
  private compactProjectiles(): void {
    let write = 0
    for (const projectile of this.projectiles) {
      if (projectile.isActive()) {
        this.projectiles[write++] = projectile
      }
    }
    this.projectiles.length = write
  }

  private resolveCollisions(): void {
    // Projectiles vs enemy, in firing order
    this.collisions.resolveGroup(this.projectiles, this.enemy, ({ a: projectile }) => {
      projectile.deactivate()
      this.applyDamageResult(this.enemy.applyDamage(projectile.damage))
    })
    this.compactProjectiles()

    // Player vs enemy
    const contact = this.collisions.checkPair(this.player, this.enemy)
    if (contact.overlapping) {
      if (this.player.applyHit()) {
        this.score -= this.config.scoring.contactPenalty
      }
    } else {
      this.player.clearContact()
    }
  }

  private applyDamageResult(result: DamageResult): void {
    const { hitReward, killReward } = this.config.scoring

    switch (result) {
      case 'hit':
        this.score += hitReward
        break

      case 'destroyed':
        this.score += hitReward + killReward
        this.kills++
        if (this.kills >= this.config.levels.killsPerLevel) {
          this.levelUp()
        }
        break

      case 'ignored':
        break
    }
  }

  private levelUp(): void {
    this.level++
    this.kills = 0
    this.enemy.setSpeed(this.enemySpeedForLevel(this.level))
    SafeConsole.info(`[Game] Level ${this.level}`)
  }

  private enemySpeedForLevel(level: number): number {
    return this.config.enemy.speed + (level - 1) * this.config.levels.enemySpeedPerLevel
  }

  private checkGameOver(): void {
    if (this.score <= this.config.scoring.scoreFloor) {
      this.state = 'gameover'
      SafeConsole.info(`[Game] Game over with score ${this.score}`)
    }
  }

  render(surface: RenderSurface<TImage>): void {
    if (this.state === 'gameover') {
      surface.clear(ENTITY_COLORS.gameOverBackground)
      this.hud.renderGameOver(surface, this.getHUDState())
      surface.present()
      return
    }

    this.renderBackground(surface)

    for (const entity of this.getEntities()) {
      if (entity.isActive()) {
        surface.fillCircle(entity.x, entity.y, entity.getCollisionRadius(), this.colorOf(entity))
      }
    }

    this.hud.renderPlaying(surface, this.getHUDState())
    surface.present()
  }

  private colorOf(entity: GameEntity): string {
    switch (entity.kind) {
      case 'projectile':
        return ENTITY_COLORS.projectile
      case 'enemy':
        return entity.canTakeDamage() ? ENTITY_COLORS.enemy : ENTITY_COLORS.enemyInvulnerable
      case 'player':
        return ENTITY_COLORS.player
    }
  }

  private renderBackground(surface: RenderSurface<TImage>): void {
    const background = this.backgrounds.getBackground(this.getBackgroundIndex())
    if (background.kind === 'image') {
      surface.drawImage(background.image, 0, 0, surface.width, surface.height)
    } else {
      surface.clear(background.color)
    }
  }

  private getHUDState(): HUDGameState {
    return {
      score: this.score,
      level: this.level,
      kills: this.kills,
      killsPerLevel: this.config.levels.killsPerLevel,
    }
  }

  getState(): GameState {
    return this.state
  }

  getScore(): number {
    return this.score
  }

  getLevel(): number {
    return this.level
  }

  getKills(): number {
    return this.kills
  }

  /**
   * Zero-based background slot for the current level
   */
  getBackgroundIndex(): number {
    return this.level - 1
  }

  getPlayer(): Player {
    return this.player
  }

  getEnemy(): Enemy {
    return this.enemy
  }

  getProjectiles(): readonly Projectile[] {
    return this.projectiles
  }

  /**
   * Every live entity in draw order: projectiles, enemy, player
   */
  getEntities(): GameEntity[] {
    return [...this.projectiles, this.enemy, this.player]
  }

  getConfig(): GameConfig {
    return this.config
  }

  isQuitRequested(): boolean {
    return this.quitRequested
  }

  getSnapshot(): GameSnapshot {
    return {
      state: this.state,
      frame: this.frame,
      score: this.score,
      level: this.level,
      kills: this.kills,
      player: {
        x: this.player.x,
        y: this.player.y,
        fireCooldown: this.player.fireCooldown,
        contactCooldown: this.player.contactCooldown,
      },
      enemy: {
        x: this.enemy.x,
        y: this.enemy.y,
        radius: this.enemy.getCollisionRadius(),
        hitPoints: this.enemy.hitPoints,
        invulnerable: this.enemy.invulnerable,
        speed: this.enemy.speed,
      },
      projectiles: this.projectiles.map(p => ({ id: p.id, x: p.x, y: p.y, lifetime: p.lifetime })),
    }
  }
}
