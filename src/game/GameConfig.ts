import { ConfigError } from '../core/errors.ts'

export interface ScreenConfig {
  width: number
  height: number
}

export interface PlayerConfig {
  radius: number
  /** Exponential follow rate toward the pointer, per second */
  smoothingRate: number
  /** Seconds between shots */
  fireCooldown: number
  /** Seconds after a contact penalty before another can apply */
  contactCooldown: number
}

export interface ProjectileConfig {
  radius: number
  speed: number
  lifetime: number
  damage: number
}

export interface EnemyConfig {
  radius: number
  speed: number
  maxHitPoints: number
  /** Seconds of damage immunity after a hit */
  invulnerabilityWindow: number
  /** Seconds of damage immunity after respawning */
  respawnGrace: number
  /** Random respawns keep this far from the screen edges */
  respawnMargin: number
  /** Fixed respawn location; random inside the margin when absent */
  respawnPoint?: { x: number; y: number }
  /** Radius chosen at random on respawn; keeps `radius` when empty */
  respawnRadii: readonly number[]
}

export interface ScoringConfig {
  initialScore: number
  /** Added whenever a projectile damages the enemy */
  hitReward: number
  /** Added on top of hitReward when the hit destroys the enemy */
  killReward: number
  contactPenalty: number
  /** Game over once score is at or below this */
  scoreFloor: number
}

export interface LevelConfig {
  killsPerLevel: number
  enemySpeedPerLevel: number
}

export interface LoopConfig {
  targetFps: number
  /** Longest simulated step, in seconds; longer stalls are clamped */
  maxFrameDelta: number
}

export interface GameConfig {
  screen: ScreenConfig
  player: PlayerConfig
  projectile: ProjectileConfig
  enemy: EnemyConfig
  scoring: ScoringConfig
  levels: LevelConfig
  loop: LoopConfig
  seed: number
}

/**
 * Partial override accepted by createGameConfig - each group merges separately
 */
export type GameConfigOverrides = {
  [K in keyof GameConfig]?: GameConfig[K] extends object ? Partial<GameConfig[K]> : GameConfig[K]
}

export const DEFAULT_GAME_CONFIG: GameConfig = {
  screen: { width: 800, height: 600 },
  player: {
    radius: 20,
    smoothingRate: 10,
    fireCooldown: 0.3,
    contactCooldown: 1.0,
  },
  projectile: {
    radius: 8,
    speed: 300,
    lifetime: 2.0,
    damage: 1,
  },
  enemy: {
    radius: 20,
    speed: 100,
    maxHitPoints: 3,
    invulnerabilityWindow: 0.2,
    respawnGrace: 1.0,
    respawnMargin: 50,
    respawnRadii: [10, 15, 20, 25, 30],
  },
  scoring: {
    initialScore: 10,
    hitReward: 1,
    killReward: 2,
    contactPenalty: 2,
    scoreFloor: 0,
  },
  levels: {
    killsPerLevel: 3,
    enemySpeedPerLevel: 15,
  },
  loop: {
    targetFps: 60,
    maxFrameDelta: 0.25,
  },
  seed: 1,
}

function requireFinite(field: string, value: number): void {
  if (!Number.isFinite(value)) {
    throw new ConfigError(field, `expected a finite number, got ${value}`)
  }
}

function requirePositive(field: string, value: number): void {
  requireFinite(field, value)
  if (value <= 0) {
    throw new ConfigError(field, `expected a positive number, got ${value}`)
  }
}

function requireNonNegative(field: string, value: number): void {
  requireFinite(field, value)
  if (value < 0) {
    throw new ConfigError(field, `expected zero or more, got ${value}`)
  }
}

function requireInteger(field: string, value: number): void {
  if (!Number.isInteger(value)) {
    throw new ConfigError(field, `expected an integer, got ${value}`)
  }
}

/**
 * Check every field of a complete config, throwing ConfigError on the first bad one
 */
export function validateGameConfig(config: GameConfig): void {
  const { screen, player, projectile, enemy, scoring, levels, loop } = config

  requirePositive('screen.width', screen.width)
  requirePositive('screen.height', screen.height)

  requirePositive('player.radius', player.radius)
  requirePositive('player.smoothingRate', player.smoothingRate)
  requireNonNegative('player.fireCooldown', player.fireCooldown)
  requireNonNegative('player.contactCooldown', player.contactCooldown)

  requirePositive('projectile.radius', projectile.radius)
  requirePositive('projectile.speed', projectile.speed)
  requirePositive('projectile.lifetime', projectile.lifetime)
  requirePositive('projectile.damage', projectile.damage)
  requireInteger('projectile.damage', projectile.damage)

  requirePositive('enemy.radius', enemy.radius)
  requireNonNegative('enemy.speed', enemy.speed)
  requirePositive('enemy.maxHitPoints', enemy.maxHitPoints)
  requireInteger('enemy.maxHitPoints', enemy.maxHitPoints)
  requireNonNegative('enemy.invulnerabilityWindow', enemy.invulnerabilityWindow)
  requireNonNegative('enemy.respawnGrace', enemy.respawnGrace)
  requireNonNegative('enemy.respawnMargin', enemy.respawnMargin)
  if (enemy.respawnMargin * 2 > Math.min(screen.width, screen.height)) {
    throw new ConfigError('enemy.respawnMargin', 'leaves no room to respawn inside the screen')
  }
  if (enemy.respawnPoint) {
    requireFinite('enemy.respawnPoint.x', enemy.respawnPoint.x)
    requireFinite('enemy.respawnPoint.y', enemy.respawnPoint.y)
  }
  enemy.respawnRadii.forEach((radius, i) => requirePositive(`enemy.respawnRadii[${i}]`, radius))

  requireInteger('scoring.initialScore', scoring.initialScore)
  requireInteger('scoring.hitReward', scoring.hitReward)
  requireInteger('scoring.killReward', scoring.killReward)
  requireInteger('scoring.contactPenalty', scoring.contactPenalty)
  requireInteger('scoring.scoreFloor', scoring.scoreFloor)
  requireNonNegative('scoring.hitReward', scoring.hitReward)
  requireNonNegative('scoring.killReward', scoring.killReward)
  requireNonNegative('scoring.contactPenalty', scoring.contactPenalty)
  if (scoring.initialScore <= scoring.scoreFloor) {
    throw new ConfigError('scoring.initialScore', 'must start above scoring.scoreFloor')
  }

  requirePositive('levels.killsPerLevel', levels.killsPerLevel)
  requireInteger('levels.killsPerLevel', levels.killsPerLevel)
  requireNonNegative('levels.enemySpeedPerLevel', levels.enemySpeedPerLevel)

  requirePositive('loop.targetFps', loop.targetFps)
  requirePositive('loop.maxFrameDelta', loop.maxFrameDelta)

  requireInteger('seed', config.seed)
}

/**
 * Merge overrides onto the defaults group by group, then validate
 */
export function createGameConfig(overrides: GameConfigOverrides = {}): GameConfig {
  const config: GameConfig = {
    screen: { ...DEFAULT_GAME_CONFIG.screen, ...overrides.screen },
    player: { ...DEFAULT_GAME_CONFIG.player, ...overrides.player },
    projectile: { ...DEFAULT_GAME_CONFIG.projectile, ...overrides.projectile },
    enemy: { ...DEFAULT_GAME_CONFIG.enemy, ...overrides.enemy },
    scoring: { ...DEFAULT_GAME_CONFIG.scoring, ...overrides.scoring },
    levels: { ...DEFAULT_GAME_CONFIG.levels, ...overrides.levels },
    loop: { ...DEFAULT_GAME_CONFIG.loop, ...overrides.loop },
    seed: overrides.seed ?? DEFAULT_GAME_CONFIG.seed,
  }

  validateGameConfig(config)
  return config
}
