export { Vector2, EPSILON } from './math/Vector2.ts'
export { SeededRandom, randomPick, randomRange, type RandomSource } from './math/SeededRandom.ts'

export { Entity, type Bounds, type Collidable, type EntityKind } from './entities/Entity.ts'
export { Projectile, type ExpiryReason, type ProjectileOptions } from './entities/Projectile.ts'
export { Player, type PlayerOptions } from './entities/Player.ts'
export { Enemy, type DamageResult, type EnemyOptions } from './entities/Enemy.ts'

export { CollisionSystem, measure, type Contact } from './systems/CollisionSystem.ts'

export {
  createGameConfig,
  validateGameConfig,
  DEFAULT_GAME_CONFIG,
  type GameConfig,
  type GameConfigOverrides,
} from './game/GameConfig.ts'
export { Game, ENTITY_COLORS, type GameEntity, type GameOptions, type GameSnapshot, type GameState } from './game/Game.ts'

export {
  AssetLoader,
  BackgroundLibrary,
  FALLBACK_BACKGROUND_COLOR,
  type Background,
  type BackgroundManifest,
  type ImageLoader,
  type LoadProgress,
} from './boot/AssetLoader.ts'

export { HUD, type HUDGameState } from './ui/HUD.ts'

export { Engine, type EngineOptions } from './core/Engine.ts'
export { Input, MOUSE_LEFT, type InputSource, type InputState } from './core/Input.ts'
export {
  CanvasSurface,
  type Canvas2DContext,
  type ImageAsset,
  type RenderSurface,
  type TextStyle,
} from './core/Surface.ts'
export { ConfigError, EngineError } from './core/errors.ts'
export { SafeConsole } from './core/SafeConsole.ts'
