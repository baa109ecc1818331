import { describe, it, expect, beforeEach } from 'vitest'
import { Player } from './Player.ts'
import type { Projectile } from './Projectile.ts'
import { Vector2 } from '../math/Vector2.ts'
import { DEFAULT_GAME_CONFIG, type PlayerConfig } from '../game/GameConfig.ts'

const bounds = { width: 800, height: 600 }

function createPlayer(config: Partial<PlayerConfig> = {}, x = 200, y = 300): Player {
  return new Player(1, {
    position: new Vector2(x, y),
    config: { ...DEFAULT_GAME_CONFIG.player, ...config },
    projectile: DEFAULT_GAME_CONFIG.projectile,
    bounds,
  })
}

describe('Player', () => {
  let player: Player

  beforeEach(() => {
    player = createPlayer()
  })

  describe('update', () => {
    it('should close 1 - exp(-rate * dt) of the gap to the pointer', () => {
      player.update(0.1, new Vector2(400, 300))

      // rate 10, dt 0.1
      expect(player.x).toBeCloseTo(200 + 200 * (1 - Math.exp(-1)), 9)
      expect(player.y).toBe(300)
    })

    it('should land in the same place whether a step is split or not', () => {
      const whole = createPlayer()
      const split = createPlayer()
      const pointer = new Vector2(500, 120)

      whole.update(0.1, pointer)
      split.update(0.05, pointer)
      split.update(0.05, pointer)

      expect(split.x).toBeCloseTo(whole.x, 9)
      expect(split.y).toBeCloseTo(whole.y, 9)
    })

    it('should not move with dt = 0', () => {
      player.update(0, new Vector2(400, 300))
      expect(player.x).toBe(200)
      expect(player.y).toBe(300)
    })

    it('should keep the last target when the pointer is missing', () => {
      player.update(0.1, new Vector2(400, 300))
      const x = player.x

      player.update(0.1, null)
      expect(player.x).toBeGreaterThan(x)
      expect(player.target.equals(new Vector2(400, 300))).toBe(true)
    })

    it('should ignore a non-finite pointer', () => {
      player.update(0.1, new Vector2(NaN, 10))
      expect(player.x).toBe(200)
      expect(player.y).toBe(300)
    })

    it('should stay inside the playfield', () => {
      player.update(10, new Vector2(-500, 5000))
      expect(player.x).toBe(20)
      expect(player.y).toBe(580)
    })

    it('should face the direction it moved', () => {
      player.update(0.1, new Vector2(200, 100))
      expect(player.facing.x).toBeCloseTo(0, 12)
      expect(player.facing.y).toBeCloseTo(-1, 12)

      player.update(0.1, new Vector2(600, player.y))
      expect(player.facing.x).toBeCloseTo(1, 12)
    })

    it('should decay cooldowns and floor them at zero', () => {
      player.fireCooldown = 0.3
      player.contactCooldown = 0.05
      player.update(0.1, null)

      expect(player.fireCooldown).toBeCloseTo(0.2, 12)
      expect(player.contactCooldown).toBe(0)
    })
  })

  describe('tryFire', () => {
    it('should spawn a projectile at the player along the given direction', () => {
      const shot = player.tryFire(7, new Vector2(0, 10))

      expect(shot).not.toBeNull()
      expect(shot?.id).toBe(7)
      expect(shot?.x).toBe(200)
      expect(shot?.y).toBe(300)
      expect(shot?.direction.y).toBe(1)
      expect(shot?.speed).toBe(300)
      expect(shot?.lifetime).toBe(2)
      expect(player.fireCooldown).toBe(0.3)
    })

    it('should be a no-op while the cooldown runs', () => {
      player.fireCooldown = 0.1
      expect(player.tryFire(1, new Vector2(1, 0))).toBeNull()
      expect(player.fireCooldown).toBe(0.1)
    })

    it('should allow exactly one shot from two attempts 0.1s apart with a 0.3s cooldown', () => {
      const shots: Array<Projectile | null> = []

      player.update(0.1, null)
      shots.push(player.tryFire(1, new Vector2(1, 0)))
      player.update(0.1, null)
      shots.push(player.tryFire(2, new Vector2(1, 0)))

      expect(shots.filter(shot => shot !== null)).toHaveLength(1)
    })

    it('should fire again once the cooldown has elapsed', () => {
      expect(player.tryFire(1, new Vector2(1, 0))).not.toBeNull()
      player.update(0.3, null)
      expect(player.tryFire(2, new Vector2(1, 0))).not.toBeNull()
    })

    it('should fire every 18 frames at 60 fps with a 0.3s cooldown', () => {
      expect(player.tryFire(1, new Vector2(1, 0))).not.toBeNull()

      let frames = 0
      let shot: Projectile | null = null
      while (shot === null && frames < 60) {
        player.update(1 / 60, null)
        frames++
        shot = player.tryFire(2, new Vector2(1, 0))
      }

      expect(frames).toBe(18)
    })

    it('should fall back to the facing direction for a zero aim', () => {
      const shot = player.tryFire(1, Vector2.zero())
      expect(shot?.direction.x).toBe(0)
      expect(shot?.direction.y).toBe(-1)
    })
  })

  describe('applyHit', () => {
    it('should count the first frame of contact', () => {
      expect(player.applyHit()).toBe(true)
      expect(player.contactCooldown).toBe(1)
    })

    it('should count a continuous overlap only once', () => {
      expect(player.applyHit()).toBe(true)
      for (let i = 0; i < 120; i++) {
        player.update(1 / 60, null)
        expect(player.applyHit()).toBe(false)
      }
    })

    it('should charge an overlap that starts inside the cooldown once the cooldown ends', () => {
      player.applyHit()
      player.clearContact()

      const results: boolean[] = []
      for (let i = 0; i < 8; i++) {
        player.update(0.25, null)
        results.push(player.applyHit())
      }

      // Cooldown of 1s runs out on the fourth 0.25s step
      expect(results).toEqual([false, false, false, true, false, false, false, false])
    })

    it('should never charge a short overlap that ends inside the cooldown', () => {
      player.applyHit()
      player.clearContact()

      player.update(0.25, null)
      expect(player.applyHit()).toBe(false)
      player.update(0.25, null)
      expect(player.applyHit()).toBe(false)
      player.clearContact()

      expect(player.inContact).toBe(false)
      expect(player.contactCooldown).toBe(0.5)
    })

    it('should count a new contact episode after the cooldown', () => {
      player.applyHit()
      player.clearContact()
      player.update(1, null)

      expect(player.applyHit()).toBe(true)
    })
  })
})
