/**
 * HUD - score overlay and game-over view
 *
 * Draws text through the render surface on top of the playfield.
 */

import type { RenderSurface, TextStyle } from '../core/Surface.ts'

export interface HUDGameState {
  score: number
  level: number
  kills: number
  killsPerLevel: number
}

export const HUD_COLORS = {
  text: '#ffffff',
  dim: '#c8c8c8',
  gameOver: '#ff0000',
} as const

export const INSTRUCTIONS = 'Move with the mouse - left click to fire'
export const RESTART_HINT = 'Press R to play again'

const LARGE: TextStyle = { color: HUD_COLORS.text, size: 36 }
const SMALL: TextStyle = { color: HUD_COLORS.dim, size: 24 }

export class HUD {
  renderPlaying<TImage>(surface: RenderSurface<TImage>, state: HUDGameState): void {
    surface.drawText(`Score: ${state.score}`, 10, 10, LARGE)
    surface.drawText(`Level: ${state.level}`, 10, 50, LARGE)
    surface.drawText(`Enemies: ${state.kills}/${state.killsPerLevel}`, 10, 90, SMALL)
    surface.drawText(INSTRUCTIONS, 10, 120, SMALL)
  }

  renderGameOver<TImage>(surface: RenderSurface<TImage>, state: HUDGameState): void {
    const cx = surface.width / 2
    const cy = surface.height / 2

    surface.drawText('GAME OVER', cx, cy, { ...LARGE, color: HUD_COLORS.gameOver, align: 'center' })
    surface.drawText(`Final score: ${state.score}`, cx, cy + 40, { ...LARGE, align: 'center' })
    surface.drawText(RESTART_HINT, cx, cy + 80, { ...SMALL, align: 'center' })
  }
}
