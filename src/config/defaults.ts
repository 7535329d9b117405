import type { GameConfig } from './schema'

export const DEFAULTS: GameConfig = {
  __version: 1,
  skills: {},
  balance: {
    CRIT_CHANCE: 0.05, CRIT_MULT: 1.5,
    VARIANCE: 0.15, LEVEL_STEP: 0.05, MIN_DAMAGE: 1,
    TYPE_CHART: {
      fire: { grass: 1.5, water: 0.5 },
      water: { fire: 1.5, grass: 0.5 },
      grass: { water: 1.5, fire: 0.5 },
      electric: { flying: 1.5, ground: 0.5 },
      fighting: { normal: 1.5 },
    },
    DEFEND_MULT: 0.5,
    FLEE_BASE: 0.5, FLEE_AGILITY_STEP: 0.01, FLEE_FLOOR: 0.1, FLEE_CEIL: 0.9,
    BASIC_ATTACK: { power: 50, accuracy: 95 },
    CAPTURE_ITEMS: { capture_orb: 1, great_orb: 1.5, master_orb: 255 },
    CAPTURE_HP_WEIGHT: 0.5,
  },
  ai: {
    SKILL_MP_THRESHOLD: 8, SKILL_CHANCE: 0.4,
    LOW_HP_RATIO: 0.3, DEFEND_CHANCE: 0.3,
  },
  pacing: {
    ACTION_DELAY_MS: 500, TURN_DELAY_MS: 500,
  },
}
