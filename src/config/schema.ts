export const MONSTER_TYPES = [
  'normal', 'fire', 'water', 'grass', 'electric', 'ice', 'fighting', 'poison',
  'ground', 'flying', 'psychic', 'bug', 'rock', 'ghost', 'dragon', 'dark', 'steel',
] as const

export type MonsterType = typeof MONSTER_TYPES[number]

export const SKILL_CATEGORIES = ['physical', 'magical', 'healing', 'support'] as const
export type SkillCategory = typeof SKILL_CATEGORIES[number]

export const SKILL_TARGETS = ['self', 'single_enemy', 'all_enemies', 'single_ally', 'all_allies', 'all'] as const
export type SkillTarget = typeof SKILL_TARGETS[number]

export const BATTLE_TYPES = ['wild', 'trainer', 'boss'] as const
export type BattleType = typeof BATTLE_TYPES[number]

export interface SkillDef {
  id: string; name: string; description?: string
  category: SkillCategory; target: SkillTarget
  mpCost: number; power: number; accuracy: number; priority: number
}

export type TypeChart = Partial<Record<MonsterType, Partial<Record<MonsterType, number>>>>

export interface Balance {
  CRIT_CHANCE: number; CRIT_MULT: number;
  VARIANCE: number; LEVEL_STEP: number; MIN_DAMAGE: number;
  TYPE_CHART: TypeChart;
  DEFEND_MULT: number;
  FLEE_BASE: number; FLEE_AGILITY_STEP: number; FLEE_FLOOR: number; FLEE_CEIL: number;
  BASIC_ATTACK: { power: number; accuracy: number };
  CAPTURE_ITEMS: Record<string, number>;
  CAPTURE_HP_WEIGHT: number;
}

export interface AiTuning {
  SKILL_MP_THRESHOLD: number; SKILL_CHANCE: number;
  LOW_HP_RATIO: number; DEFEND_CHANCE: number;
}

export interface Pacing {
  ACTION_DELAY_MS: number; TURN_DELAY_MS: number
}

export interface GameConfig {
  __version: number
  skills: Record<string, SkillDef>
  balance: Balance
  ai: AiTuning
  pacing: Pacing
}
