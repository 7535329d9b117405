import { CONFIG } from '@config/store'

import { mathRandom } from './rng'
import { typeEffectiveness } from './typeChart'
import type { Monster, RandomSource, Skill } from './types'

export interface DamageRoll {
  damage: number
  critical: boolean
  typeModifier: number
}

/**
 * Rolls one hit. Draw order is fixed: the critical roll first, then variance,
 * so a seeded source replays the same damage.
 */
export function rollDamage(
  attacker: Monster,
  defender: Monster,
  skill: Skill,
  isPhysical: boolean,
  random: RandomSource = mathRandom,
): DamageRoll {
  const { balance } = CONFIG()
  const attackStat = isPhysical ? attacker.stats.attack : attacker.stats.magic
  const base = Math.floor((attackStat * skill.power) / 100)

  const levelModifier = 1 + balance.LEVEL_STEP * (attacker.level - defender.level)
  // secondary types are not consulted
  const typeModifier = typeEffectiveness(attacker.type1, defender.type1)

  const critical = random() < balance.CRIT_CHANCE
  const criticalModifier = critical ? balance.CRIT_MULT : 1
  const varianceModifier = 1 + (random() * 2 - 1) * balance.VARIANCE

  const raw = Math.floor(base * levelModifier * typeModifier * criticalModifier * varianceModifier)
  return { damage: Math.max(balance.MIN_DAMAGE, raw), critical, typeModifier }
}

export function computeDamage(
  attacker: Monster,
  defender: Monster,
  skill: Skill,
  isPhysical: boolean,
  random: RandomSource = mathRandom,
): number {
  return rollDamage(attacker, defender, skill, isPhysical, random).damage
}

export function guardedDamage(damage: number): number {
  const { balance } = CONFIG()
  return Math.max(balance.MIN_DAMAGE, Math.floor(damage * balance.DEFEND_MULT))
}

export function healAmount(healer: Monster, skill: Skill): number {
  return Math.max(1, Math.floor((healer.stats.magic * skill.power) / 100))
}

export function fleeChance(fleeingAgility: number, opposingAgility: number): number {
  const { balance } = CONFIG()
  const raw = balance.FLEE_BASE + balance.FLEE_AGILITY_STEP * (fleeingAgility - opposingAgility)
  return clamp(raw, balance.FLEE_FLOOR, balance.FLEE_CEIL)
}

export function clamp(value: number, min: number, max: number): number {
  if (!Number.isFinite(value)) {
    return min
  }
  if (value < min) return min
  if (value > max) return max
  return value
}
