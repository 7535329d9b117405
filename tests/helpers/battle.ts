import { vi } from 'vitest'

import { createContext } from '@engine/battle/context'
import { createBattle } from '@engine/battle/state'
import type { BattleContext, BattleState, Monster, RandomSource, Skill, Stats } from '@engine/battle/types'

export function makeMonster(
  id: string,
  overrides: Partial<Omit<Monster, 'stats'>> = {},
  stats: Partial<Stats> = {},
): Monster {
  return {
    id,
    name: id,
    level: 5,
    type1: 'normal',
    hp: 100,
    mp: 20,
    skills: [],
    captureRate: 100,
    stats: {
      maxHp: 100,
      maxMp: 20,
      attack: 50,
      defense: 30,
      agility: 40,
      magic: 40,
      wisdom: 30,
      ...stats,
    },
    ...overrides,
  }
}

export function makeSkill(partial: Partial<Skill> = {}): Skill {
  return {
    id: 'test-skill',
    name: 'Test Skill',
    category: 'physical',
    target: 'single_enemy',
    mpCost: 0,
    power: 80,
    accuracy: 100,
    priority: 0,
    ...partial,
  }
}

/** Hands out the given draws in order and fails loudly on an unexpected extra draw. */
export function queueRandom(values: number[]): RandomSource & { remaining: () => number } {
  const queue = values.slice()
  const source = () => {
    const next = queue.shift()
    if (next === undefined) {
      throw new Error('random source exhausted')
    }
    return next
  }
  return Object.assign(source, { remaining: () => queue.length })
}

export function silentLogger() {
  return { debug: vi.fn(), warn: vi.fn() }
}

export function makeContext(overrides: Partial<BattleContext> = {}): BattleContext {
  return createContext({ logger: silentLogger(), ...overrides })
}

export function makeBattle(
  player: Monster[] = [makeMonster('hero')],
  enemy: Monster[] = [makeMonster('slime')],
  type: BattleState['battleType'] = 'wild',
): BattleState {
  return createBattle({ player, enemy, type })
}

export function catalogOf(...skills: Skill[]) {
  const map = new Map(skills.map((skill) => [skill.id, skill]))
  return { lookup: (id: string) => map.get(id), all: () => [...map.values()] }
}
