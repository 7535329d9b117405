import { CONFIG } from '@config/store'
import { MONSTER_TYPES } from '@config/schema'

import type { MonsterType } from './types'

export interface TypeMatchup {
  attacking: MonsterType
  defending: MonsterType
  multiplier: number
}

export function typeEffectiveness(attacking: MonsterType, defending: MonsterType): number {
  const row = CONFIG().balance.TYPE_CHART[attacking]
  const value = row?.[defending]
  return typeof value === 'number' ? value : 1
}

export function typeMatchups(): TypeMatchup[] {
  const matchups: TypeMatchup[] = []
  for (const attacking of MONSTER_TYPES) {
    for (const defending of MONSTER_TYPES) {
      matchups.push({ attacking, defending, multiplier: typeEffectiveness(attacking, defending) })
    }
  }
  return matchups
}
