import { monsterAt } from './targeting'
import type { Action, BattleState } from './types'

const PRIORITY_WEIGHT = 1000

export function orderKey(state: BattleState, action: Action): number {
  const agility = monsterAt(state, action.actor)?.stats.agility ?? 0
  return action.priority * PRIORITY_WEIGHT + agility
}

/** Highest key first; equal keys keep submission order. */
export function orderActions(state: BattleState, actions: readonly Action[]): Action[] {
  return actions
    .map((action, index) => ({ action, index, key: orderKey(state, action) }))
    .sort((a, b) => b.key - a.key || a.index - b.index)
    .map((entry) => entry.action)
}
